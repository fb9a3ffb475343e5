/**
 * Unit tests for mission normalisation and the mission state machine.
 */

import { MissionLedger, MissionStateError, normalizeMission } from '../../routing/MissionLedger';
import { MissionStatus } from '../../../shared/types/MissionTypes';
import { makeDescriptor, makeMission } from './helpers/testFixtures';

describe('normalizeMission', () => {
  it('should split cargo evenly when no dropoff amounts are given', () => {
    const mission = normalizeMission(makeDescriptor({ id: 'm1', pickup: 'A', dropoffs: ['B', 'C'], cargoScu: 90 }));

    expect(mission.dropoffCargoAmounts).toEqual([45, 45]);
  });

  it('should treat an empty amount list like a missing one', () => {
    const mission = normalizeMission(
      makeDescriptor({ id: 'm1', pickup: 'A', dropoffs: ['B', 'C', 'D'], cargoScu: 60, dropoffCargoAmounts: [] }),
    );

    expect(mission.dropoffCargoAmounts).toEqual([20, 20, 20]);
  });

  it('should split the remainder over dropoffs without an amount', () => {
    const mission = normalizeMission(
      makeDescriptor({ id: 'm1', pickup: 'A', dropoffs: ['B', 'C', 'D'], cargoScu: 90, dropoffCargoAmounts: [30] }),
    );

    expect(mission.dropoffCargoAmounts).toEqual([30, 30, 30]);
  });

  it('should clamp the remainder at zero when supplied amounts exceed the total', () => {
    const mission = normalizeMission(
      makeDescriptor({ id: 'm1', pickup: 'A', dropoffs: ['B', 'C', 'D'], cargoScu: 90, dropoffCargoAmounts: [100] }),
    );

    expect(mission.dropoffCargoAmounts).toEqual([100, 0, 0]);
  });

  it('should truncate surplus amounts and types', () => {
    const mission = normalizeMission(
      makeDescriptor({
        id: 'm1',
        pickup: 'A',
        dropoffs: ['B', 'C'],
        cargoScu: 60,
        dropoffCargoAmounts: [10, 20, 30],
        dropoffCargoTypes: ['Gold', 'Beryl', 'Waste'],
      }),
    );

    expect(mission.dropoffCargoAmounts).toEqual([10, 20]);
    expect(mission.dropoffCargoTypes).toEqual(['Gold', 'Beryl']);
  });

  it('should pad missing dropoff types with the mission cargo type', () => {
    const mission = normalizeMission(
      makeDescriptor({
        id: 'm1',
        pickup: 'A',
        dropoffs: ['B', 'C'],
        cargoType: 'Medical Supplies',
        dropoffCargoTypes: ['Stims'],
      }),
    );

    expect(mission.dropoffCargoTypes).toEqual(['Stims', 'Medical Supplies']);
  });

  it('should default cargo type, payout and description', () => {
    const mission = normalizeMission(makeDescriptor({ id: 'm1', pickup: 'A', dropoffs: ['B'] }));

    expect(mission.cargoType).toBe('General');
    expect(mission.dropoffCargoTypes).toEqual(['General']);
    expect(mission.payout).toBe(0);
    expect(mission.description).toBe('');
  });

  it('should reject a mission without dropoffs', () => {
    expect(() => normalizeMission(makeDescriptor({ id: 'm1', pickup: 'A', dropoffs: [] }))).toThrow(RangeError);
  });

  it('should not share the dropoff array with the descriptor', () => {
    const descriptor = makeDescriptor({ id: 'm1', pickup: 'A', dropoffs: ['B'] });
    const mission = normalizeMission(descriptor);
    descriptor.dropoffs.push('C');

    expect(mission.dropoffs).toEqual(['B']);
  });
});

describe('MissionLedger', () => {
  const missions = [
    makeMission({ id: 'm1', pickup: 'A', dropoffs: ['B', 'C'], cargoScu: 40, cargoType: 'Gold' }),
    makeMission({ id: 'm2', pickup: 'B', dropoffs: ['D'], cargoScu: 30 }),
    makeMission({ id: 'm3', pickup: 'C', dropoffs: ['A'], cargoScu: 20 }),
  ];

  it('should start with every mission pending in request order', () => {
    const ledger = new MissionLedger(missions);

    expect(ledger.pending()).toEqual([0, 1, 2]);
    expect(ledger.inProgress()).toEqual([]);
    expect(ledger.completed()).toEqual([]);
    expect(ledger.statusOf(0)).toBe(MissionStatus.Pending);
    expect(ledger.cursorOf(0)).toBe(0);
    expect(ledger.isFinished()).toBe(false);
  });

  it('should move a picked-up mission to in-progress with its full cargo', () => {
    const ledger = new MissionLedger(missions);

    const movement = ledger.pickUp(0);

    expect(movement).toEqual({ missionId: 'm1', location: 'A', cargoType: 'Gold', amount: 40 });
    expect(ledger.statusOf(0)).toBe(MissionStatus.InProgress);
    expect(ledger.pending()).toEqual([1, 2]);
    expect(ledger.inProgress()).toEqual([0]);
  });

  it('should keep in-progress missions in pickup order', () => {
    const ledger = new MissionLedger(missions);

    ledger.pickUp(2);
    ledger.pickUp(0);

    expect(ledger.inProgress()).toEqual([2, 0]);
    expect(ledger.pending()).toEqual([1]);
  });

  it('should advance the cursor on each dropoff and complete on the last', () => {
    const ledger = new MissionLedger(missions);
    ledger.pickUp(0);

    const first = ledger.dropOff(0);
    expect(first).toEqual({ missionId: 'm1', location: 'B', cargoType: 'Gold', amount: 20, completed: false });
    expect(ledger.cursorOf(0)).toBe(1);
    expect(ledger.nextDropoff(0)).toBe('C');
    expect(ledger.statusOf(0)).toBe(MissionStatus.InProgress);

    const second = ledger.dropOff(0);
    expect(second.location).toBe('C');
    expect(second.completed).toBe(true);
    expect(ledger.cursorOf(0)).toBe(2);
    expect(ledger.nextDropoff(0)).toBeUndefined();
    expect(ledger.statusOf(0)).toBe(MissionStatus.Completed);
    expect(ledger.completed()).toEqual([0]);
    expect(ledger.inProgress()).toEqual([]);
  });

  it('should report finished once nothing is pending or in progress', () => {
    const ledger = new MissionLedger([missions[1]]);
    ledger.pickUp(0);
    expect(ledger.isFinished()).toBe(false);

    ledger.dropOff(0);
    expect(ledger.isFinished()).toBe(true);
  });

  it('should reject picking up a mission twice', () => {
    const ledger = new MissionLedger(missions);
    ledger.pickUp(1);

    expect(() => ledger.pickUp(1)).toThrow(MissionStateError);
  });

  it('should reject dropping off a mission that is not in progress', () => {
    const ledger = new MissionLedger(missions);

    expect(() => ledger.dropOff(1)).toThrow('Cannot drop off mission m2 while it is Pending');
  });

  it('should reject dropping off a completed mission', () => {
    const ledger = new MissionLedger(missions);
    ledger.pickUp(1);
    ledger.dropOff(1);

    expect(() => ledger.dropOff(1)).toThrow(MissionStateError);
    expect(ledger.cursorOf(1)).toBe(1);
  });

  it('should keep progress separate between ledgers over the same missions', () => {
    const first = new MissionLedger(missions);
    const second = new MissionLedger(missions);
    first.pickUp(0);
    first.dropOff(0);

    expect(second.statusOf(0)).toBe(MissionStatus.Pending);
    expect(second.cursorOf(0)).toBe(0);
  });

  it('should reject unknown mission indices', () => {
    const ledger = new MissionLedger(missions);

    expect(() => ledger.mission(7)).toThrow(RangeError);
  });
});
