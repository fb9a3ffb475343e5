/**
 * Route-scoped progress for a list of cargo missions.
 *
 * Missions themselves are immutable; the ledger keeps one status tag and one
 * dropoff cursor per mission (parallel to the mission list) plus the three
 * partitions as ordered index sets. A mission only ever moves
 * Pending → InProgress → Completed.
 */

import {
  CargoMission,
  DEFAULT_CARGO_TYPE,
  MissionDescriptor,
  MissionStatus,
} from '../../shared/types/MissionTypes';

export class MissionStateError extends Error {
  public readonly code = 'INVALID_MISSION_TRANSITION';

  constructor(
    public readonly missionId: string,
    public readonly status: MissionStatus,
    attempted: string,
  ) {
    super(`Cannot ${attempted} mission ${missionId} while it is ${status}`);
    this.name = 'MissionStateError';
  }
}

/** Cargo moved by one ledger transition */
export interface CargoMovement {
  missionId: string;
  location: string;
  cargoType: string;
  amount: number;
}

export interface DropoffMovement extends CargoMovement {
  /** True when this was the mission's last dropoff */
  completed: boolean;
}

function fillCargoTypes(dropoffCount: number, cargoType: string, supplied?: string[]): string[] {
  const types = (supplied ?? []).slice(0, dropoffCount);
  while (types.length < dropoffCount) {
    types.push(cargoType);
  }
  return types;
}

function fillCargoAmounts(dropoffCount: number, cargoScu: number, supplied?: number[]): number[] {
  if (!supplied || supplied.length === 0) {
    return new Array<number>(dropoffCount).fill(cargoScu / dropoffCount);
  }
  if (supplied.length >= dropoffCount) {
    return supplied.slice(0, dropoffCount);
  }
  const specified = supplied.reduce((sum, amount) => sum + amount, 0);
  const remaining = Math.max(0, cargoScu - specified);
  const unspecified = dropoffCount - supplied.length;
  return [...supplied, ...new Array<number>(unspecified).fill(remaining / unspecified)];
}

/**
 * Derive the per-dropoff cargo plan of a mission.
 * Missing types default to the mission type; missing amounts share whatever
 * the supplied amounts leave of the total (never less than 0).
 */
export function normalizeMission(descriptor: MissionDescriptor): CargoMission {
  const dropoffs = [...descriptor.dropoffs];
  if (dropoffs.length === 0) {
    throw new RangeError(`Mission ${descriptor.id} has no dropoff locations`);
  }
  const cargoType = descriptor.cargoType ?? DEFAULT_CARGO_TYPE;

  return {
    id: descriptor.id,
    pickup: descriptor.pickup,
    dropoffs,
    cargoScu: descriptor.cargoScu,
    cargoType,
    dropoffCargoTypes: fillCargoTypes(dropoffs.length, cargoType, descriptor.dropoffCargoTypes),
    dropoffCargoAmounts: fillCargoAmounts(dropoffs.length, descriptor.cargoScu, descriptor.dropoffCargoAmounts),
    payout: descriptor.payout ?? 0,
    description: descriptor.description ?? '',
  };
}

export class MissionLedger {
  private readonly missions: ReadonlyArray<CargoMission>;
  private readonly statuses: MissionStatus[];
  private readonly cursors: number[];
  private readonly pendingSet = new Set<number>();
  private readonly inProgressSet = new Set<number>();
  private readonly completedSet = new Set<number>();

  constructor(missions: ReadonlyArray<CargoMission>) {
    this.missions = missions;
    this.statuses = missions.map(() => MissionStatus.Pending);
    this.cursors = missions.map(() => 0);
    missions.forEach((_, index) => this.pendingSet.add(index));
  }

  get size(): number {
    return this.missions.length;
  }

  mission(index: number): CargoMission {
    const mission = this.missions[index];
    if (!mission) {
      throw new RangeError(`No mission at index ${index}`);
    }
    return mission;
  }

  statusOf(index: number): MissionStatus {
    this.mission(index);
    return this.statuses[index];
  }

  cursorOf(index: number): number {
    this.mission(index);
    return this.cursors[index];
  }

  /** Pending mission indices in request order */
  pending(): number[] {
    return [...this.pendingSet];
  }

  /** In-progress mission indices in pickup order */
  inProgress(): number[] {
    return [...this.inProgressSet];
  }

  /** Completed mission indices in completion order */
  completed(): number[] {
    return [...this.completedSet];
  }

  hasPending(): boolean {
    return this.pendingSet.size > 0;
  }

  hasInProgress(): boolean {
    return this.inProgressSet.size > 0;
  }

  isFinished(): boolean {
    return !this.hasPending() && !this.hasInProgress();
  }

  nextDropoff(index: number): string | undefined {
    return this.mission(index).dropoffs[this.cursorOf(index)];
  }

  currentDropoffType(index: number): string {
    const mission = this.mission(index);
    return mission.dropoffCargoTypes[this.cursorOf(index)] ?? mission.cargoType;
  }

  currentDropoffAmount(index: number): number {
    const mission = this.mission(index);
    return mission.dropoffCargoAmounts[this.cursorOf(index)] ?? mission.cargoScu / mission.dropoffs.length;
  }

  /**
   * Pending → InProgress. The whole mission total comes aboard under the
   * mission-level cargo type. Capacity is the caller's concern.
   */
  pickUp(index: number): CargoMovement {
    const mission = this.mission(index);
    this.requireStatus(index, MissionStatus.Pending, 'pick up');

    this.pendingSet.delete(index);
    this.inProgressSet.add(index);
    this.statuses[index] = MissionStatus.InProgress;

    return {
      missionId: mission.id,
      location: mission.pickup,
      cargoType: mission.cargoType,
      amount: mission.cargoScu,
    };
  }

  /**
   * Deliver the mission's next dropoff and advance its cursor. The mission
   * becomes Completed when the cursor reaches the end of its dropoffs.
   */
  dropOff(index: number): DropoffMovement {
    const mission = this.mission(index);
    this.requireStatus(index, MissionStatus.InProgress, 'drop off');

    const movement: DropoffMovement = {
      missionId: mission.id,
      location: mission.dropoffs[this.cursors[index]],
      cargoType: this.currentDropoffType(index),
      amount: this.currentDropoffAmount(index),
      completed: false,
    };

    this.cursors[index] += 1;
    if (this.cursors[index] >= mission.dropoffs.length) {
      this.inProgressSet.delete(index);
      this.completedSet.add(index);
      this.statuses[index] = MissionStatus.Completed;
      movement.completed = true;
    }

    return movement;
  }

  private requireStatus(index: number, expected: MissionStatus, attempted: string): void {
    const status = this.statuses[index];
    if (status !== expected) {
      throw new MissionStateError(this.missions[index].id, status, attempted);
    }
  }
}
