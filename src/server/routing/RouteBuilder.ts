/**
 * Greedy single-vehicle route construction.
 *
 * Each step first exhausts free actions at the current location (dropoffs
 * before pickups), then scores every feasible pickup and dropoff and travels
 * to the best one. Stops when every mission is complete, or reports the
 * partial route when nothing remaining fits in the hold.
 *
 * Ties: the first candidate with the highest score wins, scanning pending
 * missions in request order and then in-progress missions in pickup order.
 */

import { err, ok, Result } from 'neverthrow';
import { LocationGraph } from '../../shared/services/LocationGraph';
import { CargoMission } from '../../shared/types/MissionTypes';
import {
  CargoManifest,
  PartialRoute,
  RouteError,
  RouteErrorType,
  RouteResult,
} from '../../shared/types/RouteTypes';
import { MissionLedger } from './MissionLedger';
import { OptionScorer } from './OptionScorer';
import { RouteLogger, RouteLogLevel } from './RouteLogger';
import { RouteActionType, RouteCandidate, ScoredCandidate, ScoringState } from './types';

/** Cargo quantities closer to zero than this are treated as empty */
export const CARGO_EPSILON = 1e-9;

export interface RouteBuilderOptions {
  /** Upper bound on executed actions; unbounded when omitted */
  maxActions?: number;
  logger?: RouteLogger;
}

/** Mutable working set of one computation. Never shared. */
interface RouteState {
  location: string;
  cargo: number;
  manifest: Map<string, number>;
  route: string[];
  actionLog: string[];
  cargoTrace: number[];
  manifestTrace: CargoManifest[];
  totalDistance: number;
  totalPayout: number;
}

function snapToZero(value: number): number {
  return Math.abs(value) < CARGO_EPSILON ? 0 : value;
}

function manifestSnapshot(manifest: Map<string, number>): CargoManifest {
  return Object.fromEntries(manifest);
}

export class RouteBuilder {
  private readonly graph: LocationGraph;
  private readonly capacity: number;
  private readonly maxActions?: number;
  private readonly logger: RouteLogger;

  constructor(graph: LocationGraph, capacity: number, options: RouteBuilderOptions = {}) {
    if (!(capacity > 0)) {
      throw new RangeError(`Ship capacity must be positive, got ${capacity}`);
    }
    this.graph = graph;
    this.capacity = capacity;
    this.maxActions = options.maxActions;
    this.logger = options.logger ?? new RouteLogger('RouteBuilder');
  }

  /**
   * Build a route serving every mission from `startLocation`.
   * All mission and start locations must exist in the graph.
   */
  build(missions: ReadonlyArray<CargoMission>, startLocation: string): Result<RouteResult, RouteError> {
    if (missions.length === 0) {
      return err({ type: RouteErrorType.NoMissions, message: 'No missions provided' });
    }

    const ledger = new MissionLedger(missions);
    const scorer = new OptionScorer(this.graph, this.capacity, missions);
    const state: RouteState = {
      location: startLocation,
      cargo: 0,
      manifest: new Map(),
      route: [startLocation],
      actionLog: [],
      cargoTrace: [0],
      manifestTrace: [{}],
      totalDistance: 0,
      totalPayout: 0,
    };

    let actions = 0;
    while (!ledger.isFinished()) {
      if (this.maxActions !== undefined && actions >= this.maxActions) {
        this.logger.warn('Action limit reached before route completed', { maxActions: this.maxActions });
        return err({
          type: RouteErrorType.StepLimitExceeded,
          message: `Route not complete after ${this.maxActions} actions`,
          maxActions: this.maxActions,
          ...this.partialRoute(ledger, state),
        });
      }

      const local = this.findLocalAction(ledger, state);
      if (local) {
        this.execute(local, ledger, state, 0);
        actions++;
        continue;
      }

      const best = this.selectBestCandidate(ledger, scorer, state);
      if (!best) {
        this.logger.info('No remaining mission fits in the hold', {
          capacity: this.capacity,
          cargo: state.cargo,
          pending: ledger.pending().length,
        });
        return err({
          type: RouteErrorType.Infeasible,
          message: 'Cannot complete all missions with the given ship capacity',
          ...this.partialRoute(ledger, state),
        });
      }

      this.execute(best, ledger, state, this.graph.distance(state.location, best.location));
      actions++;
    }

    this.logger.info('Route complete', {
      missions: missions.length,
      stops: state.route.length,
      totalDistance: state.totalDistance,
      totalPayout: state.totalPayout,
    });

    return ok({
      route: state.route,
      missionOrder: state.actionLog,
      cargoAtEachStep: state.cargoTrace,
      cargoTypesAtSteps: state.manifestTrace,
      totalDistance: state.totalDistance,
      totalPayout: state.totalPayout,
      completedMissions: ledger.completed().map((index) => ledger.mission(index).id),
    });
  }

  /**
   * A zero-distance action at the current location. Dropoffs come first so
   * capacity is freed before anything else is loaded.
   */
  private findLocalAction(ledger: MissionLedger, state: RouteState): RouteCandidate | undefined {
    for (const index of ledger.inProgress()) {
      if (ledger.nextDropoff(index) === state.location) {
        return { action: RouteActionType.Dropoff, missionIndex: index, location: state.location };
      }
    }

    for (const index of ledger.pending()) {
      const mission = ledger.mission(index);
      if (mission.pickup === state.location && state.cargo + mission.cargoScu <= this.capacity) {
        return { action: RouteActionType.Pickup, missionIndex: index, location: state.location };
      }
    }

    return undefined;
  }

  private selectBestCandidate(
    ledger: MissionLedger,
    scorer: OptionScorer,
    state: RouteState,
  ): ScoredCandidate | undefined {
    const scoringState = this.scoringState(ledger, state);
    const candidates: ScoredCandidate[] = [];

    for (const index of ledger.pending()) {
      if (scorer.fits(index, state.cargo)) {
        candidates.push(scorer.scorePickup(index, scoringState));
      }
    }

    for (const index of ledger.inProgress()) {
      const dropoff = ledger.nextDropoff(index);
      if (dropoff !== undefined) {
        candidates.push(scorer.scoreDropoff(index, dropoff, ledger.currentDropoffAmount(index), scoringState));
      }
    }

    let best: ScoredCandidate | undefined;
    for (const candidate of candidates) {
      if (this.logger.isEnabled(RouteLogLevel.TRACE)) {
        this.logger.trace('Scored candidate', {
          action: candidate.action,
          mission: ledger.mission(candidate.missionIndex).id,
          location: candidate.location,
          score: candidate.score,
          breakdown: candidate.breakdown,
        });
      }
      if (!best || candidate.score > best.score) {
        best = candidate;
      }
    }

    return best;
  }

  private scoringState(ledger: MissionLedger, state: RouteState): ScoringState {
    const pendingPickups = new Set(ledger.pending().map((index) => ledger.mission(index).pickup));
    const nextDropoffs = new Set<string>();
    for (const index of ledger.inProgress()) {
      const dropoff = ledger.nextDropoff(index);
      if (dropoff !== undefined) nextDropoffs.add(dropoff);
    }
    return {
      currentLocation: state.location,
      currentCargo: state.cargo,
      pendingPickups,
      nextDropoffs,
    };
  }

  private execute(candidate: RouteCandidate, ledger: MissionLedger, state: RouteState, travelled: number): void {
    if (candidate.action === RouteActionType.Pickup) {
      const movement = ledger.pickUp(candidate.missionIndex);
      state.cargo = snapToZero(state.cargo + movement.amount);
      state.manifest.set(movement.cargoType, (state.manifest.get(movement.cargoType) ?? 0) + movement.amount);
      state.actionLog.push(`Pickup ${movement.missionId} - ${movement.cargoType}`);
    } else {
      const movement = ledger.dropOff(candidate.missionIndex);
      state.cargo = snapToZero(Math.max(0, state.cargo - movement.amount));

      const aboard = state.manifest.get(movement.cargoType);
      if (aboard !== undefined) {
        const left = snapToZero(Math.max(0, aboard - movement.amount));
        if (left <= 0) {
          state.manifest.delete(movement.cargoType);
        } else {
          state.manifest.set(movement.cargoType, left);
        }
      }

      state.actionLog.push(`Dropoff ${movement.missionId} at ${movement.location} - ${movement.cargoType}`);
      if (movement.completed) {
        state.totalPayout += ledger.mission(candidate.missionIndex).payout;
      }
    }

    state.location = candidate.location;
    state.totalDistance += travelled;
    state.route.push(candidate.location);
    state.cargoTrace.push(state.cargo);
    state.manifestTrace.push(manifestSnapshot(state.manifest));

    this.logger.debug(state.actionLog[state.actionLog.length - 1], {
      travelled,
      cargo: state.cargo,
    });
  }

  private partialRoute(ledger: MissionLedger, state: RouteState): PartialRoute {
    return {
      routeSoFar: [...state.route],
      completedMissions: ledger.completed().map((index) => ledger.mission(index).id),
      remainingMissions: [...ledger.pending(), ...ledger.inProgress()].map((index) => ledger.mission(index)),
    };
  }
}
