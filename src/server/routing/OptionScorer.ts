/**
 * Ranks the next route action from the current state.
 *
 * Scoring formula per candidate at target T from current location C:
 *   pickup:  -d(C,T) + eff*10000 + (1 - load)*2000 + dropoffAtT*5000 + fits*3000
 *   dropoff: -d(C,T) + eff*10000 + load*3000 + (qty/capacity)*4000 + pickupAtT*3000
 * where load = currentCargo / capacity and eff is the mission's payout per
 * unit of its own pickup→dropoff distances. Weights are fixed; changing them
 * changes every computed route.
 */

import { LocationGraph } from '../../shared/services/LocationGraph';
import { CargoMission } from '../../shared/types/MissionTypes';
import { RouteActionType, ScoreBreakdown, ScoredCandidate, ScoringState } from './types';

export const ScoringWeights = {
  EFFICIENCY_SCALE: 10000,
  PICKUP_CARGO_WEIGHT: 2000,
  PICKUP_DROPOFF_BONUS: 5000,
  PICKUP_CAPACITY_WEIGHT: 3000,
  DROPOFF_CARGO_WEIGHT: 3000,
  DROPOFF_URGENCY_WEIGHT: 4000,
  DROPOFF_PICKUP_BONUS: 3000,
} as const;

/**
 * Payout per distance unit over the mission's own pickup→dropoff legs.
 * The denominator never drops below 1.
 */
export function missionEfficiency(mission: CargoMission, graph: LocationGraph): number {
  const span = mission.dropoffs.reduce((sum, dropoff) => sum + graph.distance(mission.pickup, dropoff), 0);
  return mission.payout / Math.max(1, span);
}

function sumBreakdown(breakdown: ScoreBreakdown): number {
  return (
    breakdown.distance +
    breakdown.efficiency +
    breakdown.cargo +
    breakdown.colocation +
    breakdown.capacity +
    breakdown.urgency
  );
}

export class OptionScorer {
  private readonly graph: LocationGraph;
  private readonly capacity: number;
  private readonly missions: ReadonlyArray<CargoMission>;
  private readonly efficiencies: number[];

  constructor(graph: LocationGraph, capacity: number, missions: ReadonlyArray<CargoMission>) {
    this.graph = graph;
    this.capacity = capacity;
    this.missions = missions;
    this.efficiencies = missions.map((mission) => missionEfficiency(mission, graph));
  }

  efficiencyOf(missionIndex: number): number {
    return this.efficiencies[missionIndex];
  }

  fits(missionIndex: number, currentCargo: number): boolean {
    return currentCargo + this.missions[missionIndex].cargoScu <= this.capacity;
  }

  scorePickup(missionIndex: number, state: ScoringState): ScoredCandidate {
    const mission = this.missions[missionIndex];
    const target = mission.pickup;

    const breakdown: ScoreBreakdown = {
      distance: this.distanceScore(state.currentLocation, target),
      efficiency: this.efficiencies[missionIndex] * ScoringWeights.EFFICIENCY_SCALE,
      cargo: (1 - state.currentCargo / this.capacity) * ScoringWeights.PICKUP_CARGO_WEIGHT,
      colocation: state.nextDropoffs.has(target) ? ScoringWeights.PICKUP_DROPOFF_BONUS : 0,
      capacity: this.fits(missionIndex, state.currentCargo) ? ScoringWeights.PICKUP_CAPACITY_WEIGHT : 0,
      urgency: 0,
    };

    return {
      action: RouteActionType.Pickup,
      missionIndex,
      location: target,
      score: sumBreakdown(breakdown),
      breakdown,
    };
  }

  /**
   * Score delivering the next dropoff of an in-progress mission.
   * @param dropoffLocation the mission's next dropoff
   * @param dropoffAmount cargo unloaded there
   */
  scoreDropoff(
    missionIndex: number,
    dropoffLocation: string,
    dropoffAmount: number,
    state: ScoringState,
  ): ScoredCandidate {
    const breakdown: ScoreBreakdown = {
      distance: this.distanceScore(state.currentLocation, dropoffLocation),
      efficiency: this.efficiencies[missionIndex] * ScoringWeights.EFFICIENCY_SCALE,
      cargo: (state.currentCargo / this.capacity) * ScoringWeights.DROPOFF_CARGO_WEIGHT,
      colocation: state.pendingPickups.has(dropoffLocation) ? ScoringWeights.DROPOFF_PICKUP_BONUS : 0,
      capacity: 0,
      urgency: (dropoffAmount / this.capacity) * ScoringWeights.DROPOFF_URGENCY_WEIGHT,
    };

    return {
      action: RouteActionType.Dropoff,
      missionIndex,
      location: dropoffLocation,
      score: sumBreakdown(breakdown),
      breakdown,
    };
  }

  private distanceScore(from: string, to: string): number {
    const distance = this.graph.distance(from, to);
    return distance === 0 ? 0 : -distance;
  }
}
