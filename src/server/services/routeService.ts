/**
 * Entry point from the request layer into route building.
 *
 * Turns loosely-typed mission input into normalised missions, checks every
 * location against the distance data and runs the RouteBuilder. All failures
 * come back as RouteError values.
 */

import { err, Result } from 'neverthrow';
import { CargoMission, MissionDescriptor } from '../../shared/types/MissionTypes';
import { RouteError, RouteErrorType, RouteResult } from '../../shared/types/RouteTypes';
import { getRouteMaxActions } from '../config/serverConfig';
import { normalizeMission } from '../routing/MissionLedger';
import { RouteBuilder } from '../routing/RouteBuilder';
import { RouteLogger } from '../routing/RouteLogger';
import { effectiveMissionId, MissionInput } from '../validation/optimizeRequest';
import { LocationService, locationService } from './locationService';

const logger = new RouteLogger('RouteService');

export interface ComputeRouteOptions {
  requestId?: string;
  /** Defaults to ROUTE_MAX_ACTIONS */
  maxActions?: number;
  locations?: LocationService;
}

/**
 * Read a non-negative quantity from a number or numeric string.
 * Anything else (including negatives and blanks) is undefined.
 */
export function parseQuantity(value: unknown): number | undefined {
  let parsed: number;
  if (typeof value === 'number') {
    parsed = value;
  } else if (typeof value === 'string' && value.trim() !== '') {
    parsed = Number(value);
  } else {
    return undefined;
  }
  return Number.isFinite(parsed) && parsed >= 0 ? parsed : undefined;
}

function parseDropoffAmounts(mission: MissionInput, missionId: string): number[] {
  const raw = mission.dropoff_cargo_amounts ?? [];
  const amounts = raw.map(parseQuantity);
  if (amounts.some((amount) => amount === undefined)) {
    logger.warn('Could not read dropoff cargo amounts, splitting evenly', { missionId, amounts: raw });
    return [];
  }
  return amounts.filter((amount): amount is number => amount !== undefined);
}

/**
 * Map one request mission to a descriptor. A missing or malformed cargo_scu
 * becomes the sum of the explicit dropoff amounts.
 */
export function toMissionDescriptor(mission: MissionInput, position: number): MissionDescriptor {
  const id = effectiveMissionId(mission, position);
  const dropoffs = mission.dropoffs ?? (mission.dropoff !== undefined ? [mission.dropoff] : []);
  const dropoffCargoAmounts = parseDropoffAmounts(mission, id);

  let cargoScu = parseQuantity(mission.cargo_scu);
  if (cargoScu === undefined) {
    cargoScu = dropoffCargoAmounts.reduce((sum, amount) => sum + amount, 0);
    logger.warn('Using calculated cargo_scu', { missionId: id, cargoScu });
  }

  const payout = parseQuantity(mission.payout);
  if (payout === undefined && mission.payout !== undefined && mission.payout !== null) {
    logger.warn('Could not read payout, using 0', { missionId: id, payout: mission.payout });
  }

  return {
    id,
    pickup: mission.pickup,
    dropoffs,
    cargoScu,
    cargoType: mission.cargo_type,
    dropoffCargoTypes: mission.dropoff_cargo_types ?? undefined,
    dropoffCargoAmounts,
    payout: payout ?? 0,
    description: mission.description,
  };
}

function referencedLocations(missions: ReadonlyArray<CargoMission>, startLocation: string): string[] {
  const names = [startLocation];
  for (const mission of missions) {
    names.push(mission.pickup, ...mission.dropoffs);
  }
  return names;
}

/**
 * Compute a route for the given missions from `startLocation` with a hold of
 * `shipCapacity` SCU.
 */
export function computeRoute(
  missions: MissionInput[],
  startLocation: string,
  shipCapacity: number,
  options: ComputeRouteOptions = {},
): Result<RouteResult, RouteError> {
  const routeLogger = options.requestId ? logger.withRequest(options.requestId) : logger;

  if (missions.length === 0) {
    return err({ type: RouteErrorType.NoMissions, message: 'No missions provided' });
  }

  const graphResult = (options.locations ?? locationService).getLocationGraph();
  if (graphResult.isErr()) {
    return err(graphResult.error);
  }
  const graph = graphResult.value;

  const cargoMissions = missions.map((mission, position) => normalizeMission(toMissionDescriptor(mission, position)));

  const unknown = graph.findUnknown(referencedLocations(cargoMissions, startLocation));
  if (unknown.length > 0) {
    routeLogger.info('Rejected unknown locations', { names: unknown });
    return err({
      type: RouteErrorType.InvalidLocations,
      message: `Invalid locations in request: ${unknown.join(', ')}`,
      names: unknown,
      validLocations: graph.locationNames(),
    });
  }

  routeLogger.debug('Computing route', {
    missions: cargoMissions.length,
    startLocation,
    shipCapacity,
  });

  const builder = new RouteBuilder(graph, shipCapacity, {
    maxActions: options.maxActions ?? getRouteMaxActions(),
    logger: routeLogger.forContext('RouteBuilder'),
  });
  return builder.build(cargoMissions, startLocation);
}
