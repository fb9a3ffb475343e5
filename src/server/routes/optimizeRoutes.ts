import express, { Request, Response, NextFunction } from 'express';
import { CargoMission } from '../../shared/types/MissionTypes';
import { PartialRoute, RouteError, RouteErrorType, RouteResult } from '../../shared/types/RouteTypes';
import { ApiError } from '../middleware/errorHandler';
import { requestLogger } from '../middleware/requestLogger';
import { computeRoute } from '../services/routeService';
import { ResolvedShip, ShipService } from '../services/shipService';
import { optimizeRequestSchema } from '../validation/optimizeRequest';

const router = express.Router();

function toWireMission(mission: CargoMission) {
  return {
    id: mission.id,
    pickup: mission.pickup,
    dropoffs: [...mission.dropoffs],
    cargo_scu: mission.cargoScu,
    cargo_type: mission.cargoType,
    dropoff_cargo_types: [...mission.dropoffCargoTypes],
    dropoff_cargo_amounts: [...mission.dropoffCargoAmounts],
    payout: mission.payout,
    description: mission.description
  };
}

export function toWireResult(result: RouteResult, ship: ResolvedShip) {
  return {
    route: result.route,
    mission_order: result.missionOrder,
    cargo_at_each_step: result.cargoAtEachStep,
    cargo_types_at_steps: result.cargoTypesAtSteps,
    total_distance: result.totalDistance,
    total_payout: result.totalPayout,
    completed_missions: result.completedMissions,
    ship_id: ship.shipId,
    ship_capacity: ship.capacity
  };
}

function toWirePartial(partial: PartialRoute) {
  return {
    route_so_far: partial.routeSoFar,
    completed_missions: partial.completedMissions,
    remaining_missions: partial.remainingMissions.map(toWireMission)
  };
}

/** Map a route computation failure to the HTTP error raised for it */
export function toApiError(error: RouteError): ApiError {
  switch (error.type) {
    case RouteErrorType.NoMissions:
      return new ApiError(error.message, 'NO_MISSIONS', 400);
    case RouteErrorType.InvalidLocations:
      return new ApiError(error.message, 'INVALID_LOCATIONS', 400, error.names, {
        names: error.names,
        valid_locations: error.validLocations
      });
    case RouteErrorType.Infeasible:
      return new ApiError(error.message, 'INFEASIBLE', 422, undefined, toWirePartial(error));
    case RouteErrorType.StepLimitExceeded:
      return new ApiError(error.message, 'STEP_LIMIT_EXCEEDED', 422, undefined, {
        max_actions: error.maxActions,
        ...toWirePartial(error)
      });
    case RouteErrorType.LocationDataUnavailable:
      return new ApiError(error.message, 'LOCATION_DATA_UNAVAILABLE', 503);
  }
}

// Optimize a cargo route for the given missions
const optimizeRoute = (req: Request, res: Response, next: NextFunction): void => {
  const parsed = optimizeRequestSchema.safeParse(req.body ?? {});
  if (!parsed.success) {
    next(parsed.error);
    return;
  }

  const { missions, start_location: startLocation, ship_id: shipId } = parsed.data;
  const ship = ShipService.getInstance().resolve(shipId);

  requestLogger.logApiOperation('optimize', {
    missions: missions.length,
    startLocation,
    shipId: ship.shipId,
    capacity: ship.capacity
  }, req.requestId);

  const result = computeRoute(missions, startLocation, ship.capacity, { requestId: req.requestId });
  result.match(
    (route) => {
      res.json(toWireResult(route, ship));
    },
    (error) => next(toApiError(error))
  );
};

router.post('/optimize', optimizeRoute);

export default router;
