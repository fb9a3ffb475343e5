import { CargoMission } from './MissionTypes';

export type CargoManifest = Record<string, number>;

export interface RouteResult {
  route: string[];
  missionOrder: string[];
  cargoAtEachStep: number[];
  cargoTypesAtSteps: CargoManifest[];
  totalDistance: number;
  totalPayout: number;
  completedMissions: string[];
}

export enum RouteErrorType {
  NoMissions = 'NoMissions',
  LocationDataUnavailable = 'LocationDataUnavailable',
  InvalidLocations = 'InvalidLocations',
  Infeasible = 'Infeasible',
  StepLimitExceeded = 'StepLimitExceeded',
}

/** Progress captured when a computation stops before every mission is done */
export interface PartialRoute {
  routeSoFar: string[];
  completedMissions: string[];
  remainingMissions: CargoMission[];
}

export type RouteError =
  | { type: RouteErrorType.NoMissions; message: string }
  | { type: RouteErrorType.LocationDataUnavailable; message: string }
  | {
      type: RouteErrorType.InvalidLocations;
      message: string;
      names: string[];
      validLocations: string[];
    }
  | ({ type: RouteErrorType.Infeasible; message: string } & PartialRoute)
  | ({ type: RouteErrorType.StepLimitExceeded; message: string; maxActions: number } & PartialRoute);
