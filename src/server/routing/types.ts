export enum RouteActionType {
  Pickup = 'Pickup',
  Dropoff = 'Dropoff',
}

/** One executable step: pick a mission up, or deliver its next dropoff */
export interface RouteCandidate {
  action: RouteActionType;
  missionIndex: number;
  /** Where the action happens */
  location: string;
}

export interface ScoreBreakdown {
  distance: number;
  efficiency: number;
  cargo: number;
  /** Co-location bonus: dropoff waiting at a pickup target, or pickup at a dropoff target */
  colocation: number;
  capacity: number;
  urgency: number;
}

export interface ScoredCandidate extends RouteCandidate {
  score: number;
  breakdown: ScoreBreakdown;
}

/** The part of the route state the scorer reads */
export interface ScoringState {
  currentLocation: string;
  currentCargo: number;
  /** Pickup locations of every pending mission */
  pendingPickups: ReadonlySet<string>;
  /** Next dropoff location of every in-progress mission */
  nextDropoffs: ReadonlySet<string>;
}
