export enum LocationCategory {
  Planet = 'planet',
  Moon = 'moon',
  Station = 'station',
  LandingZone = 'landing_zone',
  Lagrange = 'lagrange',
}

/** A named point in the star system. Immutable once loaded. */
export interface Location {
  readonly name: string;
  readonly type: LocationCategory;
  readonly parent?: string;
  readonly x: number;
  readonly y: number;
  readonly z: number;
}

/**
 * Dense distance table keyed by location name.
 * `matrix[indices.get(a)][indices.get(b)]` is the distance from a to b.
 */
export interface DistanceIndex {
  readonly names: ReadonlyArray<string>;
  readonly indices: ReadonlyMap<string, number>;
  readonly matrix: ReadonlyArray<ReadonlyArray<number>>;
}

/** 2-D projection used by map consumers, coordinates in millions of km */
export interface SimplifiedLocation {
  name: string;
  type: LocationCategory;
  coordinates: [number, number];
}
