/**
 * Derives routing artifacts from a location catalog:
 * the dense 3-D Euclidean distance matrix and the 2-D map projection.
 */

import { DistanceIndex, Location, SimplifiedLocation } from '../types/LocationTypes';

/** Catalog coordinates are km; the map projection is in millions of km */
const MAP_SCALE = 1_000_000;

export class DuplicateLocationError extends Error {
  public readonly code = 'DUPLICATE_LOCATION';

  constructor(public readonly locationName: string) {
    super(`Location catalog contains ${locationName} more than once`);
    this.name = 'DuplicateLocationError';
  }
}

export function euclideanDistance(a: Location, b: Location): number {
  return Math.sqrt((a.x - b.x) ** 2 + (a.y - b.y) ** 2 + (a.z - b.z) ** 2);
}

export function buildDistanceIndex(locations: ReadonlyArray<Location>): DistanceIndex {
  const names: string[] = [];
  const indices = new Map<string, number>();

  for (const location of locations) {
    if (indices.has(location.name)) {
      throw new DuplicateLocationError(location.name);
    }
    indices.set(location.name, names.length);
    names.push(location.name);
  }

  const matrix = locations.map((from, i) =>
    locations.map((to, j) => (i === j ? 0 : euclideanDistance(from, to))),
  );

  return { names, indices, matrix };
}

export function simplifyLocations(locations: ReadonlyArray<Location>): SimplifiedLocation[] {
  return locations.map((location) => ({
    name: location.name,
    type: location.type,
    coordinates: [location.x / MAP_SCALE, location.z / MAP_SCALE],
  }));
}
