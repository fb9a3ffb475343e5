/**
 * Provides the location catalog and the distance data
 * derived from it. Artifacts are built once and shared read-only by every
 * route computation; when they are missing the service regenerates them
 * once before reporting the data as unavailable.
 */

import { err, ok, Result } from 'neverthrow';
import { z } from 'zod';
import { buildDistanceIndex, simplifyLocations } from '../../shared/services/DistanceIndexBuilder';
import { LocationGraph } from '../../shared/services/LocationGraph';
import {
  DistanceIndex,
  Location,
  LocationCategory,
  SimplifiedLocation,
} from '../../shared/types/LocationTypes';
import { RouteError, RouteErrorType } from '../../shared/types/RouteTypes';
import { readCatalogFile } from '../config/catalogConfig';
import { RouteLogger } from '../routing/RouteLogger';

export const LOCATION_CATALOG_FILE = 'locations.json';

const locationSchema = z.object({
  name: z.string().min(1),
  type: z.nativeEnum(LocationCategory),
  parent: z.string().min(1).optional(),
  x: z.number().finite(),
  y: z.number().finite(),
  z: z.number().finite(),
});

const locationCatalogSchema = z.object({
  system: z.string(),
  version: z.number().int(),
  locations: z.array(locationSchema).min(1),
});

export interface LocationArtifacts {
  locations: Location[];
  simplified: SimplifiedLocation[];
  index: DistanceIndex;
  graph: LocationGraph;
}

/** Produces the raw location list; throws when the catalog cannot be read */
export type LocationSource = () => Location[];

export function loadLocationCatalog(): Location[] {
  return locationCatalogSchema.parse(readCatalogFile(LOCATION_CATALOG_FILE)).locations;
}

export class LocationService {
  private readonly source: LocationSource;
  private readonly logger = new RouteLogger('LocationService');
  private artifacts: LocationArtifacts | null = null;

  constructor(source: LocationSource = loadLocationCatalog) {
    this.source = source;
  }

  /**
   * Rebuild every artifact from the source. On failure the previous
   * artifacts are dropped and null is returned.
   */
  regenerate(): LocationArtifacts | null {
    try {
      const locations = this.source();
      const index = buildDistanceIndex(locations);
      this.artifacts = {
        locations,
        simplified: simplifyLocations(locations),
        index,
        graph: new LocationGraph(index),
      };
      this.logger.info('Location data generated', { locations: locations.length });
    } catch (error) {
      this.artifacts = null;
      this.logger.error('Failed to generate location data', {
        error: error instanceof Error ? error.message : String(error),
      });
    }
    return this.artifacts;
  }

  getArtifacts(): Result<LocationArtifacts, RouteError> {
    const artifacts = this.artifacts ?? this.regenerate();
    if (!artifacts) {
      return err({
        type: RouteErrorType.LocationDataUnavailable,
        message: 'Location data not loaded',
      });
    }
    return ok(artifacts);
  }

  getLocationGraph(): Result<LocationGraph, RouteError> {
    return this.getArtifacts().map((artifacts) => artifacts.graph);
  }

  getLocations(): Result<Location[], RouteError> {
    return this.getArtifacts().map((artifacts) => artifacts.locations);
  }

  getSimplifiedLocations(): Result<SimplifiedLocation[], RouteError> {
    return this.getArtifacts().map((artifacts) => artifacts.simplified);
  }

  /** Drop cached artifacts; the next read regenerates them */
  invalidate(): void {
    this.artifacts = null;
  }
}

export const locationService = new LocationService();
