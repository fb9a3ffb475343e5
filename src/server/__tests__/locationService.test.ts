import { LocationService, loadLocationCatalog } from '../services/locationService';
import { RouteErrorType } from '../../shared/types/RouteTypes';
import { makeLineLocations } from './routing/helpers/testFixtures';

describe('LocationService', () => {
  it('should load and validate the bundled catalog', () => {
    const locations = loadLocationCatalog();

    expect(locations).toHaveLength(20);
    expect(locations.find((location) => location.name === 'Lorville')).toEqual({
      name: 'Lorville',
      type: 'landing_zone',
      parent: 'Hurston',
      x: -16540615,
      y: 5000,
      z: -1642349,
    });
  });

  it('should build artifacts lazily and only once', () => {
    const source = jest.fn(makeLineLocations);
    const service = new LocationService(source);

    expect(source).not.toHaveBeenCalled();
    const graph = service.getLocationGraph()._unsafeUnwrap();
    service.getSimplifiedLocations();
    service.getLocations();

    expect(source).toHaveBeenCalledTimes(1);
    expect(graph.distance('A', 'D')).toBe(30);
  });

  it('should rebuild after invalidate', () => {
    const source = jest.fn(makeLineLocations);
    const service = new LocationService(source);

    service.getLocations();
    service.invalidate();
    service.getLocations();

    expect(source).toHaveBeenCalledTimes(2);
  });

  it('should report unavailable data after a failed rebuild', () => {
    jest.spyOn(console, 'error').mockImplementation();
    const service = new LocationService(() => [...makeLineLocations(), ...makeLineLocations()]);

    expect(service.regenerate()).toBeNull();
    expect(service.getLocations()._unsafeUnwrapErr().type).toBe(RouteErrorType.LocationDataUnavailable);
    expect(console.error).toHaveBeenCalledWith(
      '[ROUTE:ERROR] [LocationService] Failed to generate location data {"error":"Location catalog contains A more than once"}',
    );
    jest.restoreAllMocks();
  });
});
