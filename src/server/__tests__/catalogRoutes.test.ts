import request from 'supertest';
import { err } from 'neverthrow';
import app from '../app';
import { locationService } from '../services/locationService';
import { RouteError, RouteErrorType } from '../../shared/types/RouteTypes';
import { Location, SimplifiedLocation } from '../../shared/types/LocationTypes';

const unavailable: RouteError = {
  type: RouteErrorType.LocationDataUnavailable,
  message: 'Location data not loaded',
};

describe('Catalog routes', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('GET /api/locations', () => {
    it('should return every location with map coordinates', async () => {
      const response = await request(app).get('/api/locations');

      expect(response.status).toBe(200);
      expect(response.body).toHaveLength(20);
      expect(response.body).toContainEqual({ name: 'Port Olisar', type: 'station', coordinates: [0, 0.08] });
    });

    it('should return 503 when location data cannot be generated', async () => {
      jest
        .spyOn(locationService, 'getSimplifiedLocations')
        .mockReturnValue(err<SimplifiedLocation[], RouteError>(unavailable));

      const response = await request(app).get('/api/locations');

      expect(response.status).toBe(503);
      expect(response.body.error).toBe('LOCATION_DATA_UNAVAILABLE');
      expect(response.body.message).toBe('Failed to generate location data');
      expect(response.body.details).toBe('Location data not loaded');
    });
  });

  describe('GET /api/ships', () => {
    it('should list ships with their capacities', async () => {
      const response = await request(app).get('/api/ships');

      expect(response.status).toBe(200);
      expect(response.body).toHaveLength(5);
      expect(response.body[0]).toEqual({ id: 'taurus', name: 'Constellation Taurus', cargo_capacity: 168 });
    });
  });

  describe('GET /api/cargo-types', () => {
    it('should return the known commodities and the default type', async () => {
      const response = await request(app).get('/api/cargo-types');

      expect(response.status).toBe(200);
      expect(response.body.default).toBe('General');
      expect(response.body.cargo_types).toHaveLength(31);
      expect(response.body.cargo_types[0]).toBe('Agricium');
    });
  });

  describe('GET /api/health', () => {
    it('should report healthy with the location count', async () => {
      const response = await request(app).get('/api/health');

      expect(response.status).toBe(200);
      expect(response.body.status).toBe('healthy');
      expect(response.body.locations).toBe(20);
    });

    it('should report degraded without location data', async () => {
      jest.spyOn(locationService, 'getLocations').mockReturnValue(err<Location[], RouteError>(unavailable));

      const response = await request(app).get('/api/health');

      expect(response.status).toBe(503);
      expect(response.body.status).toBe('degraded');
      expect(response.body.locations).toBeNull();
    });
  });
});
