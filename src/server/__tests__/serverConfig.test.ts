import path from 'path';
import {
  getConfigurationDir,
  getCorsOrigins,
  getPort,
  getRouteMaxActions,
} from '../config/serverConfig';

describe('serverConfig', () => {
  const originalEnv = { ...process.env };

  afterEach(() => {
    process.env = { ...originalEnv };
  });

  it('should default the port to 3001', () => {
    delete process.env.PORT;
    expect(getPort()).toBe(3001);

    process.env.PORT = 'not-a-port';
    expect(getPort()).toBe(3001);

    process.env.PORT = '8080';
    expect(getPort()).toBe(8080);
  });

  it('should split ALLOWED_ORIGINS', () => {
    delete process.env.ALLOWED_ORIGINS;
    expect(getCorsOrigins()).toBeUndefined();

    process.env.ALLOWED_ORIGINS = 'http://localhost:3000, https://planner.test ,';
    expect(getCorsOrigins()).toEqual(['http://localhost:3000', 'https://planner.test']);
  });

  it('should accept only positive action limits', () => {
    delete process.env.ROUTE_MAX_ACTIONS;
    expect(getRouteMaxActions()).toBeUndefined();

    process.env.ROUTE_MAX_ACTIONS = '0';
    expect(getRouteMaxActions()).toBeUndefined();

    process.env.ROUTE_MAX_ACTIONS = 'many';
    expect(getRouteMaxActions()).toBeUndefined();

    process.env.ROUTE_MAX_ACTIONS = '250';
    expect(getRouteMaxActions()).toBe(250);
  });

  it('should resolve the configuration directory', () => {
    process.env.CONFIGURATION_DIR = 'custom/config';
    expect(getConfigurationDir()).toBe(path.resolve('custom/config'));

    delete process.env.CONFIGURATION_DIR;
    expect(path.basename(getConfigurationDir())).toBe('configuration');
  });
});
