import dotenv from 'dotenv';

// Load environment variables before anything reads them
dotenv.config();

import app from './app';
import { getLogLevelName, getPort } from './config/serverConfig';
import { locationService } from './services/locationService';
import { parseRouteLogLevel, RouteLogger, setGlobalRouteLogLevel } from './routing/RouteLogger';

const logger = new RouteLogger('Server');

const level = parseRouteLogLevel(getLogLevelName());
if (level !== undefined) {
  setGlobalRouteLogLevel(level);
} else if (getLogLevelName()) {
  logger.warn('Ignoring unknown LOG_LEVEL', { value: getLogLevelName() });
}

// Always build location data on startup so the first request is served from cache
logger.info('Initializing location data...');
if (!locationService.regenerate()) {
  logger.error('Location data unavailable at startup; requests will retry generation');
}

const port = getPort();
const server = app.listen(port, () => {
  logger.info(`Server running on port ${port}`);
});

function shutdown(signal: string): void {
  logger.info(`${signal} received, closing server`);
  server.close((error) => {
    if (error) {
      logger.error('Error while closing server', { error: error.message });
      process.exit(1);
    }
    process.exit(0);
  });
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));
