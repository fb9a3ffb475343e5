/**
 * Server configuration read from the environment.
 * Values are read on each call so tests can override process.env.
 */

import path from 'path';

const DEFAULT_PORT = 3001;

export function getPort(): number {
  const port = parseInt(process.env.PORT || String(DEFAULT_PORT), 10);
  return Number.isFinite(port) ? port : DEFAULT_PORT;
}

/** Comma-separated ALLOWED_ORIGINS, or undefined to allow any origin */
export function getCorsOrigins(): string[] | undefined {
  const value = process.env.ALLOWED_ORIGINS;
  if (!value) return undefined;
  const origins = value.split(',').map((origin) => origin.trim()).filter(Boolean);
  return origins.length > 0 ? origins : undefined;
}

/** Directory holding the JSON catalogs (locations, ships, cargo types) */
export function getConfigurationDir(): string {
  return process.env.CONFIGURATION_DIR
    ? path.resolve(process.env.CONFIGURATION_DIR)
    : path.join(__dirname, '../../../configuration');
}

/**
 * Optional cap on actions per route computation.
 * Unset, empty, or non-positive values mean no cap.
 */
export function getRouteMaxActions(): number | undefined {
  const value = process.env.ROUTE_MAX_ACTIONS;
  if (value === undefined || value === '') return undefined;
  const parsed = parseInt(value, 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : undefined;
}

export function getDefaultShipId(): string | undefined {
  return process.env.DEFAULT_SHIP_ID || undefined;
}

export function getLogLevelName(): string | undefined {
  return process.env.LOG_LEVEL || undefined;
}
