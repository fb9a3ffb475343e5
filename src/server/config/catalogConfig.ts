import * as fs from 'fs';
import * as path from 'path';
import { getConfigurationDir } from './serverConfig';

export class CatalogFileError extends Error {
  public readonly code = 'CATALOG_UNAVAILABLE';

  constructor(public readonly fileName: string, cause: unknown) {
    super(`Failed to read ${fileName}: ${cause instanceof Error ? cause.message : String(cause)}`);
    this.name = 'CatalogFileError';
  }
}

/** Read and parse one JSON catalog from the configuration directory */
export function readCatalogFile(fileName: string): unknown {
  const filePath = path.join(getConfigurationDir(), fileName);
  try {
    return JSON.parse(fs.readFileSync(filePath, 'utf8'));
  } catch (error) {
    throw new CatalogFileError(fileName, error);
  }
}
