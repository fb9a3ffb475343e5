import { z } from 'zod';
import { readCatalogFile } from '../config/catalogConfig';

export const CARGO_TYPE_CATALOG_FILE = 'cargo_types.json';

const cargoTypeCatalogSchema = z.object({
  defaultCargoType: z.string().min(1),
  cargoTypes: z.array(z.string().min(1)),
});

export type CargoTypeCatalog = z.infer<typeof cargoTypeCatalogSchema>;

let cachedCatalog: CargoTypeCatalog | null = null;

/** Known commodity names for mission forms; missions may still use others */
export function getCargoTypeCatalog(): CargoTypeCatalog {
  if (!cachedCatalog) {
    cachedCatalog = cargoTypeCatalogSchema.parse(readCatalogFile(CARGO_TYPE_CATALOG_FILE));
  }
  return cachedCatalog;
}
