import { z } from 'zod';
import { ShipDefinition } from '../../shared/types/MissionTypes';
import { readCatalogFile } from '../config/catalogConfig';
import { getDefaultShipId } from '../config/serverConfig';
import { RouteLogger } from '../routing/RouteLogger';

export const SHIP_CATALOG_FILE = 'ships.json';

/** Constellation Taurus hold, used when the catalog names no usable default */
export const DEFAULT_SHIP_CAPACITY = 168;

const shipCatalogSchema = z.object({
  defaultShipId: z.string(),
  ships: z.array(
    z.object({
      id: z.string().min(1),
      name: z.string().min(1),
      cargo_capacity: z.number().positive(),
    }),
  ),
});

type ShipCatalog = z.infer<typeof shipCatalogSchema>;

export interface ResolvedShip {
  shipId: string;
  capacity: number;
  /** True when the requested id was unknown and the default was used */
  fallback: boolean;
}

export class ShipService {
  private static instance: ShipService;
  private readonly logger = new RouteLogger('ShipService');
  private catalog: ShipCatalog;

  private constructor() {
    this.catalog = shipCatalogSchema.parse(readCatalogFile(SHIP_CATALOG_FILE));
  }

  public static getInstance(): ShipService {
    if (!ShipService.instance) {
      ShipService.instance = new ShipService();
    }
    return ShipService.instance;
  }

  listShips(): ShipDefinition[] {
    return this.catalog.ships.map((ship) => ({ ...ship }));
  }

  getShip(shipId: string): ShipDefinition | undefined {
    return this.catalog.ships.find((ship) => ship.id === shipId);
  }

  defaultShipId(): string {
    return getDefaultShipId() ?? this.catalog.defaultShipId;
  }

  /**
   * Capacity for a ship id. Absent or unknown ids fall back to the default
   * ship rather than failing the request.
   */
  resolve(shipId?: string): ResolvedShip {
    const requested = shipId ? this.getShip(shipId) : undefined;
    if (requested) {
      return { shipId: requested.id, capacity: requested.cargo_capacity, fallback: false };
    }

    if (shipId) {
      this.logger.warn('Unknown ship id, using default ship', { shipId });
    }

    const fallbackId = this.defaultShipId();
    const fallbackShip = this.getShip(fallbackId);
    return {
      shipId: fallbackShip?.id ?? fallbackId,
      capacity: fallbackShip?.cargo_capacity ?? DEFAULT_SHIP_CAPACITY,
      fallback: Boolean(shipId),
    };
  }
}
