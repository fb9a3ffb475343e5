import express, { Request, Response } from 'express';
import { buildErrorResponse } from '../middleware/errorHandler';
import { getCargoTypeCatalog } from '../services/cargoTypeService';
import { locationService } from '../services/locationService';
import { ShipService } from '../services/shipService';

const router = express.Router();

// Locations with 2-D map coordinates
const getLocations = (req: Request, res: Response): void => {
  locationService.getSimplifiedLocations().match(
    (locations) => {
      res.json(locations);
    },
    (error) => {
      res.status(503).json(buildErrorResponse(req, 'LOCATION_DATA_UNAVAILABLE', 'Failed to generate location data', error.message));
    }
  );
};

// Ships with their cargo capacities
const getShips = (_req: Request, res: Response): void => {
  res.json(ShipService.getInstance().listShips());
};

const getCargoTypes = (_req: Request, res: Response): void => {
  const catalog = getCargoTypeCatalog();
  res.json({ default: catalog.defaultCargoType, cargo_types: catalog.cargoTypes });
};

router.get('/locations', getLocations);
router.get('/ships', getShips);
router.get('/cargo-types', getCargoTypes);

export default router;
