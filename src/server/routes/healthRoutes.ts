import express, { Request, Response } from 'express';
import { locationService } from '../services/locationService';

const router = express.Router();

router.get('/health', (_req: Request, res: Response) => {
  const locations = locationService.getLocations();
  const healthy = locations.isOk();

  res.status(healthy ? 200 : 503).json({
    status: healthy ? 'healthy' : 'degraded',
    timestamp: new Date().toISOString(),
    uptime: process.uptime(),
    locations: locations.match(
      (list) => list.length,
      () => null
    )
  });
});

export default router;
