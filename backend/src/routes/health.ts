import { Express, Request, Response } from 'express';
import { NODE_ENV, SERVICE_VERSION } from '../server/runtime.js';
import { logger } from '../utils/logger.js';

const healthPayload = () => ({
  status: 'healthy',
  service: 'weather',
  version: SERVICE_VERSION,
  env: NODE_ENV,
  uptime: Math.floor(process.uptime()),
  timestamp: new Date().toISOString(),
});

export const registerHealthRoutes = (app: Express) => {
  const respond = (_req: Request, res: Response) => {
    logger.debug('Weather service health check');
    res.json(healthPayload());
  };

  app.get('/health', respond);
  app.get('/api/health', respond);
  app.get('/api/v1/weather/health', respond);
};
