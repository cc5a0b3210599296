import express from 'express';

import { authenticate } from '../middleware/auth.js';
import { rateLimiter } from '../middleware/rateLimit.js';
import { registry as metricsRegistry } from '../metrics/index.js';
import type { CollateralRegistry } from '../registry/CollateralRegistry.js';

import buildRoutes from './routes.js';

export function createApp(registry: CollateralRegistry): express.Express {
  const app = express();
  app.use(express.json());

  // Prometheus metrics endpoint (no auth)
  app.get('/metrics', async (_req, res) => {
    res.setHeader('Content-Type', metricsRegistry.contentType);
    res.send(await metricsRegistry.metrics());
  });

  app.use('/api/v1', rateLimiter, authenticate, buildRoutes(registry));

  return app;
}
