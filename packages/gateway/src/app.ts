import express from 'express';
import type { Express } from 'express';
import { errorHandler } from './errors.js';
import { createInventoryRouter } from './routes/inventory.js';
import { createScanRouter } from './routes/scans.js';
import type { ScanRouteDeps } from './routes/scans.js';
import { createShopRouter } from './routes/shops.js';

export type AppDeps = ScanRouteDeps;

export function createApp(deps: AppDeps): Express {
  const app = express();
  app.disable('x-powered-by');

  app.get('/health', (_req, res) => {
    res.type('text/plain').send('ok');
  });

  app.use(createScanRouter(deps));
  app.use(createShopRouter(deps.store));
  app.use(createInventoryRouter(deps.store));

  app.use((_req, res) => {
    res.status(404).json({ error: 'Not found' });
  });
  app.use(errorHandler);

  return app;
}
