import { Router } from 'express';
import { notFound } from '../errors.js';
import type { GatewayStore } from '../store.js';
import { idParams } from '../validation.js';

export function createInventoryRouter(store: GatewayStore): Router {
  const router = Router();

  router.get('/products/:id', async (req, res) => {
    const { id } = idParams.parse(req.params);
    const product = await store.findProduct(id);
    if (!product) throw notFound('Product');
    res.json(product);
  });

  router.get('/products/:id/price-history', async (req, res) => {
    const { id } = idParams.parse(req.params);
    if (!(await store.findProduct(id))) throw notFound('Product');
    res.json(await store.listPriceHistory(id));
  });

  router.post('/alerts/:id/acknowledge', async (req, res) => {
    const { id } = idParams.parse(req.params);
    const alert = await store.acknowledgeAlert(id);
    if (!alert) throw notFound('Alert');
    res.json(alert);
  });

  return router;
}
