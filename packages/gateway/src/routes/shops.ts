import express, { Router } from 'express';
import { HttpError, notFound } from '../errors.js';
import type { GatewayStore } from '../store.js';
import { alertListQuery, createShopBody, createUserBody, idParams } from '../validation.js';

export function createShopRouter(store: GatewayStore): Router {
  const router = Router();
  const json = express.json();

  async function requireShop(id: string) {
    const shop = await store.findShop(id);
    if (!shop) throw notFound('Shop');
    return shop;
  }

  router.post('/shops', json, async (req, res) => {
    const input = createShopBody.parse(req.body ?? {});
    const shop = await store.createShop(input);
    res.status(201).json(shop);
  });

  router.get('/shops/:id', async (req, res) => {
    const { id } = idParams.parse(req.params);
    res.json(await requireShop(id));
  });

  router.post('/shops/:id/users', json, async (req, res) => {
    const { id } = idParams.parse(req.params);
    const { email, name } = createUserBody.parse(req.body ?? {});
    await requireShop(id);

    const user = await store.createUser({ shopId: id, email, name });
    if (!user) throw new HttpError(409, `User ${email} already exists`);
    res.status(201).json(user);
  });

  router.get('/shops/:id/products', async (req, res) => {
    const { id } = idParams.parse(req.params);
    await requireShop(id);
    res.json(await store.listProducts(id));
  });

  router.get('/shops/:id/alerts', async (req, res) => {
    const { id } = idParams.parse(req.params);
    const { unacknowledged } = alertListQuery.parse(req.query);
    await requireShop(id);
    res.json(await store.listAlerts(id, { unacknowledgedOnly: unacknowledged === 'true' }));
  });

  return router;
}
