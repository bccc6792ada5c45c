import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { z } from 'zod';
import { createApp } from '../app.js';
import { InMemoryGatewayStore, listen, RecordingScanQueue } from './fakes.js';

const UNKNOWN_ID = '00000000-0000-4000-8000-000000000000';
const PRODUCT_ID = '6a0b7c1e-2f3d-4c5b-8a9e-0f1e2d3c4b5a';
const createdEntity = z.object({ id: z.string().uuid() });

describe('shop and inventory API', () => {
  let store: InMemoryGatewayStore;
  let server: { url: string; close: () => Promise<void> };

  beforeEach(async () => {
    store = new InMemoryGatewayStore(() => new Date('2026-03-01T09:30:00.000Z'));
    const app = createApp({
      store,
      storage: { save: vi.fn(async () => 'unused.jpg'), remove: vi.fn(async () => {}) },
      queue: new RecordingScanQueue(),
      maxUploadBytes: 1024,
    });
    server = await listen(app);
  });

  afterEach(async () => {
    await server.close();
  });

  function postJson(path: string, body: unknown) {
    return fetch(`${server.url}${path}`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(body),
    });
  }

  async function seedProduct(shopId: string) {
    store.products.set(PRODUCT_ID, {
      id: PRODUCT_ID,
      shopId,
      name: 'Rye Bread',
      category: 'bakery',
      quantity: 3,
      currentPrice: '3.00',
      lastSeenAt: new Date('2026-03-01T09:00:00.000Z'),
      createdAt: new Date('2026-02-01T09:00:00.000Z'),
    });
  }

  it('creates a shop and reads it back', async () => {
    const response = await postJson('/shops', { name: '  Corner Shop ', location: 'Main St 1' });

    expect(response.status).toBe(201);
    const { id } = createdEntity.parse(await response.json());

    const fetched = await fetch(`${server.url}/shops/${id}`);
    expect(await fetched.json()).toEqual({
      id,
      name: 'Corner Shop',
      location: 'Main St 1',
      createdAt: '2026-03-01T09:30:00.000Z',
    });
  });

  it('rejects a shop without a name', async () => {
    const response = await postJson('/shops', { name: '' });

    expect(response.status).toBe(400);
  });

  it('registers a user once per email', async () => {
    const shop = await store.createShop({ name: 'Corner Shop' });

    const first = await postJson(`/shops/${shop.id}/users`, { email: 'Clerk@Example.com', name: 'Clerk' });
    expect(first.status).toBe(201);
    expect(await first.json()).toMatchObject({ shopId: shop.id, email: 'clerk@example.com', name: 'Clerk' });

    const second = await postJson(`/shops/${shop.id}/users`, { email: 'clerk@example.com' });
    expect(second.status).toBe(409);
    expect(await second.json()).toEqual({ error: 'User clerk@example.com already exists' });
  });

  it('returns 404 when registering a user for an unknown shop', async () => {
    const response = await postJson(`/shops/${UNKNOWN_ID}/users`, { email: 'clerk@example.com' });

    expect(response.status).toBe(404);
    expect(await response.json()).toEqual({ error: 'Shop not found' });
  });

  it('returns 400 for malformed JSON', async () => {
    const response = await fetch(`${server.url}/shops`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: '{"name":',
    });

    expect(response.status).toBe(400);
  });

  it('lists the products of a shop and their price history newest first', async () => {
    const shop = await store.createShop({ name: 'Corner Shop' });
    await seedProduct(shop.id);
    store.priceHistory.push(
      { id: 1, productId: PRODUCT_ID, scanId: null, price: '2.50', source: 'vqa', recordedAt: new Date('2026-02-20T10:00:00.000Z') },
      { id: 2, productId: PRODUCT_ID, scanId: null, price: '3.00', source: 'vqa', recordedAt: new Date('2026-03-01T09:00:00.000Z') },
    );

    const products = await (await fetch(`${server.url}/shops/${shop.id}/products`)).json();
    expect(products).toMatchObject([{ id: PRODUCT_ID, name: 'Rye Bread', quantity: 3, currentPrice: '3.00' }]);

    const history = await (await fetch(`${server.url}/products/${PRODUCT_ID}/price-history`)).json();
    expect(history).toMatchObject([
      { id: 2, price: '3.00' },
      { id: 1, price: '2.50' },
    ]);
  });

  it('returns 404 for an unknown product', async () => {
    const response = await fetch(`${server.url}/products/${UNKNOWN_ID}/price-history`);

    expect(response.status).toBe(404);
    expect(await response.json()).toEqual({ error: 'Product not found' });
  });

  it('lists alerts and acknowledges them', async () => {
    const shop = await store.createShop({ name: 'Corner Shop' });
    await seedProduct(shop.id);
    const alertId = '7b1c2d3e-4f5a-4b6c-9d7e-8f9a0b1c2d3e';
    store.alerts.set(alertId, {
      id: alertId,
      shopId: shop.id,
      productId: PRODUCT_ID,
      scanId: null,
      kind: 'price_increase',
      message: 'Rye Bread: 2.50 → 3.00 (+20%)',
      acknowledged: false,
      createdAt: new Date('2026-03-01T09:00:00.000Z'),
    });

    const open = await (await fetch(`${server.url}/shops/${shop.id}/alerts?unacknowledged=true`)).json();
    expect(open).toMatchObject([{ id: alertId, kind: 'price_increase', acknowledged: false }]);

    const ack = await fetch(`${server.url}/alerts/${alertId}/acknowledge`, { method: 'POST' });
    expect(ack.status).toBe(200);
    expect(await ack.json()).toMatchObject({ id: alertId, acknowledged: true });

    const stillOpen = await (await fetch(`${server.url}/shops/${shop.id}/alerts?unacknowledged=true`)).json();
    expect(stillOpen).toEqual([]);

    const all = await (await fetch(`${server.url}/shops/${shop.id}/alerts`)).json();
    expect(all).toHaveLength(1);
  });

  it('returns 404 when acknowledging an unknown alert', async () => {
    const response = await fetch(`${server.url}/alerts/${UNKNOWN_ID}/acknowledge`, { method: 'POST' });

    expect(response.status).toBe(404);
  });

  it('answers unknown routes with 404', async () => {
    const response = await fetch(`${server.url}/nope`);

    expect(response.status).toBe(404);
    expect(await response.json()).toEqual({ error: 'Not found' });
  });
});
