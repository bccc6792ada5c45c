import { randomUUID } from 'node:crypto';
import type { Server } from 'node:http';
import type { Express } from 'express';
import { z } from 'zod';
import type { Alert, NewScan, PriceHistoryEntry, Product, Scan, Shop, User } from '@atlasvision/shared';
import type { ScanQueue } from '../scan-queue.js';
import type { GatewayStore, NewShop, NewUser } from '../store.js';

export const createdScan = z.object({ id: z.string().uuid(), status: z.string() });

export class InMemoryGatewayStore implements GatewayStore {
  readonly shops = new Map<string, Shop>();
  readonly users = new Map<string, User>();
  readonly scans = new Map<string, Scan>();
  readonly products = new Map<string, Product>();
  readonly priceHistory: PriceHistoryEntry[] = [];
  readonly alerts = new Map<string, Alert>();

  constructor(private readonly now: () => Date = () => new Date()) {}

  async createShop({ name, location }: NewShop) {
    const shop: Shop = { id: randomUUID(), name, location: location ?? null, createdAt: this.now() };
    this.shops.set(shop.id, shop);
    return shop;
  }

  async findShop(id: string) {
    return this.shops.get(id) ?? null;
  }

  async createUser({ shopId, email, name }: NewUser) {
    if ([...this.users.values()].some((u) => u.email === email)) return null;
    const user: User = { id: randomUUID(), shopId, email, name: name ?? null, createdAt: this.now() };
    this.users.set(user.id, user);
    return user;
  }

  async findUser(id: string) {
    return this.users.get(id) ?? null;
  }

  async createScan(input: NewScan) {
    const now = this.now();
    const scan: Scan = {
      id: input.id ?? randomUUID(),
      shopId: input.shopId,
      userId: input.userId ?? null,
      imagePath: input.imagePath,
      contentType: input.contentType,
      status: input.status ?? 'pending',
      rawOcr: null,
      rawClassification: null,
      rawVqa: null,
      normalized: null,
      productId: null,
      error: null,
      createdAt: now,
      updatedAt: now,
    };
    this.scans.set(scan.id, scan);
    return scan;
  }

  async findScan(id: string) {
    return this.scans.get(id) ?? null;
  }

  async listProducts(shopId: string) {
    return [...this.products.values()]
      .filter((p) => p.shopId === shopId)
      .sort((a, b) => a.name.localeCompare(b.name));
  }

  async findProduct(id: string) {
    return this.products.get(id) ?? null;
  }

  async listPriceHistory(productId: string) {
    return this.priceHistory
      .filter((entry) => entry.productId === productId)
      .sort((a, b) => b.recordedAt.getTime() - a.recordedAt.getTime() || b.id - a.id);
  }

  async listAlerts(shopId: string, { unacknowledgedOnly }: { unacknowledgedOnly: boolean }) {
    return [...this.alerts.values()]
      .filter((a) => a.shopId === shopId && (!unacknowledgedOnly || !a.acknowledged))
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime());
  }

  async acknowledgeAlert(id: string) {
    const alert = this.alerts.get(id);
    if (!alert) return null;
    const updated = { ...alert, acknowledged: true };
    this.alerts.set(id, updated);
    return updated;
  }
}

export class RecordingScanQueue implements ScanQueue {
  readonly enqueued: string[] = [];

  async enqueue(scanId: string) {
    this.enqueued.push(scanId);
  }
}

export function listen(app: Express): Promise<{ url: string; close: () => Promise<void> }> {
  return new Promise((resolve, reject) => {
    const server: Server = app.listen(0, '127.0.0.1');
    server.on('error', reject);
    server.on('listening', () => {
      const addr = server.address() as { port: number };
      resolve({
        url: `http://127.0.0.1:${addr.port}`,
        close: () => new Promise<void>((res, rej) => server.close((e) => (e ? rej(e) : res()))),
      });
    });
  });
}
