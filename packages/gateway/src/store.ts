import { and, asc, desc, eq } from 'drizzle-orm';
import { alerts, priceHistory, products, scans, shops, users } from '@atlasvision/shared';
import type { Alert, Db, NewScan, PriceHistoryEntry, Product, Scan, Shop, User } from '@atlasvision/shared';

export interface NewShop {
  name: string;
  location?: string | null;
}

export interface NewUser {
  shopId: string;
  email: string;
  name?: string | null;
}

export interface GatewayStore {
  createShop(input: NewShop): Promise<Shop>;
  findShop(id: string): Promise<Shop | null>;
  /** Returns null when the email is already registered. */
  createUser(input: NewUser): Promise<User | null>;
  findUser(id: string): Promise<User | null>;
  createScan(input: NewScan): Promise<Scan>;
  findScan(id: string): Promise<Scan | null>;
  listProducts(shopId: string): Promise<Product[]>;
  findProduct(id: string): Promise<Product | null>;
  listPriceHistory(productId: string): Promise<PriceHistoryEntry[]>;
  listAlerts(shopId: string, options: { unacknowledgedOnly: boolean }): Promise<Alert[]>;
  acknowledgeAlert(id: string): Promise<Alert | null>;
}

function firstOrThrow<T>(rows: T[], what: string): T {
  const [row] = rows;
  if (!row) throw new Error(`Insert into ${what} returned no row`);
  return row;
}

export function createGatewayStore(db: Db): GatewayStore {
  return {
    async createShop({ name, location }) {
      const rows = await db.insert(shops).values({ name, location: location ?? null }).returning();
      return firstOrThrow(rows, 'shops');
    },

    async findShop(id) {
      return (await db.query.shops.findFirst({ where: eq(shops.id, id) })) ?? null;
    },

    async createUser({ shopId, email, name }) {
      const rows = await db
        .insert(users)
        .values({ shopId, email, name: name ?? null })
        .onConflictDoNothing({ target: users.email })
        .returning();
      return rows[0] ?? null;
    },

    async findUser(id) {
      return (await db.query.users.findFirst({ where: eq(users.id, id) })) ?? null;
    },

    async createScan(input) {
      const rows = await db.insert(scans).values(input).returning();
      return firstOrThrow(rows, 'scans');
    },

    async findScan(id) {
      return (await db.query.scans.findFirst({ where: eq(scans.id, id) })) ?? null;
    },

    async listProducts(shopId) {
      return db.select().from(products).where(eq(products.shopId, shopId)).orderBy(asc(products.name));
    },

    async findProduct(id) {
      return (await db.query.products.findFirst({ where: eq(products.id, id) })) ?? null;
    },

    async listPriceHistory(productId) {
      return db
        .select()
        .from(priceHistory)
        .where(eq(priceHistory.productId, productId))
        .orderBy(desc(priceHistory.recordedAt), desc(priceHistory.id));
    },

    async listAlerts(shopId, { unacknowledgedOnly }) {
      const where = unacknowledgedOnly
        ? and(eq(alerts.shopId, shopId), eq(alerts.acknowledged, false))
        : eq(alerts.shopId, shopId);
      return db.select().from(alerts).where(where).orderBy(desc(alerts.createdAt));
    },

    async acknowledgeAlert(id) {
      const rows = await db.update(alerts).set({ acknowledged: true }).where(eq(alerts.id, id)).returning();
      return rows[0] ?? null;
    },
  };
}
