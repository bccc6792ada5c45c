import { eq, sql } from 'drizzle-orm';
import { alerts, priceHistory, products, scans } from '@atlasvision/shared';
import type { AlertKind, Db, NormalizedScan, Product, Scan } from '@atlasvision/shared';

export interface CompletedScan {
  rawOcr: unknown;
  rawClassification: unknown;
  rawVqa: unknown;
  normalized: NormalizedScan;
  productId: string | null;
}

export interface ProductSighting {
  shopId: string;
  name: string;
  category: string | null;
  seenAt: Date;
}

export interface PriceObservation {
  productId: string;
  scanId: string;
  price: string;
}

export interface NewAlert {
  shopId: string;
  productId: string;
  scanId: string;
  kind: AlertKind;
  message: string;
}

export interface ScanStore {
  findScan(scanId: string): Promise<Scan | null>;
  markProcessing(scanId: string): Promise<void>;
  markFailed(scanId: string, error: string): Promise<void>;
  markDone(scanId: string, result: CompletedScan): Promise<void>;
  /** Exact-name upsert; an existing product gets its quantity bumped by one. */
  upsertProduct(sighting: ProductSighting): Promise<Product>;
  recordPrice(observation: PriceObservation): Promise<void>;
  createAlert(alert: NewAlert): Promise<void>;
}

/** Increments in SQL so concurrent scans of the same product both count. */
export function productUpsert(db: Db, { shopId, name, category, seenAt }: ProductSighting) {
  return db
    .insert(products)
    .values({ shopId, name, category, quantity: 1, lastSeenAt: seenAt })
    .onConflictDoUpdate({
      target: [products.shopId, products.name],
      set: {
        quantity: sql`${products.quantity} + 1`,
        category: sql`COALESCE(excluded.category, ${products.category})`,
        lastSeenAt: seenAt,
      },
    })
    .returning();
}

export function createScanStore(db: Db): ScanStore {
  return {
    async findScan(scanId) {
      const scan = await db.query.scans.findFirst({ where: eq(scans.id, scanId) });
      return scan ?? null;
    },

    async markProcessing(scanId) {
      await db
        .update(scans)
        .set({ status: 'processing', error: null, updatedAt: new Date() })
        .where(eq(scans.id, scanId));
    },

    async markFailed(scanId, error) {
      await db
        .update(scans)
        .set({ status: 'failed', error, updatedAt: new Date() })
        .where(eq(scans.id, scanId));
    },

    async markDone(scanId, result) {
      await db
        .update(scans)
        .set({
          status: 'done',
          rawOcr: result.rawOcr,
          rawClassification: result.rawClassification,
          rawVqa: result.rawVqa,
          normalized: result.normalized,
          productId: result.productId,
          error: null,
          updatedAt: new Date(),
        })
        .where(eq(scans.id, scanId));
    },

    async upsertProduct(sighting) {
      const { shopId, name } = sighting;
      const [product] = await productUpsert(db, sighting);

      if (!product) {
        throw new Error(`Upsert of product "${name}" in shop ${shopId} returned no row`);
      }
      return product;
    },

    async recordPrice({ productId, scanId, price }) {
      await db.insert(priceHistory).values({ productId, scanId, price, source: 'vqa' });
      await db.update(products).set({ currentPrice: price }).where(eq(products.id, productId));
    },

    async createAlert(alert) {
      await db.insert(alerts).values(alert);
    },
  };
}
