import { pgTable, text, numeric, boolean, integer, jsonb, uuid, timestamp, bigserial, index, uniqueIndex } from 'drizzle-orm/pg-core';
import type { NormalizedScan, ScanStatus } from '../types.js';

export const shops = pgTable('shops', {
  id: uuid('id').primaryKey().defaultRandom(),
  name: text('name').notNull(),
  location: text('location'),
  createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
});

export const users = pgTable('users', {
  id: uuid('id').primaryKey().defaultRandom(),
  shopId: uuid('shop_id').references(() => shops.id).notNull(),
  email: text('email').notNull().unique(),
  name: text('name'),
  createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
});

export const products = pgTable('products', {
  id: uuid('id').primaryKey().defaultRandom(),
  shopId: uuid('shop_id').references(() => shops.id).notNull(),
  name: text('name').notNull(),
  category: text('category'),
  quantity: integer('quantity').default(0).notNull(),
  currentPrice: numeric('current_price', { precision: 10, scale: 2 }),
  lastSeenAt: timestamp('last_seen_at', { withTimezone: true }),
  createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
}, (table) => [
  uniqueIndex('ux_products_shop_name').on(table.shopId, table.name),
]);

export const scans = pgTable('scans', {
  id: uuid('id').primaryKey().defaultRandom(),
  shopId: uuid('shop_id').references(() => shops.id).notNull(),
  userId: uuid('user_id').references(() => users.id),
  imagePath: text('image_path').notNull(),
  contentType: text('content_type').notNull(),
  status: text('status').$type<ScanStatus>().default('pending').notNull(),
  rawOcr: jsonb('raw_ocr'),
  rawClassification: jsonb('raw_classification'),
  rawVqa: jsonb('raw_vqa'),
  normalized: jsonb('normalized').$type<NormalizedScan>(),
  productId: uuid('product_id').references(() => products.id),
  error: text('error'),
  createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
  updatedAt: timestamp('updated_at', { withTimezone: true }).defaultNow().notNull(),
}, (table) => [
  index('idx_scans_shop_created').on(table.shopId, table.createdAt),
]);

export const alerts = pgTable('alerts', {
  id: uuid('id').primaryKey().defaultRandom(),
  shopId: uuid('shop_id').references(() => shops.id).notNull(),
  productId: uuid('product_id').references(() => products.id).notNull(),
  scanId: uuid('scan_id').references(() => scans.id),
  kind: text('kind').$type<AlertKind>().notNull(),
  message: text('message').notNull(),
  acknowledged: boolean('acknowledged').default(false).notNull(),
  createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
}, (table) => [
  index('idx_alerts_shop_created').on(table.shopId, table.createdAt),
]);

export const priceHistory = pgTable('price_history', {
  id: bigserial('id', { mode: 'number' }).primaryKey(),
  productId: uuid('product_id').references(() => products.id).notNull(),
  scanId: uuid('scan_id').references(() => scans.id),
  price: numeric('price', { precision: 10, scale: 2 }).notNull(),
  source: text('source').notNull(), // 'vqa'
  recordedAt: timestamp('recorded_at', { withTimezone: true }).defaultNow().notNull(),
}, (table) => [
  index('idx_price_history_product_recorded').on(table.productId, table.recordedAt),
]);

export type AlertKind = 'price_drop' | 'price_increase';

export type Shop = typeof shops.$inferSelect;
export type User = typeof users.$inferSelect;
export type Product = typeof products.$inferSelect;
export type Scan = typeof scans.$inferSelect;
export type NewScan = typeof scans.$inferInsert;
export type Alert = typeof alerts.$inferSelect;
export type PriceHistoryEntry = typeof priceHistory.$inferSelect;
