import type { ImageStorage, Product, Scan } from '@atlasvision/shared';
import type { InferenceClient } from './inference-client.js';
import { normalizeScan } from './normalize.js';
import { alertKindFor, analyzePriceChange, formatPriceAlert } from './price-processor.js';
import type { ScanStore } from './scan-store.js';

export interface ProcessScanDeps {
  store: ScanStore;
  inference: InferenceClient;
  images: Pick<ImageStorage, 'read'>;
  vqaQuestion: string;
  now?: () => Date;
}

export type ProcessScanOutcome = 'done' | 'failed' | 'skipped';

export async function processScan(scanId: string, deps: ProcessScanDeps): Promise<ProcessScanOutcome> {
  const { store } = deps;

  const scan = await store.findScan(scanId);
  if (!scan) {
    console.warn(`Scan ${scanId}: not found in DB, skipping`);
    return 'skipped';
  }
  if (scan.status === 'done') {
    console.warn(`Scan ${scanId}: already done, skipping`);
    return 'skipped';
  }

  await store.markProcessing(scanId);

  try {
    await runPipeline(scan, deps);
    return 'done';
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    console.error(`Scan ${scanId}: failed: ${message}`);
    await store.markFailed(scanId, message);
    return 'failed';
  }
}

async function runPipeline(scan: Scan, deps: ProcessScanDeps): Promise<void> {
  const { store, inference, images, vqaQuestion, now = () => new Date() } = deps;

  const image = await images.read(scan.imagePath);

  const ocr = await inference.recognizeText(image);
  const classification = await inference.classify(image);
  const vqa = await inference.answer(image, vqaQuestion);

  const normalized = normalizeScan({ ocr, classification, vqa });

  let product: Product | null = null;
  if (normalized.productName) {
    product = await store.upsertProduct({
      shopId: scan.shopId,
      name: normalized.productName,
      category: normalized.category,
      seenAt: now(),
    });
  }

  if (product && normalized.price) {
    await recordPrice(scan, product, normalized.price, store);
  }

  await store.markDone(scan.id, {
    rawOcr: ocr,
    rawClassification: classification,
    rawVqa: vqa,
    normalized,
    productId: product?.id ?? null,
  });

  console.log(
    `Scan ${scan.id}: done (product=${normalized.productName ?? 'none'}, category=${normalized.category ?? 'none'}, price=${normalized.price ?? 'none'})`,
  );
}

async function recordPrice(scan: Scan, product: Product, price: string, store: ScanStore): Promise<void> {
  const oldPrice = product.currentPrice;
  const change = analyzePriceChange(oldPrice, price);

  await store.recordPrice({ productId: product.id, scanId: scan.id, price });

  const kind = alertKindFor(change);
  if (kind && oldPrice !== null) {
    await store.createAlert({
      shopId: scan.shopId,
      productId: product.id,
      scanId: scan.id,
      kind,
      message: formatPriceAlert({ productName: product.name, oldPrice, newPrice: price, change }),
    });
  }
}
