import { randomUUID } from 'node:crypto';
import express, { Router } from 'express';
import { IMAGE_CONTENT_TYPES, isImageContentType } from '@atlasvision/shared';
import type { ImageStorage, Scan } from '@atlasvision/shared';
import { HttpError, notFound } from '../errors.js';
import type { ScanQueue } from '../scan-queue.js';
import type { GatewayStore } from '../store.js';
import { idParams, scanUploadQuery } from '../validation.js';

export interface ScanRouteDeps {
  store: GatewayStore;
  storage: Pick<ImageStorage, 'save' | 'remove'>;
  queue: ScanQueue;
  maxUploadBytes: number;
}

export function toScanView(scan: Scan) {
  return {
    id: scan.id,
    shopId: scan.shopId,
    userId: scan.userId,
    status: scan.status,
    productId: scan.productId,
    normalized: scan.normalized,
    error: scan.error,
    createdAt: scan.createdAt.toISOString(),
    updatedAt: scan.updatedAt.toISOString(),
  };
}

export function createScanRouter({ store, storage, queue, maxUploadBytes }: ScanRouteDeps): Router {
  const router = Router();

  router.post(
    '/scan',
    express.raw({ type: [...IMAGE_CONTENT_TYPES], limit: maxUploadBytes }),
    async (req, res) => {
      const { shopId, userId } = scanUploadQuery.parse(req.query);

      const contentType = (req.get('content-type') ?? '').split(';')[0].trim().toLowerCase();
      if (!isImageContentType(contentType)) {
        throw new HttpError(415, `Expected an image body (${IMAGE_CONTENT_TYPES.join(', ')})`);
      }
      const body: unknown = req.body;
      if (!Buffer.isBuffer(body) || body.length === 0) {
        throw new HttpError(400, 'Image body is empty');
      }

      if (!(await store.findShop(shopId))) throw notFound('Shop');
      if (userId) {
        const user = await store.findUser(userId);
        if (!user || user.shopId !== shopId) throw notFound('User');
      }

      const scanId = randomUUID();
      const imagePath = await storage.save(scanId, body, contentType);
      let scan: Scan;
      try {
        scan = await store.createScan({
          id: scanId,
          shopId,
          userId: userId ?? null,
          imagePath,
          contentType,
          status: 'pending',
        });
      } catch (err) {
        // No row will ever point at the file.
        await storage.remove(imagePath).catch((removeErr: unknown) => {
          console.error(`Scan ${scanId}: could not remove orphaned image ${imagePath}:`, removeErr);
        });
        throw err;
      }
      await queue.enqueue(scan.id);

      console.log(`Scan ${scan.id}: queued (shop=${shopId}, ${body.length} bytes)`);
      res.status(202).json({ id: scan.id, status: scan.status });
    },
  );

  router.get('/scan/:id', async (req, res) => {
    const { id } = idParams.parse(req.params);
    const scan = await store.findScan(id);
    if (!scan) throw notFound('Scan');
    res.json(toScanView(scan));
  });

  return router;
}
