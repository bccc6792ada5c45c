import { createServer } from 'node:http';
import { Worker } from 'bullmq';
import { createDb, createLocalImageStorage, createShutdownHandler, parseRedisUrl, QUEUES } from '@atlasvision/shared';
import type { ScanProcessJob } from '@atlasvision/shared';
import { config } from './config.js';
import { createInferenceClient } from './inference-client.js';
import { processScan } from './process-scan.js';
import { createScanStore } from './scan-store.js';

async function main() {
  const db = createDb(config.databaseUrl);
  const connection = parseRedisUrl(config.redisUrl);

  const store = createScanStore(db);
  const images = createLocalImageStorage(config.uploadDir);
  const inference = createInferenceClient(config.inference);

  const worker = new Worker<ScanProcessJob>(
    QUEUES.SCAN_PROCESS,
    async (job) => {
      const outcome = await processScan(job.data.scanId, {
        store,
        inference,
        images,
        vqaQuestion: config.vqaQuestion,
      });
      return { outcome };
    },
    { connection, concurrency: config.concurrency },
  );

  worker.on('failed', (job, err) => {
    console.error(`Scan job ${job?.id} failed:`, err.message);
  });

  const server = createServer((req, res) => {
    if (req.url === '/health') {
      res.writeHead(200);
      res.end('ok');
    } else {
      res.writeHead(404);
      res.end();
    }
  }).listen(config.healthPort);

  const shutdown = createShutdownHandler([
    { name: 'scan worker', close: () => worker.close() },
    { name: 'health server', close: () => new Promise<void>((resolve) => server.close(() => resolve())) },
    { name: 'database', close: () => db.$client.end() },
  ]);
  process.once('SIGTERM', shutdown);
  process.once('SIGINT', shutdown);

  console.log(`Scan worker started (concurrency ${config.concurrency}, health on :${config.healthPort})`);
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
