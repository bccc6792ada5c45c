import { fileURLToPath } from 'node:url';
import { Queue } from 'bullmq';
import { migrate } from 'drizzle-orm/postgres-js/migrator';
import { createDb, createLocalImageStorage, createShutdownHandler, parseRedisUrl, QUEUES } from '@atlasvision/shared';
import type { ScanProcessJob } from '@atlasvision/shared';
import { createApp } from './app.js';
import { config } from './config.js';
import { createScanQueue } from './scan-queue.js';
import { createGatewayStore } from './store.js';

const MIGRATIONS_FOLDER = fileURLToPath(new URL('../../shared/drizzle', import.meta.url));

async function main() {
  const db = createDb(config.databaseUrl);

  console.log('Running database migrations...');
  await migrate(db, { migrationsFolder: MIGRATIONS_FOLDER });
  console.log('Migrations complete');

  const connection = parseRedisUrl(config.redisUrl);
  const scanQueue = new Queue<ScanProcessJob>(QUEUES.SCAN_PROCESS, { connection });

  const app = createApp({
    store: createGatewayStore(db),
    storage: createLocalImageStorage(config.uploadDir),
    queue: createScanQueue(scanQueue),
    maxUploadBytes: config.maxUploadBytes,
  });

  const server = app.listen(config.port, () => {
    console.log(`Gateway listening on :${config.port}`);
  });

  const shutdown = createShutdownHandler([
    {
      name: 'http server',
      close: () => new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve()))),
    },
    { name: 'scan queue', close: () => scanQueue.close() },
    { name: 'database', close: () => db.$client.end() },
  ]);
  process.once('SIGTERM', shutdown);
  process.once('SIGINT', shutdown);
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
