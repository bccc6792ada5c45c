import type { ConnectionOptions } from 'bullmq';

const DEFAULT_REDIS_PORT = 6379;

export function parseRedisUrl(url: string): ConnectionOptions {
  const parsed = new URL(url);
  if (parsed.protocol !== 'redis:' && parsed.protocol !== 'rediss:') {
    throw new Error(`Unsupported Redis URL protocol: ${parsed.protocol}`);
  }

  const dbIndex = parsed.pathname.replace(/^\//, '');

  return {
    host: parsed.hostname,
    port: Number(parsed.port) || DEFAULT_REDIS_PORT,
    username: parsed.username ? decodeURIComponent(parsed.username) : undefined,
    password: parsed.password ? decodeURIComponent(parsed.password) : undefined,
    db: dbIndex ? Number(dbIndex) : undefined,
    tls: parsed.protocol === 'rediss:' ? {} : undefined,
    // BullMQ workers block on Redis and require this to be null.
    maxRetriesPerRequest: null,
  };
}
