export * from './db/index.js';
export * from './queues.js';
export * from './redis.js';
export * from './shutdown.js';
export * from './storage.js';
export * from './types.js';
