function required(name: string): string {
  const val = process.env[name];
  if (!val) throw new Error(`Missing required env var: ${name}`);
  return val;
}

function integer(name: string, fallback: number): number {
  const raw = process.env[name];
  if (!raw) return fallback;
  const val = Number(raw);
  if (!Number.isInteger(val) || val <= 0) {
    throw new Error(`Env var ${name} must be a positive integer, got "${raw}"`);
  }
  return val;
}

export const config = {
  databaseUrl: required('DATABASE_URL'),
  redisUrl: required('REDIS_URL'),
  port: integer('PORT', 3000),
  uploadDir: process.env.UPLOAD_DIR || './uploads',
  maxUploadBytes: integer('MAX_UPLOAD_BYTES', 10 * 1024 * 1024),
};
