function required(name: string): string {
  const val = process.env[name];
  if (!val) throw new Error(`Missing required env var: ${name}`);
  return val;
}

function optional(name: string, fallback: string): string {
  return process.env[name] || fallback;
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
  uploadDir: optional('UPLOAD_DIR', './uploads'),
  healthPort: integer('HEALTH_PORT', 3001),
  concurrency: integer('WORKER_CONCURRENCY', 2),
  inference: {
    baseUrl: optional('INFERENCE_BASE_URL', 'https://api-inference.huggingface.co'),
    apiToken: required('INFERENCE_API_TOKEN'),
    timeoutMs: integer('INFERENCE_TIMEOUT_MS', 30_000),
    models: {
      ocr: optional('OCR_MODEL', 'microsoft/trocr-base-printed'),
      classifier: optional('CLASSIFIER_MODEL', 'google/vit-base-patch16-224'),
      vqa: optional('VQA_MODEL', 'dandelin/vilt-b32-finetuned-vqa'),
    },
  },
  vqaQuestion: optional('VQA_QUESTION', 'What is the price of this product?'),
};
