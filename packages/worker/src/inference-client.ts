import { z } from 'zod';

export interface OcrResult {
  text: string;
}

export interface ClassificationLabel {
  label: string;
  score: number;
}

export interface VqaAnswer {
  answer: string;
  score: number;
}

export interface InferenceClient {
  recognizeText(image: Buffer): Promise<OcrResult>;
  classify(image: Buffer): Promise<ClassificationLabel[]>;
  answer(image: Buffer, question: string): Promise<VqaAnswer[]>;
}

export interface InferenceModels {
  ocr: string;
  classifier: string;
  vqa: string;
}

export interface InferenceClientOptions {
  baseUrl: string;
  apiToken: string;
  models: InferenceModels;
  timeoutMs: number;
  fetch?: typeof fetch;
}

export class InferenceError extends Error {
  constructor(
    message: string,
    readonly model: string,
    readonly status: number | null = null,
  ) {
    super(message);
    this.name = 'InferenceError';
  }
}

const generatedText = z.object({ generated_text: z.string() });
const ocrResponse = z.union([z.array(generatedText).min(1), generatedText]);

const classificationResponse = z.array(z.object({ label: z.string(), score: z.number() }));

const vqaAnswer = z.object({ answer: z.string(), score: z.number() });
const vqaResponse = z.union([z.array(vqaAnswer), vqaAnswer]);

const MAX_ERROR_BODY_LENGTH = 500;

export function createInferenceClient(options: InferenceClientOptions): InferenceClient {
  const { apiToken, models, timeoutMs } = options;
  const baseUrl = options.baseUrl.replace(/\/+$/, '');
  const doFetch = options.fetch ?? fetch;

  async function call<T>(
    model: string,
    body: { kind: 'binary'; data: Buffer } | { kind: 'json'; data: unknown },
    schema: z.ZodType<T>,
  ): Promise<T> {
    const url = `${baseUrl}/models/${model}`;

    let response: Response;
    try {
      response = await doFetch(url, {
        method: 'POST',
        headers: {
          Authorization: `Bearer ${apiToken}`,
          'Content-Type': body.kind === 'binary' ? 'application/octet-stream' : 'application/json',
        },
        body: body.kind === 'binary' ? body.data : JSON.stringify(body.data),
        signal: AbortSignal.timeout(timeoutMs),
      });
    } catch (err) {
      // fetch rejects with the signal's DOMException reason on timeout.
      if (typeof err === 'object' && err !== null && 'name' in err && err.name === 'TimeoutError') {
        throw new InferenceError(`${model} timed out after ${timeoutMs}ms`, model);
      }
      const reason = err instanceof Error ? err.message : String(err);
      throw new InferenceError(`${model} request failed: ${reason}`, model);
    }

    if (!response.ok) {
      const text = (await response.text()).slice(0, MAX_ERROR_BODY_LENGTH);
      throw new InferenceError(`${model} responded with ${response.status}: ${text}`, model, response.status);
    }

    let payload: unknown;
    try {
      payload = await response.json();
    } catch {
      throw new InferenceError(`${model} returned a non-JSON body`, model, response.status);
    }

    const parsed = schema.safeParse(payload);
    if (!parsed.success) {
      throw new InferenceError(`${model} returned an unexpected payload`, model, response.status);
    }
    return parsed.data;
  }

  return {
    async recognizeText(image) {
      const result = await call(models.ocr, { kind: 'binary', data: image }, ocrResponse);
      const first = Array.isArray(result) ? result[0] : result;
      return { text: first.generated_text };
    },

    async classify(image) {
      return call(models.classifier, { kind: 'binary', data: image }, classificationResponse);
    },

    async answer(image, question) {
      const result = await call(
        models.vqa,
        { kind: 'json', data: { inputs: { image: image.toString('base64'), question } } },
        vqaResponse,
      );
      return Array.isArray(result) ? result : [result];
    },
  };
}
