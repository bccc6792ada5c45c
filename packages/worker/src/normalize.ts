import type { NormalizedScan } from '@atlasvision/shared';
import type { ClassificationLabel, OcrResult, VqaAnswer } from './inference-client.js';

export interface InferenceOutputs {
  ocr: OcrResult;
  classification: ClassificationLabel[];
  vqa: VqaAnswer[];
}

export function normalizeText(value: string): string {
  return value.replace(/\s+/g, ' ').trim();
}

// Either digit groups of three joined by one separator ("1 299,99", "1,299.99")
// or a plain number; a separator followed by anything but a digit ends it.
const PRICE_PATTERN = /\d{1,3}(?:[ \u00A0.,]\d{3})+(?:[.,]\d+)?|\d+(?:[.,]\d+)?/;

// price columns are numeric(10,2)
const MAX_PRICE = 1e8;

/** Reads the first number in free text as a two-decimal price string. */
export function normalizePrice(raw: string | null | undefined): string | null {
  if (!raw) return null;
  const match = raw.match(PRICE_PATTERN);
  if (!match) return null;

  let numeric = match[0].replace(/[ \u00A0]/g, '');
  // Whichever separator comes last is the decimal one; a lone comma is decimal.
  const decimalSeparator = numeric.lastIndexOf(',') > numeric.lastIndexOf('.') ? ',' : '.';
  const groupSeparator = decimalSeparator === ',' ? '.' : ',';
  const parts = numeric.split(groupSeparator).join('').split(decimalSeparator);
  const decimal = parts.length > 1 ? parts.pop() : undefined;
  numeric = decimal === undefined ? parts.join('') : `${parts.join('')}.${decimal}`;

  const parsed = Number.parseFloat(numeric);
  if (!Number.isFinite(parsed) || parsed >= MAX_PRICE) return null;
  return parsed.toFixed(2);
}

function topBy<T extends { score: number }>(items: T[]): T | null {
  let best: T | null = null;
  for (const item of items) {
    if (!best || item.score > best.score) best = item;
  }
  return best;
}

export function normalizeScan(outputs: InferenceOutputs): NormalizedScan {
  const productName = normalizeText(outputs.ocr.text) || null;
  const topLabel = topBy(outputs.classification);
  const topAnswer = topBy(outputs.vqa);
  const answer = topAnswer ? normalizeText(topAnswer.answer) || null : null;

  return {
    productName,
    category: topLabel ? topLabel.label : null,
    categoryScore: topLabel ? topLabel.score : null,
    answer,
    price: normalizePrice(answer),
  };
}
