import type { AlertKind } from '@atlasvision/shared';

export type PriceChangeType =
  | 'first_price'
  | 'no_change'
  | 'price_drop'
  | 'price_increase';

export interface PriceChangeResult {
  type: PriceChangeType;
  changePercent: number;
}

export function analyzePriceChange(oldPrice: string | null, newPrice: string): PriceChangeResult {
  if (oldPrice === null) {
    return { type: 'first_price', changePercent: 0 };
  }

  const oldNum = parseFloat(oldPrice);
  const newNum = parseFloat(newPrice);

  if (newNum === oldNum) {
    return { type: 'no_change', changePercent: 0 };
  }

  const changePercent = oldNum === 0 ? 100 : (Math.abs(newNum - oldNum) / oldNum) * 100;
  return { type: newNum < oldNum ? 'price_drop' : 'price_increase', changePercent };
}

export function alertKindFor(change: PriceChangeResult): AlertKind | null {
  if (change.type === 'price_drop' || change.type === 'price_increase') return change.type;
  return null;
}

interface PriceAlertInput {
  productName: string;
  oldPrice: string;
  newPrice: string;
  change: PriceChangeResult;
}

export function formatPriceAlert({ productName, oldPrice, newPrice, change }: PriceAlertInput): string {
  const sign = change.type === 'price_drop' ? '-' : '+';
  return `${productName}: ${oldPrice} → ${newPrice} (${sign}${change.changePercent.toFixed(0)}%)`;
}
