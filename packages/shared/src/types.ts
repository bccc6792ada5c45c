export type ScanStatus = 'pending' | 'processing' | 'done' | 'failed';

export interface ScanProcessJob {
  scanId: string;
}

/** Pass-through view of the model outputs stored on a finished scan. */
export interface NormalizedScan {
  productName: string | null;
  category: string | null;
  categoryScore: number | null;
  answer: string | null;
  price: string | null;
}
