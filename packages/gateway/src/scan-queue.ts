import type { Queue } from 'bullmq';
import { QUEUES } from '@atlasvision/shared';
import type { ScanProcessJob } from '@atlasvision/shared';

export interface ScanQueue {
  enqueue(scanId: string): Promise<void>;
}

export function createScanQueue(queue: Queue<ScanProcessJob>): ScanQueue {
  return {
    async enqueue(scanId) {
      // Job id = scan id, so a repeated enqueue of the same scan is a no-op.
      await queue.add(QUEUES.SCAN_PROCESS, { scanId }, { jobId: scanId });
    },
  };
}
