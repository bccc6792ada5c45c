export const QUEUES = {
  SCAN_PROCESS: 'scan-process',
} as const;
