export interface Closable {
  name: string;
  close: () => Promise<unknown>;
}

export function createShutdownHandler(resources: Closable[]): () => Promise<void> {
  let closing: Promise<void> | null = null;

  return () => {
    // SIGINT followed by SIGTERM must not close resources twice.
    closing ??= (async () => {
      const results = await Promise.allSettled(resources.map((r) => r.close()));
      results.forEach((result, index) => {
        if (result.status === 'rejected') {
          console.error(`Error closing ${resources[index].name}:`, result.reason);
        }
      });
    })();
    return closing;
  };
}
