export interface Closable {
  name: string;
  close: () => unknown;
}

export function createShutdownHandler(resources: Closable[]): () => Promise<void> {
  return async () => {
    const results = await Promise.allSettled(resources.map(async (resource) => resource.close()));
    results.forEach((result, index) => {
      if (result.status === 'rejected') {
        console.error(`Error closing ${resources[index]?.name ?? `resource at index ${index}`}:`, result.reason);
      }
    });
  };
}

/** Aborts the returned controller on the first SIGINT or SIGTERM. */
export function abortOnSignals(signals: NodeJS.Signals[] = ['SIGINT', 'SIGTERM']): AbortController {
  const controller = new AbortController();
  for (const signal of signals) {
    process.once(signal, () => {
      console.log(`Received ${signal}, stopping after the current cycle...`);
      controller.abort();
    });
  }
  return controller;
}
