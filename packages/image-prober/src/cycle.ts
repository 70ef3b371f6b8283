import { processCandidate, type CycleReport, type IdentityStore, type Notifier } from '@dropwatch/shared';
import type { ProbeCursor } from './cursor.js';
import type { ProbeResult } from './probe.js';
import { toImageItem } from './notifications.js';

export interface ProbeCycleDeps {
  cursor: ProbeCursor;
  probe: (id: number) => Promise<ProbeResult>;
  store: IdentityStore;
  notifier: Notifier;
}

/** One tick: probe the id under the cursor, record it if it is new, move on. */
export async function runProbeCycle(deps: ProbeCycleDeps): Promise<CycleReport> {
  const { cursor } = deps;
  const id = cursor.current;

  try {
    const result = await deps.probe(id);

    if (!result.found) {
      if (result.error) {
        console.error(`[${result.statusCode}] ${result.error.message}`);
      }
      console.log(`[${result.statusCode}] image not available: ID ${id}`);
      return { fetchFailed: result.statusCode === 0 };
    }

    const outcome = await processCandidate(toImageItem(id, result.url), deps);
    if (outcome === 'new') {
      console.log(`[${result.statusCode}] new image found: ID ${id}`);
    } else if (outcome === 'known') {
      console.log(`[${result.statusCode}] image already known: ID ${id}`);
    }
    return { fetchFailed: false };
  } finally {
    const { wrapped } = cursor.advance();
    if (wrapped) {
      console.log(`Completed range ${cursor.startId} - ${cursor.endId}, starting over...`);
    }
  }
}
