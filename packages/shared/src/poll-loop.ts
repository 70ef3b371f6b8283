import { setTimeout as delay } from 'node:timers/promises';
import { computeBackoffDelay, type BackoffPolicy } from './backoff.js';
import { errorMessage } from './errors.js';
import type { CycleReport } from './types.js';

export type Sleep = (ms: number, signal: AbortSignal) => Promise<void>;

export interface PollLoopOptions extends BackoffPolicy {
  name: string;
  runCycle: () => Promise<CycleReport>;
  signal: AbortSignal;
  sleep?: Sleep;
  random?: () => number;
}

export const abortableSleep: Sleep = async (ms, signal) => {
  await delay(ms, undefined, { signal });
};

/**
 * Runs cycles back to back until the signal aborts. A failing cycle is logged
 * and followed by a (backed-off) sleep; it never ends the loop.
 * Cancellation is checked between cycles and interrupts the sleep, not an
 * in-flight cycle.
 */
export async function runPollLoop(options: PollLoopOptions): Promise<{ cycles: number }> {
  const { name, runCycle, signal, sleep = abortableSleep, random = Math.random } = options;
  let cycles = 0;
  let consecutiveFailures = 0;

  while (!signal.aborted) {
    let failed: boolean;
    try {
      const report = await runCycle();
      failed = report.fetchFailed;
    } catch (err) {
      console.error(`Error: ${errorMessage(err)}`);
      failed = true;
    }
    cycles += 1;
    consecutiveFailures = failed ? consecutiveFailures + 1 : 0;

    const waitMs = computeBackoffDelay(options, consecutiveFailures, random);
    if (consecutiveFailures > 1) {
      console.warn(`${consecutiveFailures} failed cycles in a row, backing off ${waitMs}ms`);
    }

    try {
      await sleep(waitMs, signal);
    } catch (err) {
      if (signal.aborted) break;
      throw err;
    }
  }

  console.log(`${name} stopped`);
  return { cycles };
}
