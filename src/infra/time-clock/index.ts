import { setTimeout as delay } from 'timers/promises';
import type { TimeClockPort } from '../../ports/time-clock.port.js';

function isAbortError(e: unknown): boolean {
  return e instanceof Error && e.name === 'AbortError';
}

/**
 * Node time adapter using platform timers.
 */
export class NodeTimeClock implements TimeClockPort {
  nowMs(): number {
    return Date.now();
  }

  async sleep(ms: number, signal?: AbortSignal): Promise<void> {
    if (ms <= 0 || signal?.aborted) return;
    try {
      await delay(ms, undefined, { signal });
    } catch (e) {
      if (!isAbortError(e)) throw e;
    }
  }
}
