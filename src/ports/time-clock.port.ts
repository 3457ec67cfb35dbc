/**
 * Time port.
 *
 * The sampler and orchestrator never read Date or timers directly, so tests
 * can drive a run window deterministically.
 */
export interface TimeClockPort {
  /** Current time in milliseconds since the Unix epoch. */
  nowMs(): number;

  /**
   * Wait for `ms` milliseconds. Resolves early (never rejects) when `signal` aborts.
   */
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}
