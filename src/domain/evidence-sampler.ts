import type { Logger } from '../core/logging/index.js';
import { Err } from '../errors/factories.js';
import type { BackendProbePort, ProbeTarget } from '../ports/backend-probe.port.js';
import type { TimeClockPort } from '../ports/time-clock.port.js';
import type { Sample } from './types.js';

export interface SamplingOptions {
  readonly target: ProbeTarget;
  readonly cadenceMs: number;
  /** A probe still running after this long is recorded as a failed sample. */
  readonly probeTimeoutMs: number;
  readonly beginningMs: number;
  /** Exclusive: no probe starts at or after this time. */
  readonly endMs: number;
  readonly signal?: AbortSignal;
}

type ProbeOutcome =
  | { readonly kind: 'sample'; readonly sample: Sample }
  | { readonly kind: 'cancelled' };

/**
 * Polls one backend at a fixed cadence over `[beginningMs, endMs)`.
 *
 * Cancellation stops the loop and returns what was recorded so far; a probe
 * interrupted by cancellation is not recorded.
 */
export class EvidenceSampler {
  constructor(
    private readonly probe: BackendProbePort,
    private readonly clock: TimeClockPort,
    private readonly logger: Logger
  ) {}

  async run(options: SamplingOptions): Promise<readonly Sample[]> {
    const samples: Sample[] = [];
    let nextMs = Math.max(options.beginningMs, this.clock.nowMs());

    while (nextMs < options.endMs && !options.signal?.aborted) {
      const waitMs = nextMs - this.clock.nowMs();
      if (waitMs > 0) {
        await this.clock.sleep(waitMs, options.signal);
        if (options.signal?.aborted) break;
      }

      const startedMs = this.clock.nowMs();
      if (startedMs >= options.endMs) break;

      const outcome = await this.probeOnce(options, startedMs);
      if (outcome.kind === 'cancelled') break;
      samples.push(outcome.sample);

      nextMs = Math.max(nextMs + options.cadenceMs, this.clock.nowMs());
    }

    this.logger.debug(
      { target: options.target.name, samples: samples.length, failed: samples.filter((s) => !s.succeeded).length },
      'Sampling finished'
    );
    return samples;
  }

  private async probeOnce(options: SamplingOptions, startedMs: number): Promise<ProbeOutcome> {
    const controller = new AbortController();
    const onRunAbort = (): void => controller.abort();
    options.signal?.addEventListener('abort', onRunAbort, { once: true });

    let timer: NodeJS.Timeout | undefined;
    const timedOut = new Promise<'timeout'>((resolve) => {
      timer = setTimeout(() => {
        controller.abort();
        resolve('timeout');
      }, options.probeTimeoutMs);
    });

    try {
      const result = await Promise.race([this.probe.check(options.target, controller.signal), timedOut]);

      if (options.signal?.aborted) return { kind: 'cancelled' };

      if (result === 'timeout') {
        return {
          kind: 'sample',
          sample: {
            timestampMs: startedMs,
            succeeded: false,
            detail: Err.timeout(`probe of ${options.target.name}`, options.probeTimeoutMs).message,
          },
        };
      }

      return result.match(
        (success): ProbeOutcome => ({
          kind: 'sample',
          sample: { timestampMs: startedMs, succeeded: true, detail: 'ok', latencyMs: success.latencyMs },
        }),
        (failure): ProbeOutcome => ({
          kind: 'sample',
          sample: {
            timestampMs: startedMs,
            succeeded: false,
            detail: failure.message,
            latencyMs: failure.code === 'PROBE_FAILED' ? failure.latencyMs : undefined,
          },
        })
      );
    } finally {
      clearTimeout(timer);
      options.signal?.removeEventListener('abort', onRunAbort);
    }
  }
}
