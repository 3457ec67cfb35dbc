import type { ProcessSignals, ShutdownSignal } from '../ports/process-signals.js';

/** Test mode: nothing is installed, so a test run never reacts to Ctrl-C. */
export class NoopProcessSignals implements ProcessSignals {
  onShutdownRequest(_handler: (signal: ShutdownSignal) => void): () => void {
    return () => undefined;
  }
}
