import type { ProcessSignals, ShutdownSignal } from '../ports/process-signals.js';

const SHUTDOWN_SIGNALS: readonly ShutdownSignal[] = ['SIGINT', 'SIGTERM'];

export class NodeProcessSignals implements ProcessSignals {
  onShutdownRequest(handler: (signal: ShutdownSignal) => void): () => void {
    const listeners = SHUTDOWN_SIGNALS.map((signal) => {
      const listener = (): void => handler(signal);
      process.on(signal, listener);
      return { signal, listener };
    });
    return () => {
      for (const { signal, listener } of listeners) process.off(signal, listener);
    };
  }
}
