/**
 * Shutdown requests from outside the process (Ctrl-C, a supervisor's TERM).
 * Commands subscribe through this port instead of calling `process.on`.
 */
export type ShutdownSignal = 'SIGINT' | 'SIGTERM';

export interface ProcessSignals {
  /**
   * Call `handler` with the signal's name on every shutdown request until
   * the returned function is called.
   */
  onShutdownRequest(handler: (signal: ShutdownSignal) => void): () => void;
}
