/**
 * Every tsyringe token, grouped by layer.
 *
 * A new service gets a token here and a registration in container.ts;
 * only cli.ts and container.ts resolve them. Tests may register a fake
 * under the same token before initializeContainer runs.
 */
export const DI = {
  // ═══════════════════════════════════════════════════════════════════
  // PORTS (adapters chosen by the composition root)
  // ═══════════════════════════════════════════════════════════════════
  Ports: {
    /** Wall clock and sleeps */
    TimeClock: Symbol('Ports.TimeClock'),
    /** Creates cluster query clients */
    ClusterClientFactory: Symbol('Ports.ClusterClientFactory'),
    /** One health check against an API backend */
    BackendProbe: Symbol('Ports.BackendProbe'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // MONITOR TESTS
  // ═══════════════════════════════════════════════════════════════════
  MonitorTests: {
    /** Every available monitor test */
    Registrations: Symbol('MonitorTests.Registrations'),
    /** Runs the registered monitor tests over one window */
    Runner: Symbol('MonitorTests.Runner'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // LOGGING
  // ═══════════════════════════════════════════════════════════════════
  Logging: {
    /** Component logger factory */
    Factory: Symbol('Logging.Factory'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // RUNTIME (process-level behavior, injected for explicitness)
  // ═══════════════════════════════════════════════════════════════════
  Runtime: {
    /** Runtime mode (test/cli) */
    Mode: Symbol('Runtime.Mode'),
    /** Process lifecycle policy (signal handling) */
    ProcessLifecyclePolicy: Symbol('Runtime.ProcessLifecyclePolicy'),
    /** Process signal registration port */
    ProcessSignals: Symbol('Runtime.ProcessSignals'),
    /** Process terminator (composition roots only) */
    ProcessTerminator: Symbol('Runtime.ProcessTerminator'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // CONFIGURATION
  // ═══════════════════════════════════════════════════════════════════
  Config: {
    /** Complete application configuration (validated). */
    App: Symbol('Config.App'),
  },
} as const;

