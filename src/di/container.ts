import 'reflect-metadata';
import { container, type DependencyContainer, instanceCachingFactory } from 'tsyringe';
import { err, ok, type Result } from 'neverthrow';
import { DI } from './tokens.js';
import { assertNever } from '../runtime/assert-never.js';
import type { RuntimeMode } from '../runtime/runtime-mode.js';
import type { ProcessLifecyclePolicy } from '../runtime/process-lifecycle-policy.js';
import type { ProcessSignals } from '../runtime/ports/process-signals.js';
import { NodeProcessSignals } from '../runtime/adapters/node-process-signals.js';
import { NoopProcessSignals } from '../runtime/adapters/noop-process-signals.js';
import type { ProcessTerminator } from '../runtime/ports/process-terminator.js';
import { NodeProcessTerminator } from '../runtime/adapters/node-process-terminator.js';
import { ThrowingProcessTerminator } from '../runtime/adapters/throwing-process-terminator.js';
import { loadConfig, type ValidatedConfig } from '../config/app-config.js';
import type { ConfigInvalidError } from '../errors/app-error.js';
import { PinoLoggerFactory, type ILoggerFactory } from '../core/logging/index.js';
import type { TimeClockPort } from '../ports/time-clock.port.js';
import type { ClusterClientFactory } from '../ports/cluster-query.port.js';
import type { BackendProbePort } from '../ports/backend-probe.port.js';
import { NodeTimeClock } from '../infra/time-clock/index.js';
import { KubeRestClusterClientFactory } from '../infra/kube-rest-client/index.js';
import { HttpBackendProbe } from '../infra/http-backend-probe/index.js';
import type { MonitorTestRegistration } from '../monitortest/monitor-test.js';
import { MonitorTestRunner } from '../monitortest/run-orchestrator.js';
import { createMonitorTestRegistrations } from '../monitortests/index.js';

// ═══════════════════════════════════════════════════════════════════════════
// STATE
// ═══════════════════════════════════════════════════════════════════════════

let initialized = false;

export interface ContainerInitOptions {
  readonly runtimeMode?: RuntimeMode;
  /** Environment to read configuration from. Defaults to process.env. */
  readonly env?: Record<string, string | undefined>;
}

// ═══════════════════════════════════════════════════════════════════════════
// CONFIGURATION REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════

function registerConfig(options: ContainerInitOptions): Result<void, ConfigInvalidError> {
  // Tests may inject config explicitly before container initialization.
  if (container.isRegistered(DI.Config.App)) return ok(undefined);

  return loadConfig({ env: options.env ?? process.env }).map((config) => {
    container.register<ValidatedConfig>(DI.Config.App, { useValue: config });
  });
}

// ═══════════════════════════════════════════════════════════════════════════
// RUNTIME REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════

function detectRuntimeMode(): RuntimeMode {
  // Env access is allowed here (composition root), but should not leak into services.
  if (process.env['VITEST'] || process.env['NODE_ENV'] === 'test') {
    return { kind: 'test' };
  }
  return { kind: 'cli' };
}

function toProcessLifecyclePolicy(mode: RuntimeMode): ProcessLifecyclePolicy {
  switch (mode.kind) {
    case 'test':
      return { kind: 'leave_signals_alone' };
    case 'cli':
      return { kind: 'cancel_run_on_signal' };
    default:
      return assertNever(mode);
  }
}

function registerRuntime(options: ContainerInitOptions): void {
  const mode = options.runtimeMode ?? detectRuntimeMode();
  const policy = toProcessLifecyclePolicy(mode);

  container.register<RuntimeMode>(DI.Runtime.Mode, { useValue: mode });
  container.register<ProcessLifecyclePolicy>(DI.Runtime.ProcessLifecyclePolicy, { useValue: policy });

  const signals: ProcessSignals =
    policy.kind === 'leave_signals_alone' ? new NoopProcessSignals() : new NodeProcessSignals();
  container.register<ProcessSignals>(DI.Runtime.ProcessSignals, { useValue: signals });

  const terminator: ProcessTerminator =
    mode.kind === 'test' ? new ThrowingProcessTerminator() : new NodeProcessTerminator();
  container.register<ProcessTerminator>(DI.Runtime.ProcessTerminator, { useValue: terminator });
}

// ═══════════════════════════════════════════════════════════════════════════
// PORTS AND SERVICES
// ═══════════════════════════════════════════════════════════════════════════

function registerIfAbsent<T>(token: symbol, factory: (c: DependencyContainer) => T): void {
  if (container.isRegistered(token)) return;
  container.register<T>(token, { useFactory: instanceCachingFactory<T>(factory) });
}

function registerServices(): void {
  registerIfAbsent<ILoggerFactory>(DI.Logging.Factory, (c) => c.resolve(PinoLoggerFactory));

  registerIfAbsent<TimeClockPort>(DI.Ports.TimeClock, () => new NodeTimeClock());

  registerIfAbsent<ClusterClientFactory>(DI.Ports.ClusterClientFactory, (c) => {
    const config = c.resolve<ValidatedConfig>(DI.Config.App);
    return new KubeRestClusterClientFactory(config.cluster.target, config.cluster.requestTimeoutMs);
  });

  registerIfAbsent<BackendProbePort>(DI.Ports.BackendProbe, (c) => {
    const config = c.resolve<ValidatedConfig>(DI.Config.App);
    return new HttpBackendProbe(config.cluster.target, c.resolve<TimeClockPort>(DI.Ports.TimeClock));
  });

  registerIfAbsent<readonly MonitorTestRegistration[]>(DI.MonitorTests.Registrations, (c) =>
    createMonitorTestRegistrations({
      clientFactory: c.resolve<ClusterClientFactory>(DI.Ports.ClusterClientFactory),
      probe: c.resolve<BackendProbePort>(DI.Ports.BackendProbe),
      clock: c.resolve<TimeClockPort>(DI.Ports.TimeClock),
      loggerFactory: c.resolve<ILoggerFactory>(DI.Logging.Factory),
      sampling: c.resolve<ValidatedConfig>(DI.Config.App).sampling,
    })
  );

  registerIfAbsent<MonitorTestRunner>(
    DI.MonitorTests.Runner,
    (c) =>
      new MonitorTestRunner(
        c.resolve<readonly MonitorTestRegistration[]>(DI.MonitorTests.Registrations),
        c.resolve<TimeClockPort>(DI.Ports.TimeClock),
        c.resolve<ILoggerFactory>(DI.Logging.Factory).create('MonitorTestRunner')
      )
  );
}

// ═══════════════════════════════════════════════════════════════════════════
// PUBLIC API
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Initialize the DI container: runtime, config, ports and services.
 *
 * Idempotent. Fails only when the configuration is invalid; nothing is
 * registered past the runtime in that case.
 */
export function initializeContainer(options: ContainerInitOptions = {}): Result<void, ConfigInvalidError> {
  if (initialized) return ok(undefined);

  registerRuntime(options);
  const configured = registerConfig(options);
  if (configured.isErr()) return err(configured.error);

  registerServices();
  initialized = true;
  return ok(undefined);
}

/** Drop every registration. Tests call this after each case. */
export function resetContainer(): void {
  container.reset();
  initialized = false;
}

export function isInitialized(): boolean {
  return initialized;
}

export { container };
