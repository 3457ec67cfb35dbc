/**
 * CLUSTERMON_* environment variables, parsed once into AppConfig.
 * Every problem is reported as a ConfigIssue; nothing here throws.
 */

import { z } from 'zod';
import { err, ok, type Result } from 'neverthrow';
import { Err } from '../errors/factories.js';
import type { ConfigIssue, ConfigInvalidError } from '../errors/app-error.js';

export type ClusterTarget =
  | { readonly kind: 'unconfigured' }
  | { readonly kind: 'configured'; readonly apiServerUrl: string; readonly bearerToken?: string };

export type ArtifactTarget = { readonly kind: 'none' } | { readonly kind: 'directory'; readonly path: string };

export interface AppConfig {
  readonly cluster: {
    readonly target: ClusterTarget;
    readonly requestTimeoutMs: number;
  };
  readonly sampling: {
    readonly intervalMs: number;
    readonly probeTimeoutMs: number;
    readonly mergeGapMs: number;
  };
  readonly artifacts: ArtifactTarget;
}

export interface LoadConfigOptions {
  readonly env: Record<string, string | undefined>;
}

// =============================================================================
// Schema
// =============================================================================

function milliseconds(name: string, defaultMs: number, min: number) {
  return z
    .string()
    .optional()
    .transform((v) => (v === undefined || v === '' ? undefined : Number(v)))
    .pipe(
      z
        .number()
        .int(`${name} must be an integer`)
        .min(min, `${name} must be >= ${min}`)
        .max(3_600_000, `${name} cannot exceed 1 hour (3600000ms)`)
        .default(defaultMs)
    );
}

const EnvSchema = z.object({
  CLUSTERMON_API_SERVER: z.string().url('CLUSTERMON_API_SERVER must be a URL').optional(),
  CLUSTERMON_TOKEN: z.string().min(1).optional(),

  CLUSTERMON_REQUEST_TIMEOUT_MS: milliseconds('CLUSTERMON_REQUEST_TIMEOUT_MS', 30_000, 1),
  CLUSTERMON_SAMPLE_INTERVAL_MS: milliseconds('CLUSTERMON_SAMPLE_INTERVAL_MS', 1_000, 1),
  CLUSTERMON_PROBE_TIMEOUT_MS: milliseconds('CLUSTERMON_PROBE_TIMEOUT_MS', 5_000, 1),
  CLUSTERMON_MERGE_GAP_MS: milliseconds('CLUSTERMON_MERGE_GAP_MS', 2_000, 0),

  CLUSTERMON_ARTIFACT_DIR: z.string().min(1).optional(),
});

type ParsedEnv = z.infer<typeof EnvSchema>;

const ConfigSchema = EnvSchema.transform(buildConfig).brand<'ValidatedAppConfig'>();

/** Config that went through {@link loadConfig}. */
export type ValidatedConfig = z.output<typeof ConfigSchema>;

// =============================================================================
// Public API
// =============================================================================

export function loadConfig(options: LoadConfigOptions): Result<ValidatedConfig, ConfigInvalidError> {
  const parsed = ConfigSchema.safeParse(options.env);

  if (!parsed.success) {
    return err(Err.configInvalid(toConfigIssues(parsed.error)));
  }

  return ok(parsed.data);
}

// =============================================================================
// Internal
// =============================================================================

function buildConfig(env: ParsedEnv): AppConfig {
  const target: ClusterTarget =
    env.CLUSTERMON_API_SERVER === undefined
      ? { kind: 'unconfigured' }
      : { kind: 'configured', apiServerUrl: env.CLUSTERMON_API_SERVER, bearerToken: env.CLUSTERMON_TOKEN };

  const artifacts: ArtifactTarget =
    env.CLUSTERMON_ARTIFACT_DIR === undefined
      ? { kind: 'none' }
      : { kind: 'directory', path: env.CLUSTERMON_ARTIFACT_DIR };

  return {
    cluster: { target, requestTimeoutMs: env.CLUSTERMON_REQUEST_TIMEOUT_MS },
    sampling: {
      intervalMs: env.CLUSTERMON_SAMPLE_INTERVAL_MS,
      probeTimeoutMs: env.CLUSTERMON_PROBE_TIMEOUT_MS,
      mergeGapMs: env.CLUSTERMON_MERGE_GAP_MS,
    },
    artifacts,
  };
}

function toConfigIssues(error: z.ZodError): readonly ConfigIssue[] {
  return error.errors.map((issue) => ({
    path: issue.path.length ? issue.path.join('.') : '(root)',
    message: issue.message,
  }));
}
