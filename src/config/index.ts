/**
 * Configuration module.
 *
 * Holds the executor configuration (retry policy and probe timeout), the
 * enrichment policy applied to resource profiles, and the service settings
 * read from the environment.
 *
 * @module config
 */

import { homedir } from 'os';
import { join } from 'path';
import { z } from 'zod';
import { ConfigurationError } from '../errors/index.js';
import { LogLevel, parseLogLevel } from '../observability/index.js';
import {
  DEFAULT_CONNECT_TIMEOUT_MS,
  DEFAULT_IDLE_LIFETIME_MS,
  DEFAULT_KEEPALIVE_INTERVAL_MS,
  DEFAULT_KEEPALIVE_PROBE_INTERVAL_MS,
  DEFAULT_OPERATION_TIMEOUT_MS,
  DEFAULT_POOL_MAX,
  DEFAULT_POOL_MIN,
  DEFAULT_PRUNING_INTERVAL_MS,
  DEFAULT_STATEMENT_CACHE_MAX,
  DEFAULT_STATEMENT_CACHE_MIN_USES,
  EnrichmentOverrides,
  EnrichmentPolicy,
} from '../types/index.js';

/** Environment variable prefix */
export const ENV_PREFIX = 'PG_RESILIENCE_';

/** Longest delay Node timers honour; larger values fire after 1 ms */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

const delayMs = () => z.number().int().nonnegative().max(MAX_TIMER_DELAY_MS);
const timeoutMs = () => z.number().int().positive().max(MAX_TIMER_DELAY_MS);

// ============================================================================
// Executor Configuration
// ============================================================================

/**
 * Retry policy for one run.
 */
export interface RetryPolicy {
  /** Maximum operation attempts, including the first (default: 3) */
  maxAttempts: number;
  /** Delay before the second attempt in milliseconds (default: 500) */
  initialDelayMs: number;
  /** Upper bound for any delay in milliseconds (default: 5000) */
  delayCapMs: number;
  /** Exclusive upper bound of the uniform jitter in milliseconds (default: 100) */
  jitterMs: number;
}

/**
 * Default retry policy.
 */
export const DEFAULT_RETRY_POLICY: Readonly<RetryPolicy> = Object.freeze({
  maxAttempts: 3,
  initialDelayMs: 500,
  delayCapMs: 5000,
  jitterMs: 100,
});

/** Health probe timeout, distinct from the operation timeout */
export const DEFAULT_PROBE_TIMEOUT_MS = 5000;

/**
 * Immutable executor configuration.
 */
export interface ExecutorConfig {
  readonly retry: Readonly<RetryPolicy>;
  readonly probeTimeoutMs: number;
}

export const retryPolicySchema = z.object({
  maxAttempts: z.number().int().min(1).max(100),
  initialDelayMs: delayMs(),
  delayCapMs: delayMs(),
  jitterMs: delayMs(),
});

const executorConfigSchema = z.object({
  retry: retryPolicySchema,
  probeTimeoutMs: timeoutMs(),
});

/**
 * Formats zod issues as `path: message` pairs.
 */
export function formatIssues(error: z.ZodError): string {
  return error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join(', ');
}

/**
 * Creates a validated, frozen executor configuration.
 *
 * @throws {ConfigurationError} If any value is out of range
 */
export function createExecutorConfig(
  overrides: { retry?: Partial<RetryPolicy>; probeTimeoutMs?: number } = {}
): ExecutorConfig {
  const candidate = {
    retry: { ...DEFAULT_RETRY_POLICY, ...overrides.retry },
    probeTimeoutMs: overrides.probeTimeoutMs ?? DEFAULT_PROBE_TIMEOUT_MS,
  };

  const result = executorConfigSchema.safeParse(candidate);
  if (!result.success) {
    throw new ConfigurationError(`Invalid executor configuration: ${formatIssues(result.error)}`);
  }

  return Object.freeze({
    retry: Object.freeze({ ...result.data.retry }),
    probeTimeoutMs: result.data.probeTimeoutMs,
  });
}

/**
 * Reads an integer environment variable.
 *
 * @throws {ConfigurationError} If the variable is set but not an integer
 */
function readIntEnv(env: NodeJS.ProcessEnv, key: string): number | undefined {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') {
    return undefined;
  }
  const value = Number(raw);
  if (!Number.isInteger(value)) {
    throw new ConfigurationError(`${key} must be an integer, got '${raw}'`);
  }
  return value;
}

/**
 * Creates executor configuration from environment variables.
 *
 * Reads `PG_RESILIENCE_MAX_ATTEMPTS`, `PG_RESILIENCE_INITIAL_DELAY_MS`,
 * `PG_RESILIENCE_DELAY_CAP_MS`, `PG_RESILIENCE_JITTER_MS` and
 * `PG_RESILIENCE_PROBE_TIMEOUT_MS`; unset values keep their defaults.
 */
export function loadExecutorConfigFromEnv(env: NodeJS.ProcessEnv = process.env): ExecutorConfig {
  const retry: Partial<RetryPolicy> = {};

  const maxAttempts = readIntEnv(env, `${ENV_PREFIX}MAX_ATTEMPTS`);
  if (maxAttempts !== undefined) retry.maxAttempts = maxAttempts;

  const initialDelayMs = readIntEnv(env, `${ENV_PREFIX}INITIAL_DELAY_MS`);
  if (initialDelayMs !== undefined) retry.initialDelayMs = initialDelayMs;

  const delayCapMs = readIntEnv(env, `${ENV_PREFIX}DELAY_CAP_MS`);
  if (delayCapMs !== undefined) retry.delayCapMs = delayCapMs;

  const jitterMs = readIntEnv(env, `${ENV_PREFIX}JITTER_MS`);
  if (jitterMs !== undefined) retry.jitterMs = jitterMs;

  const probeTimeoutMs = readIntEnv(env, `${ENV_PREFIX}PROBE_TIMEOUT_MS`);

  return createExecutorConfig({
    retry,
    ...(probeTimeoutMs !== undefined ? { probeTimeoutMs } : {}),
  });
}

// ============================================================================
// Enrichment Policy
// ============================================================================

/**
 * Default enrichment applied to every resource.
 */
export const DEFAULT_ENRICHMENT_POLICY: Readonly<EnrichmentPolicy> = Object.freeze({
  connectTimeoutMs: DEFAULT_CONNECT_TIMEOUT_MS,
  operationTimeoutMs: DEFAULT_OPERATION_TIMEOUT_MS,
  pool: Object.freeze({ min: DEFAULT_POOL_MIN, max: DEFAULT_POOL_MAX }),
  idleLifetimeMs: DEFAULT_IDLE_LIFETIME_MS,
  pruningIntervalMs: DEFAULT_PRUNING_INTERVAL_MS,
  keepalive: Object.freeze({
    intervalMs: DEFAULT_KEEPALIVE_INTERVAL_MS,
    probeIntervalMs: DEFAULT_KEEPALIVE_PROBE_INTERVAL_MS,
  }),
  statementCache: Object.freeze({
    maxCached: DEFAULT_STATEMENT_CACHE_MAX,
    minUsesBeforeCache: DEFAULT_STATEMENT_CACHE_MIN_USES,
  }),
  loadBalanceHosts: false,
});

/**
 * Zod schema for policy overrides, as they appear in configuration files.
 */
export const enrichmentOverridesSchema = z
  .object({
    connectTimeoutMs: timeoutMs(),
    operationTimeoutMs: timeoutMs(),
    pool: z
      .object({
        min: z.number().int().nonnegative(),
        max: z.number().int().positive(),
      })
      .partial()
      .strict(),
    idleLifetimeMs: timeoutMs(),
    pruningIntervalMs: timeoutMs(),
    keepalive: z
      .object({
        intervalMs: timeoutMs(),
        probeIntervalMs: timeoutMs(),
      })
      .partial()
      .strict(),
    statementCache: z
      .object({
        maxCached: z.number().int().nonnegative(),
        minUsesBeforeCache: z.number().int().positive(),
      })
      .partial()
      .strict(),
    loadBalanceHosts: z.boolean(),
  })
  .partial()
  .strict();

/**
 * Applies overrides on top of a policy. Nested groups merge field by field.
 */
export function mergePolicy(
  base: Readonly<EnrichmentPolicy>,
  overrides: EnrichmentOverrides = {}
): EnrichmentPolicy {
  return {
    connectTimeoutMs: overrides.connectTimeoutMs ?? base.connectTimeoutMs,
    operationTimeoutMs: overrides.operationTimeoutMs ?? base.operationTimeoutMs,
    pool: {
      min: overrides.pool?.min ?? base.pool.min,
      max: overrides.pool?.max ?? base.pool.max,
    },
    idleLifetimeMs: overrides.idleLifetimeMs ?? base.idleLifetimeMs,
    pruningIntervalMs: overrides.pruningIntervalMs ?? base.pruningIntervalMs,
    keepalive: {
      intervalMs: overrides.keepalive?.intervalMs ?? base.keepalive.intervalMs,
      probeIntervalMs: overrides.keepalive?.probeIntervalMs ?? base.keepalive.probeIntervalMs,
    },
    statementCache: {
      maxCached: overrides.statementCache?.maxCached ?? base.statementCache.maxCached,
      minUsesBeforeCache:
        overrides.statementCache?.minUsesBeforeCache ?? base.statementCache.minUsesBeforeCache,
    },
    loadBalanceHosts: overrides.loadBalanceHosts ?? base.loadBalanceHosts,
  };
}

/**
 * Validates policy invariants.
 *
 * @returns A list of violations; empty when the policy is valid
 */
export function validatePolicy(policy: EnrichmentPolicy): string[] {
  const errors: string[] = [];

  const timeouts: Array<[string, number]> = [
    ['connectTimeoutMs', policy.connectTimeoutMs],
    ['operationTimeoutMs', policy.operationTimeoutMs],
    ['idleLifetimeMs', policy.idleLifetimeMs],
    ['pruningIntervalMs', policy.pruningIntervalMs],
    ['keepalive.intervalMs', policy.keepalive.intervalMs],
    ['keepalive.probeIntervalMs', policy.keepalive.probeIntervalMs],
  ];
  for (const [name, value] of timeouts) {
    if (!Number.isFinite(value) || value <= 0) {
      errors.push(`${name} must be greater than 0`);
    } else if (value > MAX_TIMER_DELAY_MS) {
      errors.push(`${name} cannot exceed ${MAX_TIMER_DELAY_MS}`);
    }
  }

  if (policy.pool.min < 0) {
    errors.push('pool.min cannot be negative');
  }
  if (policy.pool.max < 1) {
    errors.push('pool.max must be at least 1');
  }
  if (policy.pool.min > policy.pool.max) {
    errors.push(`pool.min (${policy.pool.min}) cannot exceed pool.max (${policy.pool.max})`);
  }

  if (policy.statementCache.maxCached < 0) {
    errors.push('statementCache.maxCached cannot be negative');
  }
  if (policy.statementCache.minUsesBeforeCache < 1) {
    errors.push('statementCache.minUsesBeforeCache must be at least 1');
  }

  return errors;
}

// ============================================================================
// Service Settings
// ============================================================================

/** Settings file read from the working directory */
export const DEFAULT_CONFIG_FILE = 'databases.json';

/** Credentials file read from the home directory */
export const DEFAULT_CREDENTIALS_FILE = '.pg-resilience-credentials.json';

/**
 * Settings resolved from the environment at startup.
 */
export interface ServiceSettings {
  logLevel: LogLevel;
  /** Base configuration file (optional on disk) */
  configPath: string;
  /** Credentials file layered over the base file (optional on disk) */
  credentialsPath: string;
}

/**
 * Reads service settings from `PG_RESILIENCE_LOG_LEVEL`,
 * `PG_RESILIENCE_CONFIG` and `PG_RESILIENCE_CREDENTIALS`.
 */
export function loadSettingsFromEnv(env: NodeJS.ProcessEnv = process.env): ServiceSettings {
  return {
    logLevel: parseLogLevel(env[`${ENV_PREFIX}LOG_LEVEL`]),
    configPath: env[`${ENV_PREFIX}CONFIG`] || join(process.cwd(), DEFAULT_CONFIG_FILE),
    credentialsPath: env[`${ENV_PREFIX}CREDENTIALS`] || join(homedir(), DEFAULT_CREDENTIALS_FILE),
  };
}
