/**
 * Tests for configuration.
 */

import { homedir } from 'os';
import { join } from 'path';
import { describe, it, expect } from 'vitest';
import {
  createExecutorConfig,
  DEFAULT_ENRICHMENT_POLICY,
  DEFAULT_RETRY_POLICY,
  enrichmentOverridesSchema,
  loadExecutorConfigFromEnv,
  loadSettingsFromEnv,
  MAX_TIMER_DELAY_MS,
  mergePolicy,
  validatePolicy,
} from '../config/index.js';
import { ConfigurationError } from '../errors/index.js';
import { LogLevel } from '../observability/index.js';

describe('createExecutorConfig', () => {
  it('should use defaults', () => {
    const config = createExecutorConfig();
    expect(config.retry).toEqual({
      maxAttempts: 3,
      initialDelayMs: 500,
      delayCapMs: 5000,
      jitterMs: 100,
    });
    expect(config.probeTimeoutMs).toBe(5000);
  });

  it('should be immutable', () => {
    const config = createExecutorConfig();
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.retry)).toBe(true);
    expect(Object.isFrozen(DEFAULT_RETRY_POLICY)).toBe(true);
  });

  it('should apply overrides', () => {
    const config = createExecutorConfig({ retry: { maxAttempts: 5 }, probeTimeoutMs: 1000 });
    expect(config.retry.maxAttempts).toBe(5);
    expect(config.retry.initialDelayMs).toBe(500);
    expect(config.probeTimeoutMs).toBe(1000);
  });

  it('should reject out-of-range values', () => {
    expect(() => createExecutorConfig({ retry: { maxAttempts: 0 } })).toThrow(ConfigurationError);
    expect(() => createExecutorConfig({ retry: { maxAttempts: 0 } })).toThrow(
      /Invalid executor configuration: retry\.maxAttempts:/
    );
    expect(() => createExecutorConfig({ probeTimeoutMs: 0 })).toThrow(ConfigurationError);
    expect(() => createExecutorConfig({ retry: { jitterMs: 1.5 } })).toThrow(ConfigurationError);
  });

  it('should reject delays Node timers cannot represent', () => {
    expect(() => createExecutorConfig({ retry: { delayCapMs: MAX_TIMER_DELAY_MS } })).not.toThrow();
    expect(() => createExecutorConfig({ retry: { delayCapMs: MAX_TIMER_DELAY_MS + 1 } })).toThrow(
      /Invalid executor configuration: retry\.delayCapMs:/
    );
    expect(() => createExecutorConfig({ probeTimeoutMs: 3_000_000_000 })).toThrow(
      ConfigurationError
    );
  });
});

describe('loadExecutorConfigFromEnv', () => {
  it('should read prefixed variables', () => {
    const config = loadExecutorConfigFromEnv({
      PG_RESILIENCE_MAX_ATTEMPTS: '4',
      PG_RESILIENCE_INITIAL_DELAY_MS: '200',
      PG_RESILIENCE_DELAY_CAP_MS: '2000',
      PG_RESILIENCE_JITTER_MS: '0',
      PG_RESILIENCE_PROBE_TIMEOUT_MS: '750',
    });
    expect(config.retry).toEqual({
      maxAttempts: 4,
      initialDelayMs: 200,
      delayCapMs: 2000,
      jitterMs: 0,
    });
    expect(config.probeTimeoutMs).toBe(750);
  });

  it('should keep defaults for unset or blank variables', () => {
    const config = loadExecutorConfigFromEnv({ PG_RESILIENCE_MAX_ATTEMPTS: '  ' });
    expect(config.retry).toEqual(DEFAULT_RETRY_POLICY);
  });

  it('should reject non-integers', () => {
    expect(() => loadExecutorConfigFromEnv({ PG_RESILIENCE_MAX_ATTEMPTS: 'three' })).toThrow(
      "Configuration error: PG_RESILIENCE_MAX_ATTEMPTS must be an integer, got 'three'"
    );
  });
});

describe('mergePolicy', () => {
  it('should return the base policy without overrides', () => {
    expect(mergePolicy(DEFAULT_ENRICHMENT_POLICY)).toEqual({
      connectTimeoutMs: 30000,
      operationTimeoutMs: 120000,
      pool: { min: 1, max: 20 },
      idleLifetimeMs: 300000,
      pruningIntervalMs: 10000,
      keepalive: { intervalMs: 30000, probeIntervalMs: 10000 },
      statementCache: { maxCached: 10, minUsesBeforeCache: 2 },
      loadBalanceHosts: false,
    });
  });

  it('should merge nested groups field by field', () => {
    const merged = mergePolicy(DEFAULT_ENRICHMENT_POLICY, {
      operationTimeoutMs: 60000,
      pool: { max: 5 },
      keepalive: { probeIntervalMs: 2000 },
    });
    expect(merged.operationTimeoutMs).toBe(60000);
    expect(merged.pool).toEqual({ min: 1, max: 5 });
    expect(merged.keepalive).toEqual({ intervalMs: 30000, probeIntervalMs: 2000 });
    expect(merged.connectTimeoutMs).toBe(30000);
  });

  it('should not modify the base policy', () => {
    mergePolicy(DEFAULT_ENRICHMENT_POLICY, { pool: { min: 3 } });
    expect(DEFAULT_ENRICHMENT_POLICY.pool.min).toBe(1);
  });
});

describe('validatePolicy', () => {
  it('should accept the defaults', () => {
    expect(validatePolicy(mergePolicy(DEFAULT_ENRICHMENT_POLICY))).toEqual([]);
  });

  it('should report pool bound violations', () => {
    const policy = mergePolicy(DEFAULT_ENRICHMENT_POLICY, { pool: { min: 8, max: 4 } });
    expect(validatePolicy(policy)).toEqual(['pool.min (8) cannot exceed pool.max (4)']);
  });

  it('should report non-positive timeouts', () => {
    const policy = mergePolicy(DEFAULT_ENRICHMENT_POLICY, {
      connectTimeoutMs: 0,
      keepalive: { intervalMs: -1 },
    });
    expect(validatePolicy(policy)).toEqual([
      'connectTimeoutMs must be greater than 0',
      'keepalive.intervalMs must be greater than 0',
    ]);
  });

  it('should report timers beyond the Node timer limit', () => {
    const policy = mergePolicy(DEFAULT_ENRICHMENT_POLICY, {
      operationTimeoutMs: 3_000_000_000,
      pruningIntervalMs: MAX_TIMER_DELAY_MS,
    });
    expect(validatePolicy(policy)).toEqual(['operationTimeoutMs cannot exceed 2147483647']);
  });
});

describe('enrichmentOverridesSchema', () => {
  it('should accept partial overrides', () => {
    const result = enrichmentOverridesSchema.safeParse({ pool: { max: 4 }, loadBalanceHosts: true });
    expect(result.success).toBe(true);
  });

  it('should reject unknown keys', () => {
    expect(enrichmentOverridesSchema.safeParse({ poolSize: 4 }).success).toBe(false);
    expect(enrichmentOverridesSchema.safeParse({ pool: { size: 4 } }).success).toBe(false);
  });

  it('should reject timeouts beyond the Node timer limit', () => {
    expect(
      enrichmentOverridesSchema.safeParse({ connectTimeoutMs: MAX_TIMER_DELAY_MS + 1 }).success
    ).toBe(false);
    expect(
      enrichmentOverridesSchema.safeParse({ keepalive: { intervalMs: 3_000_000_000 } }).success
    ).toBe(false);
  });
});

describe('loadSettingsFromEnv', () => {
  it('should use defaults', () => {
    expect(loadSettingsFromEnv({})).toEqual({
      logLevel: LogLevel.INFO,
      configPath: join(process.cwd(), 'databases.json'),
      credentialsPath: join(homedir(), '.pg-resilience-credentials.json'),
    });
  });

  it('should read overrides', () => {
    expect(
      loadSettingsFromEnv({
        PG_RESILIENCE_LOG_LEVEL: 'debug',
        PG_RESILIENCE_CONFIG: '/etc/app/databases.json',
        PG_RESILIENCE_CREDENTIALS: '/run/secrets/databases.json',
      })
    ).toEqual({
      logLevel: LogLevel.DEBUG,
      configPath: '/etc/app/databases.json',
      credentialsPath: '/run/secrets/databases.json',
    });
  });
});
