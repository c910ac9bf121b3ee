/**
 * Composition root.
 *
 * Wires a connection source into a resolver, a pool registry, the retry
 * executor and the database tools.
 *
 * @module client
 */

import {
  createExecutorConfig,
  ExecutorConfig,
  loadExecutorConfigFromEnv,
  loadSettingsFromEnv,
} from './config/index.js';
import { ConnectionSource, loadDefaultConnectionSource } from './config/sources.js';
import { RetryExecutor, Sleep } from './executor/index.js';
import { HealthValidator } from './health/index.js';
import {
  createConsoleObservability,
  createNoopObservability,
  guardObservability,
  Observability,
} from './observability/index.js';
import { DatabaseTools } from './operations/index.js';
import { HandleProvider, PgPoolRegistry, PoolFactory } from './pool/index.js';
import { OutcomeReporter } from './reporter/index.js';
import { ConnectionProfileResolver } from './resolver/index.js';
import type { EnrichmentOverrides } from './types/index.js';

/**
 * Options for {@link createResilientDatabase}.
 */
export interface ResilientDatabaseOptions {
  source: ConnectionSource;
  /** Executor configuration (default: 3 attempts, 500 ms initial delay) */
  config?: ExecutorConfig;
  /** Enrichment overrides applied to every resource */
  policy?: EnrichmentOverrides;
  /** Observability components (optional, defaults to noop) */
  observability?: Observability;
  /** Replaces the pg-backed handle provider */
  handles?: HandleProvider;
  /** Replaces `new pg.Pool(config)` in the default handle provider */
  poolFactory?: PoolFactory;
  sleep?: Sleep;
  random?: () => number;
}

/**
 * A wired resilience layer.
 */
export interface ResilientDatabase {
  readonly resolver: ConnectionProfileResolver;
  readonly executor: RetryExecutor;
  readonly reporter: OutcomeReporter;
  readonly tools: DatabaseTools;
  /** Drains and closes every pool */
  close(): Promise<void>;
}

/**
 * Creates a resilience layer over the given source.
 */
export function createResilientDatabase(options: ResilientDatabaseOptions): ResilientDatabase {
  const observability = guardObservability(options.observability ?? createNoopObservability());
  const resolver = new ConnectionProfileResolver(options.source, {
    policy: options.policy,
    logger: observability.logger.child({ component: 'resolver' }),
  });
  const handles =
    options.handles ??
    new PgPoolRegistry({ observability, poolFactory: options.poolFactory });
  const executor = new RetryExecutor({
    resolver,
    handles,
    config: options.config ?? createExecutorConfig(),
    health: new HealthValidator(observability),
    observability,
    sleep: options.sleep,
    random: options.random,
  });
  const reporter = new OutcomeReporter(observability.logger);
  const tools = new DatabaseTools(executor, resolver, reporter);

  return {
    resolver,
    executor,
    reporter,
    tools,
    close: () => handles.close(),
  };
}

/**
 * Creates a resilience layer configured from the environment.
 *
 * Environment variables:
 * - PG_RESILIENCE_LOG_LEVEL: Log level (debug, info, warn, error)
 * - PG_RESILIENCE_CONFIG: Settings file (default: ./databases.json)
 * - PG_RESILIENCE_CREDENTIALS: Credentials file (default: ~/.pg-resilience-credentials.json)
 * - PG_RESILIENCE_DB_<NAME>: Connection string for resource `<name>`
 * - PG_RESILIENCE_MAX_ATTEMPTS, PG_RESILIENCE_INITIAL_DELAY_MS,
 *   PG_RESILIENCE_DELAY_CAP_MS, PG_RESILIENCE_JITTER_MS,
 *   PG_RESILIENCE_PROBE_TIMEOUT_MS: Retry policy
 *
 * @throws {ConfigurationError} If a variable or the settings file is invalid
 */
export async function createResilientDatabaseFromEnv(
  env: NodeJS.ProcessEnv = process.env,
  overrides: Omit<ResilientDatabaseOptions, 'source' | 'config'> = {}
): Promise<ResilientDatabase> {
  const settings = loadSettingsFromEnv(env);
  const observability = overrides.observability ?? createConsoleObservability(settings.logLevel);
  const config = loadExecutorConfigFromEnv(env);
  const source = await loadDefaultConnectionSource(settings, observability.logger, env);

  return createResilientDatabase({ ...overrides, observability, source, config });
}
