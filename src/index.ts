/**
 * Resilient execution over pooled PostgreSQL.
 *
 * - Connection profiles enriched with pooling, timeout and keepalive settings
 * - Transient/permanent classification of driver faults
 * - Health-validated handles and capped, jittered exponential backoff
 * - A stable structured result for every call
 *
 * @example Basic usage
 * ```typescript
 * import { createResilientDatabase, InMemoryConnectionSource } from 'pg-resilience';
 *
 * const db = createResilientDatabase({
 *   source: new InMemoryConnectionSource({
 *     reporting: 'postgresql://app@db.internal:5432/reporting',
 *   }),
 * });
 *
 * const result = await db.tools.executeQuery('SELECT id, name FROM accounts', 'reporting');
 * if (!result.success) {
 *   console.error(result.error, result.suggestion);
 * }
 *
 * // Or run any operation with retry
 * const outcome = await db.executor.run(
 *   (handle) => handle.query('UPDATE jobs SET state = $1 WHERE id = $2', ['done', 42]),
 *   'reporting',
 *   { operationName: 'finishJob' }
 * );
 *
 * await db.close();
 * ```
 *
 * @module pg-resilience
 */

// =============================================================================
// Composition
// =============================================================================

export { createResilientDatabase, createResilientDatabaseFromEnv } from './client.js';
export type { ResilientDatabase, ResilientDatabaseOptions } from './client.js';

// =============================================================================
// Core
// =============================================================================

export { ConnectionProfileResolver, ProfileCache } from './resolver/index.js';
export type { ResolverOptions } from './resolver/index.js';

export {
  classify,
  isTransient,
  isTransientSqlState,
  NETWORK_FAILURE_KINDS,
  TRANSIENT_SQL_STATES,
} from './classifier/index.js';

export { HealthValidator, PROBE_QUERY } from './health/index.js';

export { computeBackoffDelay, RetryExecutor } from './executor/index.js';
export type {
  AttemptContext,
  Operation,
  RetryExecutorOptions,
  RunOptions,
  Sleep,
  StateTransition,
} from './executor/index.js';

export {
  jsonReplacer,
  OutcomeReporter,
  PERMANENT_SUGGESTION,
  RENDER_FAILURE_MESSAGE,
  TRANSIENT_SUGGESTION,
} from './reporter/index.js';

// =============================================================================
// Tools
// =============================================================================

export {
  DatabaseTools,
  formatDateTime,
  TEST_CONNECTION_SQL,
  TEST_CONNECTION_TIMEOUT_MS,
  toPlainValue,
} from './operations/index.js';
export type {
  ConnectionTestData,
  DatabaseListData,
  NonQueryData,
  QueryData,
} from './operations/index.js';

// =============================================================================
// Pool Boundary
// =============================================================================

export {
  buildPoolConfig,
  defaultPoolFactory,
  PgPoolRegistry,
  PgResourceHandle,
  PgResourcePool,
} from './pool/index.js';
export type {
  FieldInfo,
  HandleProvider,
  HandleQueryOptions,
  HandleQueryResult,
  HandleState,
  PgClientLike,
  PgPoolLike,
  PoolFactory,
  PoolStats,
  ResourceHandle,
} from './pool/index.js';
export { MAX_TRACKED_STATEMENTS, StatementCache } from './pool/statement-cache.js';

// =============================================================================
// Configuration
// =============================================================================

export {
  createExecutorConfig,
  DEFAULT_CONFIG_FILE,
  DEFAULT_CREDENTIALS_FILE,
  DEFAULT_ENRICHMENT_POLICY,
  DEFAULT_PROBE_TIMEOUT_MS,
  DEFAULT_RETRY_POLICY,
  ENV_PREFIX,
  MAX_TIMER_DELAY_MS,
  enrichmentOverridesSchema,
  loadExecutorConfigFromEnv,
  loadSettingsFromEnv,
  mergePolicy,
  retryPolicySchema,
  validatePolicy,
} from './config/index.js';
export type { ExecutorConfig, RetryPolicy, ServiceSettings } from './config/index.js';

export { parseConnectionString, redactParameters } from './config/connection-string.js';

export {
  combineOverrides,
  connectionFileSchema,
  ENV_CONNECTION_PREFIX,
  EnvConnectionSource,
  InMemoryConnectionSource,
  JsonFileConnectionSource,
  LayeredConnectionSource,
  loadDefaultConnectionSource,
} from './config/sources.js';
export type { ConnectionFile, ConnectionSource } from './config/sources.js';

// =============================================================================
// Errors
// =============================================================================

export {
  ConfigurationError,
  ConnectionFailedError,
  HandleStateError,
  HandleUnusableError,
  InvalidConnectionStringError,
  InvalidResourceNameError,
  isResilienceError,
  MAX_CAUSE_DEPTH,
  PoolClosedError,
  ProfileNotFoundError,
  QueryTimeoutError,
  redactConnectionString,
  ResilienceError,
  ResilienceErrorCode,
  SqlState,
  toRawFailure,
} from './errors/index.js';

// =============================================================================
// Observability
// =============================================================================

export {
  ConsoleLogger,
  createConsoleObservability,
  createInMemoryObservability,
  createNoopObservability,
  guardObservability,
  InMemoryLogger,
  InMemoryMetricsCollector,
  InMemoryTracer,
  LogLevel,
  MetricNames,
  NoopLogger,
  NoopMetricsCollector,
  NoopTracer,
  parseLogLevel,
} from './observability/index.js';
export type {
  LogEntry,
  Logger,
  LogSink,
  MetricsCollector,
  Observability,
  SpanContext,
  SpanStatus,
  Tracer,
} from './observability/index.js';

// =============================================================================
// Types
// =============================================================================

export {
  DEFAULT_APPLICATION_NAME,
  DEFAULT_CONNECT_TIMEOUT_MS,
  DEFAULT_IDLE_LIFETIME_MS,
  DEFAULT_KEEPALIVE_INTERVAL_MS,
  DEFAULT_KEEPALIVE_PROBE_INTERVAL_MS,
  DEFAULT_OPERATION_TIMEOUT_MS,
  DEFAULT_POOL_MAX,
  DEFAULT_POOL_MIN,
  DEFAULT_POSTGRES_PORT,
  DEFAULT_PRUNING_INTERVAL_MS,
  DEFAULT_STATEMENT_CACHE_MAX,
  DEFAULT_STATEMENT_CACHE_MIN_USES,
  ExecutionState,
  failure,
  FailureClass,
  isSuccess,
  success,
} from './types/index.js';
export type {
  ConnectionParameters,
  EnrichmentOverrides,
  EnrichmentPolicy,
  ErrorClassification,
  FailureKind,
  FailureOutcome,
  FailureResult,
  KeepaliveSettings,
  Outcome,
  PoolBounds,
  RawConnectionEntry,
  RawFailure,
  ResourceProfile,
  RetryState,
  StatementCacheSettings,
  StructuredResult,
  SuccessOutcome,
  SuccessResult,
} from './types/index.js';
