/**
 * Core type definitions for the resilience layer.
 *
 * Profiles, the failure vocabulary shared with the pool boundary,
 * classifications and the outcome contract returned to callers.
 */

// ============================================================================
// Enrichment Defaults
// ============================================================================

/** Default PostgreSQL port */
export const DEFAULT_POSTGRES_PORT = 5432;

/** Default connect timeout (30 seconds) */
export const DEFAULT_CONNECT_TIMEOUT_MS = 30_000;

/** Default operation timeout (2 minutes, for long-running queries) */
export const DEFAULT_OPERATION_TIMEOUT_MS = 120_000;

/** Default minimum pool size (keep one connection warm) */
export const DEFAULT_POOL_MIN = 1;

/** Default maximum pool size */
export const DEFAULT_POOL_MAX = 20;

/** Default idle lifetime before a pooled connection is closed (5 minutes) */
export const DEFAULT_IDLE_LIFETIME_MS = 300_000;

/** Default interval between idle-connection pruning passes */
export const DEFAULT_PRUNING_INTERVAL_MS = 10_000;

/** Default TCP keepalive interval */
export const DEFAULT_KEEPALIVE_INTERVAL_MS = 30_000;

/** Default TCP keepalive probe interval */
export const DEFAULT_KEEPALIVE_PROBE_INTERVAL_MS = 10_000;

/** Default number of auto-prepared statements kept per resource */
export const DEFAULT_STATEMENT_CACHE_MAX = 10;

/** Default number of uses before a statement is auto-prepared */
export const DEFAULT_STATEMENT_CACHE_MIN_USES = 2;

/** Default application name reported to the server */
export const DEFAULT_APPLICATION_NAME = 'pg-resilience';

// ============================================================================
// Resource Profiles
// ============================================================================

/**
 * Connection parameters parsed from a raw connection string.
 *
 * SECURITY: password is never logged.
 */
export interface ConnectionParameters {
  host: string;
  port: number;
  database: string;
  user: string;
  /** @sensitive */
  password?: string;
  ssl: boolean;
  applicationName: string;
}

/**
 * Pool size bounds.
 */
export interface PoolBounds {
  min: number;
  max: number;
}

/**
 * TCP keepalive settings.
 */
export interface KeepaliveSettings {
  /** Idle time before the first keepalive probe (ms) */
  intervalMs: number;
  /** Time between unanswered probes (ms) */
  probeIntervalMs: number;
}

/**
 * Auto-prepare thresholds.
 */
export interface StatementCacheSettings {
  /** Maximum statements prepared per resource */
  maxCached: number;
  /** Uses of the same SQL text before it is prepared */
  minUsesBeforeCache: number;
}

/**
 * Enrichment policy applied to raw connection parameters.
 */
export interface EnrichmentPolicy {
  connectTimeoutMs: number;
  operationTimeoutMs: number;
  pool: PoolBounds;
  idleLifetimeMs: number;
  pruningIntervalMs: number;
  keepalive: KeepaliveSettings;
  statementCache: StatementCacheSettings;
  loadBalanceHosts: boolean;
}

/**
 * Partial policy used for per-resolver and per-resource overrides.
 */
export type EnrichmentOverrides = Partial<
  Omit<EnrichmentPolicy, 'pool' | 'keepalive' | 'statementCache'>
> & {
  pool?: Partial<PoolBounds>;
  keepalive?: Partial<KeepaliveSettings>;
  statementCache?: Partial<StatementCacheSettings>;
};

/**
 * Enriched, validated and immutable profile of a logical resource.
 */
export interface ResourceProfile extends EnrichmentPolicy {
  /** Logical resource name (unique key) */
  readonly name: string;
  /** Parsed connection parameters */
  readonly connection: ConnectionParameters;
}

/**
 * Raw entry supplied by a connection source. A layer may contribute only
 * overrides and leave the connection string to another layer.
 */
export interface RawConnectionEntry {
  /** Connection string (URL or keyword form) */
  connectionString?: string;
  /** Per-resource policy overrides */
  overrides?: EnrichmentOverrides;
}

// ============================================================================
// Failures and Classification
// ============================================================================

/**
 * Failure kinds known at the pool boundary.
 */
export type FailureKind =
  /** Server-reported error carrying a SQLSTATE */
  | 'sql'
  /** Socket-level failure (reset, refused, unreachable) */
  | 'socket'
  /** General I/O failure */
  | 'io'
  /** A timeout expired */
  | 'timeout'
  /** Unknown logical resource */
  | 'not-found'
  /** Handle failed its health probe */
  | 'handle-unusable'
  /** Malformed request or misuse */
  | 'invalid-request'
  /** Anything else */
  | 'unknown';

/**
 * Failure record handed to the classifier.
 *
 * The cause chain is not guaranteed to be acyclic.
 */
export interface RawFailure {
  readonly kind: FailureKind;
  readonly message: string;
  /** SQLSTATE, when the server reported one */
  readonly sqlState?: string;
  readonly cause?: RawFailure;
}

/**
 * Classification kinds.
 */
export enum FailureClass {
  Transient = 'transient',
  Permanent = 'permanent',
}

/**
 * Result of classifying a failure.
 */
export interface ErrorClassification {
  readonly kind: FailureClass;
  readonly diagnosticCode?: string;
  readonly isNetworkLevel: boolean;
}

// ============================================================================
// Retry State and Outcomes
// ============================================================================

/**
 * Executor states.
 */
export enum ExecutionState {
  Idle = 'idle',
  Attempting = 'attempting',
  BackingOff = 'backing_off',
  Succeeded = 'succeeded',
  Failed = 'failed',
}

/**
 * Bookkeeping for one in-flight run.
 */
export interface RetryState {
  attempt: number;
  currentDelayMs: number;
  lastFailure?: RawFailure;
}

export interface SuccessOutcome<T> {
  readonly status: 'success';
  readonly value: T;
  readonly attempts: number;
}

export interface FailureOutcome {
  readonly status: 'failure';
  readonly classification: ErrorClassification;
  readonly message: string;
  readonly attempts: number;
}

/**
 * Terminal result of a run. The only thing that crosses the core boundary.
 */
export type Outcome<T> = SuccessOutcome<T> | FailureOutcome;

/**
 * Creates a success outcome.
 */
export function success<T>(value: T, attempts: number): SuccessOutcome<T> {
  return { status: 'success', value, attempts };
}

/**
 * Creates a failure outcome.
 */
export function failure(
  classification: ErrorClassification,
  message: string,
  attempts: number
): FailureOutcome {
  return { status: 'failure', classification, message, attempts };
}

export function isSuccess<T>(outcome: Outcome<T>): outcome is SuccessOutcome<T> {
  return outcome.status === 'success';
}

// ============================================================================
// Structured Results
// ============================================================================

export interface SuccessResult<T> {
  success: true;
  data: T;
}

export interface FailureResult {
  success: false;
  error: string;
  diagnosticCode?: string;
  isTransient: boolean;
  suggestion: string;
  attempts: number;
}

/**
 * Stable external result shape.
 */
export type StructuredResult<T> = SuccessResult<T> | FailureResult;
