/**
 * Error types for the resilience layer.
 *
 * Every error raised by this package extends {@link ResilienceError} and
 * declares the {@link FailureKind} it maps to. {@link toRawFailure} turns any
 * thrown value (package errors, pg `DatabaseError`s, Node errno errors) into
 * the {@link RawFailure} vocabulary the classifier works on.
 */

import type { FailureKind, RawFailure } from '../types/index.js';

/**
 * Package error codes.
 */
export enum ResilienceErrorCode {
  // Configuration errors
  ConfigurationError = 'CONFIGURATION_ERROR',
  InvalidConnectionString = 'INVALID_CONNECTION_STRING',

  // Request errors
  InvalidResourceName = 'INVALID_RESOURCE_NAME',
  ProfileNotFound = 'PROFILE_NOT_FOUND',

  // Connection errors
  ConnectionFailed = 'CONNECTION_FAILED',
  HandleUnusable = 'HANDLE_UNUSABLE',
  HandleState = 'HANDLE_STATE',
  PoolClosed = 'POOL_CLOSED',

  // Query errors
  QueryTimeout = 'QUERY_TIMEOUT',
}

/**
 * PostgreSQL SQLSTATE codes referenced by this package.
 * See: https://www.postgresql.org/docs/current/errcodes-appendix.html
 */
export enum SqlState {
  // Class 08 - Connection Exception
  ConnectionException = '08000',
  SqlClientUnableToEstablishSqlConnection = '08001',
  ConnectionDoesNotExist = '08003',
  SqlServerRejectedEstablishmentOfSqlConnection = '08004',
  ConnectionFailure = '08006',

  // Class 23 - Integrity Constraint Violation
  NotNullViolation = '23502',
  ForeignKeyViolation = '23503',
  UniqueViolation = '23505',
  CheckViolation = '23514',

  // Class 28 - Invalid Authorization Specification
  InvalidAuthorizationSpecification = '28000',
  InvalidPassword = '28P01',

  // Class 40 - Transaction Rollback
  SerializationFailure = '40001',
  DeadlockDetected = '40P01',

  // Class 42 - Syntax Error or Access Rule Violation
  InsufficientPrivilege = '42501',
  SyntaxError = '42601',
  UndefinedTable = '42P01',

  // Class 53 - Insufficient Resources
  InsufficientResources = '53000',
  DiskFull = '53100',
  OutOfMemory = '53200',
  TooManyConnections = '53300',

  // Class 57 - Operator Intervention
  QueryCanceled = '57014',
}

/**
 * Maximum depth followed along an error's cause chain.
 */
export const MAX_CAUSE_DEPTH = 10;

/**
 * Base error class for the package.
 */
export class ResilienceError extends Error {
  /** Error code */
  readonly code: ResilienceErrorCode;
  /** Failure kind used for classification */
  readonly failureKind: FailureKind;
  /** SQLSTATE code (if from PostgreSQL) */
  readonly sqlState?: string;
  /** Additional error details */
  readonly details?: Record<string, unknown>;

  constructor(options: {
    code: ResilienceErrorCode;
    message: string;
    failureKind: FailureKind;
    sqlState?: string;
    details?: Record<string, unknown>;
    cause?: unknown;
  }) {
    super(options.message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'ResilienceError';
    this.code = options.code;
    this.failureKind = options.failureKind;
    this.sqlState = options.sqlState;
    this.details = options.details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  /**
   * Creates a JSON representation of the error.
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      failureKind: this.failureKind,
      sqlState: this.sqlState,
      message: this.message,
      details: this.details,
    };
  }
}

// ============================================================================
// Configuration Errors
// ============================================================================

/**
 * Configuration error.
 */
export class ConfigurationError extends ResilienceError {
  constructor(message: string, cause?: unknown) {
    super({
      code: ResilienceErrorCode.ConfigurationError,
      message: `Configuration error: ${message}`,
      failureKind: 'invalid-request',
      cause,
    });
    this.name = 'ConfigurationError';
  }
}

/**
 * Invalid connection string format.
 */
export class InvalidConnectionStringError extends ResilienceError {
  constructor(connectionString: string, reason?: string) {
    super({
      code: ResilienceErrorCode.InvalidConnectionString,
      message: reason
        ? `Invalid connection string: ${reason}`
        : 'Invalid connection string format',
      failureKind: 'invalid-request',
      details: { connectionString: redactConnectionString(connectionString) },
    });
    this.name = 'InvalidConnectionStringError';
  }
}

// ============================================================================
// Request Errors
// ============================================================================

/**
 * Empty or blank resource name.
 */
export class InvalidResourceNameError extends ResilienceError {
  constructor(name: string) {
    super({
      code: ResilienceErrorCode.InvalidResourceName,
      message: 'Resource name must be a non-empty string',
      failureKind: 'invalid-request',
      details: { name },
    });
    this.name = 'InvalidResourceNameError';
  }
}

/**
 * No connection parameters configured for a resource.
 */
export class ProfileNotFoundError extends ResilienceError {
  constructor(name: string) {
    super({
      code: ResilienceErrorCode.ProfileNotFound,
      message: `No connection string found for database '${name}'. Available databases can be found using listAvailableDatabases()`,
      failureKind: 'not-found',
      details: { name },
    });
    this.name = 'ProfileNotFoundError';
  }
}

// ============================================================================
// Connection Errors
// ============================================================================

/**
 * Opening a connection failed. Classification follows the cause.
 */
export class ConnectionFailedError extends ResilienceError {
  constructor(host: string, port: number, cause?: unknown) {
    super({
      code: ResilienceErrorCode.ConnectionFailed,
      message: `Failed to connect to PostgreSQL at ${host}:${port}: ${describeCause(cause)}`,
      failureKind: 'unknown',
      details: { host, port },
      cause,
    });
    this.name = 'ConnectionFailedError';
  }
}

/**
 * Handle failed its health probe.
 */
export class HandleUnusableError extends ResilienceError {
  constructor(resourceName: string) {
    super({
      code: ResilienceErrorCode.HandleUnusable,
      message: 'Failed to establish valid database connection',
      failureKind: 'handle-unusable',
      details: { resourceName },
    });
    this.name = 'HandleUnusableError';
  }
}

/**
 * Handle used in a state that does not allow the call.
 */
export class HandleStateError extends ResilienceError {
  constructor(handleId: string, state: string, action: string) {
    super({
      code: ResilienceErrorCode.HandleState,
      message: `Cannot ${action} handle ${handleId} in state '${state}'`,
      failureKind: 'invalid-request',
      details: { handleId, state, action },
    });
    this.name = 'HandleStateError';
  }
}

/**
 * Handle requested after the pools were shut down.
 */
export class PoolClosedError extends ResilienceError {
  constructor(resourceName: string) {
    super({
      code: ResilienceErrorCode.PoolClosed,
      message: `Connection pool for '${resourceName}' is closed`,
      failureKind: 'invalid-request',
      details: { resourceName },
    });
    this.name = 'PoolClosedError';
  }
}

// ============================================================================
// Query Errors
// ============================================================================

/**
 * Query exceeded its timeout.
 */
export class QueryTimeoutError extends ResilienceError {
  constructor(timeoutMs: number) {
    super({
      code: ResilienceErrorCode.QueryTimeout,
      message: `Query timeout after ${timeoutMs}ms`,
      failureKind: 'timeout',
      details: { timeoutMs },
    });
    this.name = 'QueryTimeoutError';
  }
}

// ============================================================================
// Mapping to RawFailure
// ============================================================================

/**
 * Node errno codes reported for socket-level failures.
 */
const SOCKET_ERRNO_CODES: ReadonlySet<string> = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ECONNABORTED',
  'EHOSTUNREACH',
  'EHOSTDOWN',
  'ENETUNREACH',
  'ENETDOWN',
  'ENOTFOUND',
  'EAI_AGAIN',
  'EPIPE',
]);

/**
 * Node errno codes reported for general I/O failures.
 */
const IO_ERRNO_CODES: ReadonlySet<string> = new Set(['EIO', 'ENOBUFS']);

/**
 * Node errno codes reported for expired timers.
 */
const TIMEOUT_ERRNO_CODES: ReadonlySet<string> = new Set(['ETIMEDOUT', 'ESOCKETTIMEDOUT']);

/**
 * Messages the pg driver and pool use for faults that carry no code.
 */
const DRIVER_TIMEOUT_MESSAGE = /timeout exceeded when trying to connect|connection terminated due to connection timeout|query read timeout/i;
const DRIVER_SOCKET_MESSAGE = /connection terminated unexpectedly|client has encountered a connection error/i;

/**
 * Checks whether a value has the shape of a pg `DatabaseError`.
 */
function isDatabaseErrorLike(value: Error): value is Error & { code: string; severity: string } {
  return (
    'code' in value &&
    typeof value.code === 'string' &&
    'severity' in value &&
    typeof value.severity === 'string'
  );
}

function errnoCode(value: Error): string | undefined {
  return 'code' in value && typeof value.code === 'string' ? value.code : undefined;
}

/**
 * Maps a single error (without its cause) to a failure kind and SQLSTATE.
 */
function describeLink(value: unknown): { kind: FailureKind; message: string; sqlState?: string } {
  if (value instanceof ResilienceError) {
    return { kind: value.failureKind, message: value.message, sqlState: value.sqlState };
  }

  if (!(value instanceof Error)) {
    return { kind: 'unknown', message: String(value) };
  }

  if (isDatabaseErrorLike(value)) {
    return { kind: 'sql', message: value.message, sqlState: value.code };
  }

  const code = errnoCode(value);
  if (code !== undefined) {
    if (SOCKET_ERRNO_CODES.has(code)) return { kind: 'socket', message: value.message };
    if (IO_ERRNO_CODES.has(code)) return { kind: 'io', message: value.message };
    if (TIMEOUT_ERRNO_CODES.has(code)) return { kind: 'timeout', message: value.message };
  }

  if (value.name === 'TimeoutError' || DRIVER_TIMEOUT_MESSAGE.test(value.message)) {
    return { kind: 'timeout', message: value.message };
  }
  if (DRIVER_SOCKET_MESSAGE.test(value.message)) {
    return { kind: 'socket', message: value.message };
  }

  return { kind: 'unknown', message: value.message };
}

/**
 * Converts any thrown value into a {@link RawFailure}.
 *
 * The cause chain is followed iteratively, stops at {@link MAX_CAUSE_DEPTH}
 * links and at the first repeated error.
 */
export function toRawFailure(error: unknown): RawFailure {
  const links: Array<{ kind: FailureKind; message: string; sqlState?: string }> = [];
  const seen = new Set<unknown>();
  let current: unknown = error;

  while (links.length < MAX_CAUSE_DEPTH && !seen.has(current)) {
    seen.add(current);
    links.push(describeLink(current));
    if (!(current instanceof Error) || current.cause === undefined) {
      break;
    }
    current = current.cause;
  }

  let failure: RawFailure | undefined;
  for (let i = links.length - 1; i >= 0; i--) {
    const link = links[i];
    if (!link) continue;
    failure = {
      kind: link.kind,
      message: link.message,
      ...(link.sqlState !== undefined ? { sqlState: link.sqlState } : {}),
      ...(failure !== undefined ? { cause: failure } : {}),
    };
  }

  return failure ?? { kind: 'unknown', message: String(error) };
}

/**
 * Checks if an error was raised by this package.
 */
export function isResilienceError(error: unknown): error is ResilienceError {
  return error instanceof ResilienceError;
}

/**
 * Masks the password of a URL or keyword-form connection string.
 */
export function redactConnectionString(connectionString: string): string {
  return connectionString
    .replace(/:[^:@/]+@/, ':***@')
    .replace(/(password|pwd)\s*=\s*[^;]*/gi, '$1=***');
}

function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message;
  if (cause === undefined) return 'unknown error';
  return String(cause);
}
