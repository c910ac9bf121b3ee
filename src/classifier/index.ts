/**
 * Transient/permanent classification of failures.
 *
 * @module classifier
 */

import { MAX_CAUSE_DEPTH, SqlState } from '../errors/index.js';
import {
  ErrorClassification,
  FailureClass,
  FailureKind,
  RawFailure,
} from '../types/index.js';

/**
 * SQLSTATE codes worth retrying unchanged.
 */
export const TRANSIENT_SQL_STATES: ReadonlySet<string> = new Set<string>([
  // Connection errors
  SqlState.ConnectionException,
  SqlState.ConnectionDoesNotExist,
  SqlState.ConnectionFailure,
  SqlState.SqlClientUnableToEstablishSqlConnection,
  SqlState.SqlServerRejectedEstablishmentOfSqlConnection,

  // Serialization/deadlock errors
  SqlState.SerializationFailure,
  SqlState.DeadlockDetected,

  // Resource errors
  SqlState.InsufficientResources,
  SqlState.DiskFull,
  SqlState.OutOfMemory,
  SqlState.TooManyConnections,
]);

/**
 * Failure kinds that are network-level and therefore transient.
 */
export const NETWORK_FAILURE_KINDS: ReadonlySet<FailureKind> = new Set<FailureKind>([
  'socket',
  'io',
  'timeout',
]);

/**
 * Checks whether a SQLSTATE is in the transient table.
 */
export function isTransientSqlState(code: string): boolean {
  return TRANSIENT_SQL_STATES.has(code);
}

/**
 * Classifies a failure as transient or permanent.
 *
 * Each link of the cause chain is examined in turn:
 * - a SQLSTATE decides on its own, transient only when it is in
 *   {@link TRANSIENT_SQL_STATES};
 * - otherwise a socket, I/O or timeout failure is transient;
 * - otherwise the walk moves on to the cause.
 *
 * The walk stops after {@link MAX_CAUSE_DEPTH} links or on a cycle, and an
 * exhausted chain is permanent.
 */
export function classify(failure: RawFailure): ErrorClassification {
  const visited = new Set<RawFailure>();
  let current: RawFailure | undefined = failure;
  let depth = 0;

  while (current !== undefined && depth < MAX_CAUSE_DEPTH && !visited.has(current)) {
    visited.add(current);

    if (current.sqlState !== undefined) {
      return {
        kind: isTransientSqlState(current.sqlState) ? FailureClass.Transient : FailureClass.Permanent,
        diagnosticCode: current.sqlState,
        isNetworkLevel: false,
      };
    }

    if (NETWORK_FAILURE_KINDS.has(current.kind)) {
      return { kind: FailureClass.Transient, isNetworkLevel: true };
    }

    current = current.cause;
    depth++;
  }

  return { kind: FailureClass.Permanent, isNetworkLevel: false };
}

/**
 * Convenience check over {@link classify}.
 */
export function isTransient(failure: RawFailure): boolean {
  return classify(failure).kind === FailureClass.Transient;
}
