/**
 * Database tools.
 *
 * The operations a tool host exposes, each run through the retry executor
 * and rendered into a {@link StructuredResult}.
 *
 * @module operations
 */

import { classify } from '../classifier/index.js';
import { toRawFailure } from '../errors/index.js';
import type { RetryExecutor } from '../executor/index.js';
import type { ConnectionProfileResolver } from '../resolver/index.js';
import { OutcomeReporter } from '../reporter/index.js';
import { failure, StructuredResult, success } from '../types/index.js';

/** Timeout of the connection test query */
export const TEST_CONNECTION_TIMEOUT_MS = 10_000;

export const TEST_CONNECTION_SQL = `SELECT
  NOW() AS current_time,
  current_database() AS database_name,
  pg_backend_pid() AS process_id,
  version() AS server_version`;

export interface QueryData {
  database: string;
  rowCount: number;
  rows: Array<Record<string, unknown>>;
}

export interface NonQueryData {
  database: string;
  rowsAffected: number;
  message: string;
}

export interface ConnectionTestData {
  message: string;
  database: string;
  serverTime: string;
  databaseName: string;
  processId: number;
  serverVersion: string;
  poolingEnabled: boolean;
  pool: { min: number; max: number };
  connectTimeoutMs: number;
  operationTimeoutMs: number;
  keepAliveMs: number;
}

export interface DatabaseListData {
  availableDatabases: string[];
  sources: string[];
  resilienceSettings: {
    maxRetryAttempts: number;
    initialRetryDelayMs: number;
    retryDelayCapMs: number;
    operationTimeoutMs: number;
    connectTimeoutMs: number;
    poolingEnabled: boolean;
    keepAliveMs: number;
  };
}

/**
 * Formats a date as `YYYY-MM-DD HH:mm:ss` in local time.
 */
export function formatDateTime(date: Date): string {
  const pad = (n: number): string => String(n).padStart(2, '0');
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

/**
 * Converts driver values into JSON-friendly ones.
 */
export function toPlainValue(value: unknown): unknown {
  if (value instanceof Date) return formatDateTime(value);
  if (Buffer.isBuffer(value)) return value.toString('hex');
  if (typeof value === 'bigint') return value.toString();
  return value;
}

function toPlainRow(row: Record<string, unknown>): Record<string, unknown> {
  const plain: Record<string, unknown> = {};
  for (const [column, value] of Object.entries(row)) {
    plain[column] = toPlainValue(value);
  }
  return plain;
}

function readString(row: Record<string, unknown> | undefined, column: string): string {
  const value = row?.[column];
  return value === undefined || value === null ? '' : String(value);
}

/**
 * Resilient database operations.
 */
export class DatabaseTools {
  private readonly executor: RetryExecutor;
  private readonly resolver: ConnectionProfileResolver;
  private readonly reporter: OutcomeReporter;

  constructor(
    executor: RetryExecutor,
    resolver: ConnectionProfileResolver,
    reporter: OutcomeReporter = new OutcomeReporter()
  ) {
    this.executor = executor;
    this.resolver = resolver;
    this.reporter = reporter;
  }

  /**
   * Runs a statement and returns its rows.
   */
  async executeQuery(sql: string, database: string): Promise<StructuredResult<QueryData>> {
    const outcome = await this.executor.run(
      async (handle) => {
        const result = await handle.query(sql);
        const rows = result.rows.map(toPlainRow);
        return { database, rowCount: rows.length, rows };
      },
      database,
      { operationName: 'executeQuery' }
    );
    return this.reporter.render(outcome);
  }

  /**
   * Runs a statement for its side effects.
   */
  async executeNonQuery(sql: string, database: string): Promise<StructuredResult<NonQueryData>> {
    const outcome = await this.executor.run(
      async (handle) => {
        const result = await handle.query(sql);
        return {
          database,
          rowsAffected: result.rowCount,
          message: `Command executed successfully. ${result.rowCount} rows affected.`,
        };
      },
      database,
      { operationName: 'executeNonQuery' }
    );
    return this.reporter.render(outcome);
  }

  /**
   * Checks connectivity and reports server details with the profile's
   * pooling and timeout settings.
   */
  async testConnection(database: string): Promise<StructuredResult<ConnectionTestData>> {
    const outcome = await this.executor.run(
      async (handle, { profile }) => {
        const result = await handle.query(TEST_CONNECTION_SQL, undefined, {
          timeoutMs: TEST_CONNECTION_TIMEOUT_MS,
        });
        const row = result.rows[0];
        const serverTime = row?.['current_time'];
        return {
          message: 'Connection successful',
          database,
          serverTime:
            serverTime instanceof Date
              ? formatDateTime(serverTime)
              : readString(row, 'current_time'),
          databaseName: readString(row, 'database_name'),
          processId: Number(row?.['process_id'] ?? 0),
          serverVersion: readString(row, 'server_version'),
          poolingEnabled: true,
          pool: { min: profile.pool.min, max: profile.pool.max },
          connectTimeoutMs: profile.connectTimeoutMs,
          operationTimeoutMs: profile.operationTimeoutMs,
          keepAliveMs: profile.keepalive.intervalMs,
        };
      },
      database,
      { operationName: 'testConnection' }
    );
    return this.reporter.render(outcome);
  }

  /**
   * Lists configured databases and the settings runs are made with.
   */
  listAvailableDatabases(): StructuredResult<DatabaseListData> {
    try {
      const retry = this.executor.retryPolicy;
      const policy = this.resolver.defaultPolicy;
      return this.reporter.render(
        success(
          {
            availableDatabases: this.resolver.names(),
            sources: this.resolver.describeSources(),
            resilienceSettings: {
              maxRetryAttempts: retry.maxAttempts,
              initialRetryDelayMs: retry.initialDelayMs,
              retryDelayCapMs: retry.delayCapMs,
              operationTimeoutMs: policy.operationTimeoutMs,
              connectTimeoutMs: policy.connectTimeoutMs,
              poolingEnabled: true,
              keepAliveMs: policy.keepalive.intervalMs,
            },
          },
          1
        )
      );
    } catch (error) {
      const raw = toRawFailure(error);
      return this.reporter.render<DatabaseListData>(failure(classify(raw), raw.message, 1));
    }
  }
}
