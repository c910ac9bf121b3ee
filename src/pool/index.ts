/**
 * Pool boundary.
 *
 * Wraps one `pg.Pool` per logical resource and hands out short-lived
 * {@link ResourceHandle}s, one per attempt. Everything above this module
 * works against the handle interface, so tests can replace the driver with
 * an in-process fake.
 *
 * @module pool
 */

import pg from 'pg';
import type { PoolConfig, QueryConfig, QueryResult } from 'pg';
import {
  ConnectionFailedError,
  HandleStateError,
  PoolClosedError,
  QueryTimeoutError,
} from '../errors/index.js';
import { MetricNames, Observability, createNoopObservability } from '../observability/index.js';
import type { ResourceProfile } from '../types/index.js';
import { StatementCache } from './statement-cache.js';

// ============================================================================
// Handle Contract
// ============================================================================

/**
 * Lifecycle of a handle: `closed` until opened, `open` while it holds a
 * pooled connection, `released` once given back.
 */
export type HandleState = 'closed' | 'open' | 'released';

/**
 * Column metadata returned with a result.
 */
export interface FieldInfo {
  name: string;
  dataTypeID: number;
}

/**
 * Result of a query run through a handle.
 */
export interface HandleQueryResult<R extends Record<string, unknown> = Record<string, unknown>> {
  rows: R[];
  rowCount: number;
  fields: FieldInfo[];
  command: string;
}

export interface HandleQueryOptions {
  /** Client-side timeout; defaults to the profile's operation timeout */
  timeoutMs?: number;
  /** Whether the text may be auto-prepared (default: true) */
  prepare?: boolean;
}

/**
 * A single-use connection handle.
 */
export interface ResourceHandle {
  readonly id: string;
  readonly resourceName: string;
  readonly state: HandleState;
  /** Acquires a pooled connection. No-op when already open. */
  open(): Promise<void>;
  query(text: string, values?: unknown[], options?: HandleQueryOptions): Promise<HandleQueryResult>;
  /**
   * Gives the connection back. With `destroy` the connection is discarded
   * instead of being returned to the pool. Idempotent.
   */
  release(destroy?: boolean): void;
}

/**
 * Supplies fresh handles for a profile.
 */
export interface HandleProvider {
  handleFor(profile: ResourceProfile): ResourceHandle;
  close(): Promise<void>;
}

// ============================================================================
// Driver Seam
// ============================================================================

type DriverResult = QueryResult<Record<string, unknown>>;

/**
 * The parts of `pg.PoolClient` used here. Text holding several statements
 * resolves to one result per statement.
 */
export interface PgClientLike {
  query(config: QueryConfig): Promise<DriverResult | DriverResult[]>;
  release(err?: Error | boolean): void;
}

/**
 * The parts of `pg.Pool` used here.
 */
export interface PgPoolLike {
  readonly totalCount: number;
  readonly idleCount: number;
  readonly waitingCount: number;
  connect(): Promise<PgClientLike>;
  end(): Promise<void>;
  on(event: 'error', listener: (err: Error) => void): unknown;
}

/**
 * Creates a driver pool from its configuration.
 */
export type PoolFactory = (config: PoolConfig) => PgPoolLike;

export const defaultPoolFactory: PoolFactory = (config) => new pg.Pool(config);

/**
 * Builds the driver configuration for a profile.
 */
export function buildPoolConfig(profile: ResourceProfile): PoolConfig {
  const { connection } = profile;
  return {
    host: connection.host,
    port: connection.port,
    database: connection.database,
    user: connection.user,
    password: connection.password,
    ssl: connection.ssl,
    application_name: connection.applicationName,
    min: profile.pool.min,
    max: profile.pool.max,
    idleTimeoutMillis: profile.idleLifetimeMs,
    connectionTimeoutMillis: profile.connectTimeoutMs,
    statement_timeout: profile.operationTimeoutMs,
    keepAlive: true,
    keepAliveInitialDelayMillis: profile.keepalive.intervalMs,
  };
}

/**
 * Maps a driver result onto {@link HandleQueryResult}.
 *
 * For several statements the rows, fields and command are those of the last
 * statement and `rowCount` is the sum over all of them.
 */
export function toHandleResult(result: DriverResult | DriverResult[]): HandleQueryResult {
  const results = Array.isArray(result) ? result : [result];
  const last = results[results.length - 1];
  if (!last) {
    return { rows: [], rowCount: 0, fields: [], command: '' };
  }

  return {
    rows: last.rows,
    rowCount: results.reduce((total, r) => total + (r.rowCount ?? r.rows.length), 0),
    fields: last.fields.map((field) => ({ name: field.name, dataTypeID: field.dataTypeID })),
    command: last.command,
  };
}

// ============================================================================
// Handle Implementation
// ============================================================================

/**
 * Handle over one connection of a {@link PgResourcePool}.
 */
export class PgResourceHandle implements ResourceHandle {
  readonly id: string;
  readonly resourceName: string;
  private readonly owner: PgResourcePool;
  private client?: PgClientLike;
  private currentState: HandleState = 'closed';
  // Set when a query was abandoned on timeout and may still be running.
  private abandoned = false;

  constructor(id: string, owner: PgResourcePool) {
    this.id = id;
    this.resourceName = owner.profile.name;
    this.owner = owner;
  }

  get state(): HandleState {
    return this.currentState;
  }

  async open(): Promise<void> {
    if (this.currentState === 'open') return;
    if (this.currentState === 'released') {
      throw new HandleStateError(this.id, this.currentState, 'open');
    }

    const { host, port } = this.owner.profile.connection;
    try {
      this.client = await this.owner.connect();
    } catch (error) {
      throw new ConnectionFailedError(host, port, error);
    }
    this.currentState = 'open';
  }

  async query(
    text: string,
    values?: unknown[],
    options: HandleQueryOptions = {}
  ): Promise<HandleQueryResult> {
    const client = this.client;
    if (this.currentState !== 'open' || !client) {
      throw new HandleStateError(this.id, this.currentState, 'query');
    }

    const timeoutMs = options.timeoutMs ?? this.owner.profile.operationTimeoutMs;
    const name = options.prepare === false ? undefined : this.owner.statements.nameFor(text);
    const config: QueryConfig = {
      text,
      ...(values !== undefined ? { values } : {}),
      ...(name !== undefined ? { name } : {}),
    };

    const result = await this.withTimeout(client.query(config), timeoutMs);
    return toHandleResult(result);
  }

  release(destroy = false): void {
    if (this.currentState === 'released') return;

    const client = this.client;
    this.client = undefined;
    this.currentState = 'released';
    if (!client) return;

    try {
      client.release(destroy || this.abandoned);
    } catch (error) {
      this.owner.observability.logger.warn('Failed to release connection', {
        database: this.resourceName,
        handleId: this.id,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  /**
   * Races a query against a timer.
   */
  private withTimeout<T>(promise: Promise<T>, timeoutMs: number): Promise<T> {
    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => {
        this.abandoned = true;
        reject(new QueryTimeoutError(timeoutMs));
      }, timeoutMs);

      promise
        .then((value) => {
          clearTimeout(timer);
          resolve(value);
        })
        .catch((err) => {
          clearTimeout(timer);
          reject(err);
        });
    });
  }
}

// ============================================================================
// Pool
// ============================================================================

/**
 * Pool statistics.
 */
export interface PoolStats {
  total: number;
  idle: number;
  waiting: number;
  preparedStatements: number;
}

/**
 * One driver pool for one resource profile.
 */
export class PgResourcePool {
  readonly profile: ResourceProfile;
  readonly observability: Observability;
  readonly statements: StatementCache;
  private readonly pool: PgPoolLike;
  private readonly maintenanceTimer: NodeJS.Timeout;
  private nextHandleId = 1;
  private closed = false;

  constructor(
    profile: ResourceProfile,
    observability: Observability,
    poolFactory: PoolFactory = defaultPoolFactory
  ) {
    this.profile = profile;
    this.observability = observability;
    this.statements = new StatementCache(profile.statementCache);
    this.pool = poolFactory(buildPoolConfig(profile));

    // Idle clients that lose their socket emit here; without a listener the process would crash.
    this.pool.on('error', (err) => {
      this.observability.logger.error('Unexpected pool error', {
        database: profile.name,
        error: err.message,
      });
      this.observability.metrics.increment(MetricNames.POOL_ERRORS_TOTAL, 1, {
        database: profile.name,
      });
    });

    this.maintenanceTimer = setInterval(() => this.reportStats(), profile.pruningIntervalMs);
    this.maintenanceTimer.unref();

    this.observability.logger.info('Created connection pool', {
      database: profile.name,
      host: profile.connection.host,
      port: profile.connection.port,
      minConnections: profile.pool.min,
      maxConnections: profile.pool.max,
    });
  }

  /**
   * Creates a fresh, unopened handle.
   *
   * @throws {PoolClosedError} If the pool has been closed
   */
  createHandle(): PgResourceHandle {
    if (this.closed) {
      throw new PoolClosedError(this.profile.name);
    }
    return new PgResourceHandle(`${this.profile.name}#${this.nextHandleId++}`, this);
  }

  /**
   * Acquires a driver client.
   */
  async connect(): Promise<PgClientLike> {
    if (this.closed) {
      throw new PoolClosedError(this.profile.name);
    }
    return this.pool.connect();
  }

  stats(): PoolStats {
    return {
      total: this.pool.totalCount,
      idle: this.pool.idleCount,
      waiting: this.pool.waitingCount,
      preparedStatements: this.statements.size,
    };
  }

  /**
   * Publishes pool gauges. Runs on the pruning interval.
   */
  reportStats(): void {
    const stats = this.stats();
    const database = this.profile.name;
    const { metrics } = this.observability;
    metrics.gauge(MetricNames.POOL_CONNECTIONS, stats.total, { database, state: 'total' });
    metrics.gauge(MetricNames.POOL_CONNECTIONS, stats.idle, { database, state: 'idle' });
    metrics.gauge(MetricNames.POOL_CONNECTIONS, stats.waiting, { database, state: 'waiting' });
    metrics.gauge(MetricNames.PREPARED_STATEMENTS, stats.preparedStatements, { database });
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    clearInterval(this.maintenanceTimer);

    this.observability.logger.info('Closing connection pool', {
      database: this.profile.name,
      totalConnections: this.pool.totalCount,
    });
    await this.pool.end();
  }
}

// ============================================================================
// Registry
// ============================================================================

/**
 * Owns one {@link PgResourcePool} per resource name.
 */
export class PgPoolRegistry implements HandleProvider {
  private readonly pools = new Map<string, PgResourcePool>();
  private readonly observability: Observability;
  private readonly poolFactory: PoolFactory;
  private closed = false;

  constructor(options: { observability?: Observability; poolFactory?: PoolFactory } = {}) {
    this.observability = options.observability ?? createNoopObservability();
    this.poolFactory = options.poolFactory ?? defaultPoolFactory;
  }

  handleFor(profile: ResourceProfile): ResourceHandle {
    return this.poolFor(profile).createHandle();
  }

  /**
   * Returns the pool for a profile, creating it on first use.
   *
   * @throws {PoolClosedError} If the registry has been closed
   */
  poolFor(profile: ResourceProfile): PgResourcePool {
    if (this.closed) {
      throw new PoolClosedError(profile.name);
    }
    let pool = this.pools.get(profile.name);
    if (!pool) {
      pool = new PgResourcePool(profile, this.observability, this.poolFactory);
      this.pools.set(profile.name, pool);
    }
    return pool;
  }

  /** Names of resources with a live pool */
  activeResources(): string[] {
    return Array.from(this.pools.keys());
  }

  /**
   * Closes every pool. Failures are logged; the first one is rethrown after
   * all pools have been given the chance to close.
   */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;

    const pools = Array.from(this.pools.values());
    this.pools.clear();

    const results = await Promise.allSettled(pools.map((pool) => pool.close()));
    let firstError: unknown;
    results.forEach((result, index) => {
      if (result.status === 'rejected') {
        this.observability.logger.error('Failed to close connection pool', {
          database: pools[index]?.profile.name,
          error: result.reason instanceof Error ? result.reason.message : String(result.reason),
        });
        firstError ??= result.reason;
      }
    });
    if (firstError !== undefined) {
      throw firstError;
    }
  }
}
