/**
 * In-process stand-ins for the pool boundary and the pg driver.
 */

import type { PoolConfig, QueryConfig, QueryResult } from 'pg';
import type {
  HandleProvider,
  HandleQueryOptions,
  HandleQueryResult,
  HandleState,
  PgClientLike,
  PgPoolLike,
  ResourceHandle,
} from '../pool/index.js';
import type { ResourceProfile } from '../types/index.js';

/**
 * Builds an error shaped like the driver's `DatabaseError`.
 */
export function pgError(
  code: string,
  message = `server error ${code}`
): Error & { code: string; severity: string } {
  return Object.assign(new Error(message), { code, severity: 'ERROR' });
}

/**
 * Builds a Node errno error.
 */
export function errnoError(code: string, message = `${code} (test)`): NodeJS.ErrnoException {
  return Object.assign(new Error(message), { code });
}

export function queryResult(
  rows: Array<Record<string, unknown>> = [],
  rowCount: number = rows.length,
  command = 'SELECT'
): HandleQueryResult {
  return {
    rows,
    rowCount,
    fields: Object.keys(rows[0] ?? {}).map((name) => ({ name, dataTypeID: 25 })),
    command,
  };
}

export interface FakeHandleBehavior {
  open?: () => Promise<void>;
  probe?: () => Promise<void>;
  query?: (text: string, values?: unknown[]) => Promise<HandleQueryResult>;
}

/**
 * Handle whose open, probe and query steps are scripted.
 */
export class FakeHandle implements ResourceHandle {
  state: HandleState = 'closed';
  readonly queries: Array<{ text: string; values?: unknown[] } & HandleQueryOptions> = [];
  releaseCalls: boolean[] = [];

  constructor(
    readonly id: string,
    readonly resourceName: string,
    private readonly behavior: FakeHandleBehavior = {}
  ) {}

  async open(): Promise<void> {
    if (this.behavior.open) {
      await this.behavior.open();
    }
    this.state = 'open';
  }

  async query(
    text: string,
    values?: unknown[],
    options: HandleQueryOptions = {}
  ): Promise<HandleQueryResult> {
    this.queries.push({ text, values, timeoutMs: options.timeoutMs, prepare: options.prepare });
    if (text === 'SELECT 1') {
      if (this.behavior.probe) {
        await this.behavior.probe();
      }
      return queryResult([{ '?column?': 1 }]);
    }
    if (this.behavior.query) {
      return this.behavior.query(text, values);
    }
    return queryResult();
  }

  release(destroy = false): void {
    this.releaseCalls.push(destroy);
    this.state = 'released';
  }
}

/**
 * Provider handing out one scripted handle per attempt.
 */
export class FakeHandleProvider implements HandleProvider {
  readonly handles: FakeHandle[] = [];
  closed = false;

  constructor(
    private readonly script: (index: number) => FakeHandleBehavior = () => ({})
  ) {}

  handleFor(profile: ResourceProfile): FakeHandle {
    const index = this.handles.length;
    const handle = new FakeHandle(`${profile.name}#${index + 1}`, profile.name, this.script(index));
    this.handles.push(handle);
    return handle;
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

/**
 * Driver client whose queries are answered by a callback.
 */
export class FakePgClient implements PgClientLike {
  readonly queries: QueryConfig[] = [];
  readonly releases: Array<Error | boolean | undefined> = [];

  constructor(
    private readonly answer: (config: QueryConfig) => ReturnType<PgClientLike['query']>
  ) {}

  query(config: QueryConfig): ReturnType<PgClientLike['query']> {
    this.queries.push(config);
    return this.answer(config);
  }

  release(err?: Error | boolean): void {
    this.releases.push(err);
  }
}

export function pgResult(
  rows: Array<Record<string, unknown>>,
  command = 'SELECT',
  rowCount: number = rows.length
): QueryResult<Record<string, unknown>> {
  return {
    rows,
    rowCount,
    command,
    oid: 0,
    fields: Object.keys(rows[0] ?? {}).map((name) => ({
      name,
      tableID: 0,
      columnID: 0,
      dataTypeID: 23,
      dataTypeSize: 4,
      dataTypeModifier: -1,
      format: 'text' as const,
    })),
  };
}

/**
 * Driver pool handing out {@link FakePgClient}s.
 */
export class FakePgPool implements PgPoolLike {
  totalCount = 0;
  idleCount = 0;
  waitingCount = 0;
  ended = false;
  readonly clients: FakePgClient[] = [];
  readonly errorListeners: Array<(err: Error) => void> = [];

  constructor(
    readonly config: PoolConfig,
    private readonly connectWith: () => Promise<FakePgClient>
  ) {}

  async connect(): Promise<FakePgClient> {
    const client = await this.connectWith();
    this.clients.push(client);
    this.totalCount++;
    return client;
  }

  async end(): Promise<void> {
    this.ended = true;
  }

  on(_event: 'error', listener: (err: Error) => void): this {
    this.errorListeners.push(listener);
    return this;
  }
}
