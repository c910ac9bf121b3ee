/**
 * Auto-prepare bookkeeping.
 *
 * SQL text used often enough is given a statement name, which makes the pg
 * driver prepare it once per connection and reuse the plan afterwards.
 *
 * @module pool/statement-cache
 */

import type { StatementCacheSettings } from '../types/index.js';

/** Upper bound on distinct SQL texts whose use counts are tracked */
export const MAX_TRACKED_STATEMENTS = 1024;

/**
 * Whether `sql` holds more than one statement. A trailing semicolon does not
 * count; any other semicolon does, including one inside a literal.
 */
export function hasMultipleStatements(sql: string): boolean {
  return sql.replace(/[\s;]+$/, '').includes(';');
}

/**
 * Assigns prepared-statement names per resource.
 *
 * Text holding several statements is never named: the server refuses to
 * prepare it.
 *
 * Once `maxCached` names are handed out, no further text is prepared.
 */
export class StatementCache {
  private readonly settings: StatementCacheSettings;
  private readonly uses = new Map<string, number>();
  private readonly named = new Map<string, string>();
  private nextId = 1;

  constructor(settings: StatementCacheSettings) {
    this.settings = settings;
  }

  /**
   * Records a use of `sql` and returns its statement name once it qualifies.
   */
  nameFor(sql: string): string | undefined {
    if (hasMultipleStatements(sql)) {
      return undefined;
    }

    const existing = this.named.get(sql);
    if (existing) {
      return existing;
    }

    const count = (this.uses.get(sql) ?? 0) + 1;
    this.uses.delete(sql);
    this.uses.set(sql, count);
    this.trimTracked();

    if (count < this.settings.minUsesBeforeCache || this.named.size >= this.settings.maxCached) {
      return undefined;
    }

    const name = `pgr_stmt_${this.nextId++}`;
    this.named.set(sql, name);
    this.uses.delete(sql);
    return name;
  }

  /** Number of named statements */
  get size(): number {
    return this.named.size;
  }

  private trimTracked(): void {
    // Map iteration order is insertion order, so the first key is the least recently used.
    while (this.uses.size > MAX_TRACKED_STATEMENTS) {
      const oldest = this.uses.keys().next();
      if (oldest.done) return;
      this.uses.delete(oldest.value);
    }
  }
}
