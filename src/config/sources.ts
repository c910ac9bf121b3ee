/**
 * Connection sources.
 *
 * A source maps logical resource names to raw connection strings and
 * optional per-resource policy overrides. Sources are layered so that a
 * credentials file in the home directory can supply secrets on top of a
 * settings file checked into the working directory.
 *
 * @module config/sources
 */

import { promises as fs } from 'fs';
import { z } from 'zod';
import { ConfigurationError } from '../errors/index.js';
import type { Logger } from '../observability/index.js';
import type { EnrichmentOverrides, RawConnectionEntry } from '../types/index.js';
import { ENV_PREFIX, enrichmentOverridesSchema, formatIssues, type ServiceSettings } from './index.js';

/**
 * Provider of raw connection entries.
 */
export interface ConnectionSource {
  /** Returns the entry for a name, if this source knows it */
  lookup(name: string): RawConnectionEntry | undefined;
  /** Names that have a connection string in this source */
  names(): string[];
  /** Human-readable description of where entries come from */
  describe(): string[];
}

// ============================================================================
// In-Memory Source
// ============================================================================

/**
 * Source backed by a plain object, for programmatic configuration and tests.
 */
export class InMemoryConnectionSource implements ConnectionSource {
  private readonly entries: Map<string, RawConnectionEntry>;
  private readonly label: string;

  constructor(entries: Record<string, string | RawConnectionEntry> = {}, label = 'in-memory') {
    this.entries = new Map();
    for (const [name, entry] of Object.entries(entries)) {
      this.entries.set(name, typeof entry === 'string' ? { connectionString: entry } : entry);
    }
    this.label = label;
  }

  lookup(name: string): RawConnectionEntry | undefined {
    return this.entries.get(name);
  }

  names(): string[] {
    return namesWithConnectionString(this.entries);
  }

  describe(): string[] {
    return [this.label];
  }
}

// ============================================================================
// JSON File Source
// ============================================================================

/**
 * Shape of a connection file. `ConnectionStrings` is accepted as an alias of
 * `connectionStrings` so that existing settings files load unchanged.
 */
export const connectionFileSchema = z
  .object({
    connectionStrings: z.record(z.string()).optional(),
    ConnectionStrings: z.record(z.string()).optional(),
    profiles: z.record(enrichmentOverridesSchema).optional(),
  })
  .passthrough();

export type ConnectionFile = z.infer<typeof connectionFileSchema>;

/**
 * Source loaded from a JSON file.
 */
export class JsonFileConnectionSource implements ConnectionSource {
  private readonly entries: Map<string, RawConnectionEntry>;

  private constructor(
    readonly path: string,
    readonly loaded: boolean,
    entries: Map<string, RawConnectionEntry>
  ) {
    this.entries = entries;
  }

  /**
   * Reads and validates a connection file.
   *
   * @param options.optional - A missing file yields an empty source instead of an error
   * @throws {ConfigurationError} If the file cannot be read, parsed or validated
   */
  static async load(
    path: string,
    options: { optional?: boolean } = {}
  ): Promise<JsonFileConnectionSource> {
    let text: string;
    try {
      text = await fs.readFile(path, 'utf8');
    } catch (error) {
      if (options.optional && isMissingFile(error)) {
        return new JsonFileConnectionSource(path, false, new Map());
      }
      throw new ConfigurationError(`Cannot read connection file ${path}`, error);
    }

    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch (error) {
      throw new ConfigurationError(`Connection file ${path} is not valid JSON`, error);
    }

    return JsonFileConnectionSource.fromObject(path, json);
  }

  /**
   * Builds a source from already-parsed file contents.
   *
   * @throws {ConfigurationError} If the contents do not match the schema
   */
  static fromObject(path: string, json: unknown): JsonFileConnectionSource {
    const result = connectionFileSchema.safeParse(json);
    if (!result.success) {
      throw new ConfigurationError(
        `Invalid connection file ${path}: ${formatIssues(result.error)}`
      );
    }
    return new JsonFileConnectionSource(path, true, toEntries(result.data));
  }

  lookup(name: string): RawConnectionEntry | undefined {
    return this.entries.get(name);
  }

  names(): string[] {
    return namesWithConnectionString(this.entries);
  }

  describe(): string[] {
    return this.loaded ? [this.path] : [];
  }
}

function toEntries(file: ConnectionFile): Map<string, RawConnectionEntry> {
  const entries = new Map<string, RawConnectionEntry>();
  const strings = { ...file.ConnectionStrings, ...file.connectionStrings };

  for (const [name, connectionString] of Object.entries(strings)) {
    // An empty value counts as not configured.
    if (connectionString.trim()) {
      entries.set(name, { connectionString });
    }
  }

  for (const [name, overrides] of Object.entries(file.profiles ?? {})) {
    entries.set(name, { ...entries.get(name), overrides });
  }

  return entries;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

// ============================================================================
// Environment Source
// ============================================================================

/** Prefix of environment variables holding connection strings */
export const ENV_CONNECTION_PREFIX = `${ENV_PREFIX}DB_`;

/**
 * Source reading `PG_RESILIENCE_DB_<NAME>` variables. Names are lower-cased,
 * so `PG_RESILIENCE_DB_REPORTING` configures the resource `reporting`.
 */
export class EnvConnectionSource implements ConnectionSource {
  private readonly entries: Map<string, RawConnectionEntry>;

  constructor(env: NodeJS.ProcessEnv = process.env) {
    this.entries = new Map();
    for (const [key, value] of Object.entries(env)) {
      if (!key.startsWith(ENV_CONNECTION_PREFIX) || !value?.trim()) continue;
      const name = key.slice(ENV_CONNECTION_PREFIX.length).toLowerCase();
      if (name) {
        this.entries.set(name, { connectionString: value });
      }
    }
  }

  lookup(name: string): RawConnectionEntry | undefined {
    return this.entries.get(name);
  }

  names(): string[] {
    return namesWithConnectionString(this.entries);
  }

  describe(): string[] {
    return this.entries.size > 0 ? [`environment (${ENV_CONNECTION_PREFIX}*)`] : [];
  }
}

// ============================================================================
// Layered Source
// ============================================================================

/**
 * Combines sources. For each name the connection string comes from the last
 * layer that has one; overrides merge across layers, later layers winning
 * field by field.
 */
export class LayeredConnectionSource implements ConnectionSource {
  private readonly layers: readonly ConnectionSource[];

  constructor(layers: ConnectionSource[]) {
    this.layers = [...layers];
  }

  lookup(name: string): RawConnectionEntry | undefined {
    let connectionString: string | undefined;
    let overrides: EnrichmentOverrides | undefined;

    for (const layer of this.layers) {
      const entry = layer.lookup(name);
      if (!entry) continue;
      if (entry.connectionString) {
        connectionString = entry.connectionString;
      }
      if (entry.overrides) {
        overrides = combineOverrides(overrides, entry.overrides);
      }
    }

    if (connectionString === undefined && overrides === undefined) {
      return undefined;
    }
    return {
      ...(connectionString !== undefined ? { connectionString } : {}),
      ...(overrides !== undefined ? { overrides } : {}),
    };
  }

  names(): string[] {
    const seen = new Set<string>();
    for (const layer of this.layers) {
      for (const name of layer.names()) {
        seen.add(name);
      }
    }
    return Array.from(seen);
  }

  describe(): string[] {
    return this.layers.flatMap((layer) => layer.describe());
  }
}

/**
 * Merges two override sets, `top` winning field by field.
 */
export function combineOverrides(
  bottom: EnrichmentOverrides | undefined,
  top: EnrichmentOverrides
): EnrichmentOverrides {
  if (!bottom) return top;
  return {
    ...bottom,
    ...top,
    pool: { ...bottom.pool, ...top.pool },
    keepalive: { ...bottom.keepalive, ...top.keepalive },
    statementCache: { ...bottom.statementCache, ...top.statementCache },
  };
}

function namesWithConnectionString(entries: Map<string, RawConnectionEntry>): string[] {
  const names: string[] = [];
  for (const [name, entry] of entries) {
    if (entry.connectionString) {
      names.push(name);
    }
  }
  return names;
}

// ============================================================================
// Default Layering
// ============================================================================

/**
 * Loads the default layering: settings file, then credentials file, then
 * environment variables.
 *
 * Both files are optional. A credentials file that exists but cannot be
 * loaded is logged and skipped; a broken settings file is an error.
 *
 * @throws {ConfigurationError} If the settings file is unreadable or invalid
 */
export async function loadDefaultConnectionSource(
  settings: Pick<ServiceSettings, 'configPath' | 'credentialsPath'>,
  logger: Logger,
  env: NodeJS.ProcessEnv = process.env
): Promise<LayeredConnectionSource> {
  const layers: ConnectionSource[] = [];

  layers.push(await JsonFileConnectionSource.load(settings.configPath, { optional: true }));

  try {
    layers.push(await JsonFileConnectionSource.load(settings.credentialsPath, { optional: true }));
  } catch (error) {
    logger.warn('Skipping credentials file', {
      path: settings.credentialsPath,
      error: error instanceof Error ? error.message : String(error),
    });
  }

  layers.push(new EnvConnectionSource(env));

  const source = new LayeredConnectionSource(layers);
  logger.info('Loaded connection sources', {
    sources: source.describe(),
    databases: source.names(),
  });
  return source;
}
