/**
 * Resolution of logical resource names into enriched, immutable profiles.
 *
 * @module resolver
 */

import { DEFAULT_ENRICHMENT_POLICY, mergePolicy, validatePolicy } from '../config/index.js';
import { parseConnectionString, redactParameters } from '../config/connection-string.js';
import type { ConnectionSource } from '../config/sources.js';
import {
  ConfigurationError,
  InvalidResourceNameError,
  ProfileNotFoundError,
} from '../errors/index.js';
import { Logger, NoopLogger } from '../observability/index.js';
import type { EnrichmentOverrides, EnrichmentPolicy, ResourceProfile } from '../types/index.js';

/**
 * Init-once cache of profiles keyed by resource name.
 *
 * A value is stored only when its factory returns; a throwing factory leaves
 * the name unset so a later call can succeed once configuration is fixed.
 */
export class ProfileCache {
  private readonly profiles = new Map<string, ResourceProfile>();

  getOrCreate(name: string, factory: () => ResourceProfile): ResourceProfile {
    const existing = this.profiles.get(name);
    if (existing) {
      return existing;
    }
    const profile = factory();
    this.profiles.set(name, profile);
    return profile;
  }

  has(name: string): boolean {
    return this.profiles.has(name);
  }

  get size(): number {
    return this.profiles.size;
  }
}

/**
 * Options for {@link ConnectionProfileResolver}.
 */
export interface ResolverOptions {
  /** Overrides applied to every resource before per-resource overrides */
  policy?: EnrichmentOverrides;
  logger?: Logger;
}

/**
 * Turns a resource name into a {@link ResourceProfile}.
 *
 * Profiles are built on first resolution, frozen, and cached for the life of
 * the resolver, so repeated calls return the same object.
 */
export class ConnectionProfileResolver {
  private readonly source: ConnectionSource;
  private readonly basePolicy: EnrichmentPolicy;
  private readonly cache = new ProfileCache();
  private readonly logger: Logger;

  constructor(source: ConnectionSource, options: ResolverOptions = {}) {
    this.source = source;
    this.basePolicy = mergePolicy(DEFAULT_ENRICHMENT_POLICY, options.policy);
    this.logger = options.logger ?? new NoopLogger();
  }

  /**
   * Resolves a resource name.
   *
   * @throws {InvalidResourceNameError} If the name is empty or blank
   * @throws {ProfileNotFoundError} If no connection string is configured
   * @throws {InvalidConnectionStringError} If the connection string cannot be parsed
   * @throws {ConfigurationError} If the enriched policy violates an invariant
   */
  resolve(name: string): ResourceProfile {
    if (typeof name !== 'string' || !name.trim()) {
      throw new InvalidResourceNameError(String(name));
    }

    return this.cache.getOrCreate(name, () => this.build(name));
  }

  /**
   * Policy applied before per-resource overrides.
   */
  get defaultPolicy(): Readonly<EnrichmentPolicy> {
    return this.basePolicy;
  }

  /**
   * Names of all configured resources.
   */
  names(): string[] {
    return this.source.names();
  }

  /**
   * Where the configured resources come from.
   */
  describeSources(): string[] {
    return this.source.describe();
  }

  private build(name: string): ResourceProfile {
    const entry = this.source.lookup(name);
    if (!entry?.connectionString) {
      throw new ProfileNotFoundError(name);
    }

    const connection = parseConnectionString(entry.connectionString);
    const policy = mergePolicy(this.basePolicy, entry.overrides);

    const violations = validatePolicy(policy);
    if (violations.length > 0) {
      throw new ConfigurationError(
        `Invalid policy for database '${name}': ${violations.join('; ')}`
      );
    }

    const profile: ResourceProfile = Object.freeze({
      ...policy,
      pool: Object.freeze({ ...policy.pool }),
      keepalive: Object.freeze({ ...policy.keepalive }),
      statementCache: Object.freeze({ ...policy.statementCache }),
      name,
      connection: Object.freeze({ ...connection }),
    });

    this.logger.debug('Resolved connection profile', {
      database: name,
      connection: redactParameters(connection),
      pool: policy.pool,
      connectTimeoutMs: policy.connectTimeoutMs,
      operationTimeoutMs: policy.operationTimeoutMs,
    });

    return profile;
  }
}
