/**
 * Versioned Redis key contract shared by the resolver, the reconciler and
 * the reconciliation lease.
 *
 * Format: `{prefix}:{version}:{namespace}:{identifier}`
 *
 * Bump KEYSPACE_VERSION whenever the encoding of a value changes, so that
 * processes on different versions never read each other's counters.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Namespaces
// ─────────────────────────────────────────────────────────────────────────────

export const KEYSPACE_VERSION = 'v1';

export const RedisNamespace = {
  /** Pending visit deltas, identifier = short code */
  VISITS: 'visits',
  /** Deltas claimed by a reconciliation pass and not yet acknowledged */
  INFLIGHT: 'inflight',
  /** Exclusive leases, identifier = lease name */
  LEASE: 'lease',
} as const;

export type RedisNamespace = (typeof RedisNamespace)[keyof typeof RedisNamespace];

// ─────────────────────────────────────────────────────────────────────────────
// Key Builder Interface
// ─────────────────────────────────────────────────────────────────────────────

export interface KeyBuilder {
  /**
   * Build a key from namespace and identifier.
   */
  build(namespace: RedisNamespace, identifier: string): string;

  /**
   * Extract the identifier from a key of the given namespace.
   * @returns null for keys of another namespace, version or prefix
   */
  parse(namespace: RedisNamespace, key: string): string | null;

  /**
   * Get the prefix for a namespace.
   * Format: `{prefix}:{version}:{namespace}:`
   */
  getPrefix(namespace: RedisNamespace): string;

  /**
   * SCAN MATCH pattern covering every key of a namespace.
   */
  pattern(namespace: RedisNamespace): string;
}

// ─────────────────────────────────────────────────────────────────────────────
// Implementation
// ─────────────────────────────────────────────────────────────────────────────

export interface KeyBuilderOptions {
  /** Global prefix for all keys. Defaults to 'shortlinks'. */
  globalPrefix?: string;
  /** Keyspace version. Defaults to KEYSPACE_VERSION. */
  version?: string;
}

/**
 * Create a key builder instance.
 */
export const createKeyBuilder = (options: KeyBuilderOptions = {}): KeyBuilder => {
  const globalPrefix = options.globalPrefix ?? 'shortlinks';
  const version = options.version ?? KEYSPACE_VERSION;

  const getPrefix = (namespace: RedisNamespace): string =>
    `${globalPrefix}:${version}:${namespace}:`;

  return {
    build(namespace: RedisNamespace, identifier: string): string {
      return `${getPrefix(namespace)}${identifier}`;
    },

    parse(namespace: RedisNamespace, key: string): string | null {
      const prefix = getPrefix(namespace);
      if (!key.startsWith(prefix)) {
        return null;
      }
      const identifier = key.slice(prefix.length);
      return identifier === '' ? null : identifier;
    },

    getPrefix,

    pattern(namespace: RedisNamespace): string {
      return `${getPrefix(namespace)}*`;
    },
  };
};
