/**
 * Prefix that scopes a store to its own slice of a shared keyspace, e.g.
 * `gh:` on a Redis instance that also serves other applications.
 *
 * Adapters treat it as opaque and prepend it to every key they touch.
 */
export type KeyspacePrefix = string
