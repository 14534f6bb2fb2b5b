/**
 * Storage key of one cached file. Plain string so every backend can use it
 * directly as a row key or a Redis key suffix.
 *
 * @remarks
 * Build keys with `encodeStorageKey()`, never by ad-hoc interpolation at
 * call sites.
 *
 * @example
 * ```ts
 * const key: CacheKey = "acme:widgets@main:src/index.ts"
 * ```
 */
export type CacheKey = string
