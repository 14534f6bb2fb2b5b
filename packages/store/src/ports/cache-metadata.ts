/**
 * Metadata stored next to a cached file. Replaced as a whole on every
 * re-fetch, never patched.
 */
export type CacheMetadata = {
  /** Origin validator or content hash. Advisory only. */
  fingerprint: string
  contentType: string
  cachedAt: Date
  /** Content length in bytes. */
  size: number
}
