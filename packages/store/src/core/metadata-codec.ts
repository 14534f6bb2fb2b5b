import superjson from "superjson"
import { z } from "zod"
import type { CacheMetadata } from "../ports/cache-metadata"
import type { Codec } from "../ports/codec"

const cacheMetadataSchema = z.object({
  fingerprint: z.string(),
  contentType: z.string().min(1),
  cachedAt: z.date(),
  size: z.number().int().nonnegative(),
})

/**
 * superjson keeps `cachedAt` a real `Date` across the round trip; the schema
 * rejects records written by an incompatible version.
 */
export function createMetadataCodec(): Codec<CacheMetadata> {
  return {
    encode: (value) =>
      superjson.stringify({
        fingerprint: value.fingerprint,
        contentType: value.contentType,
        cachedAt: value.cachedAt,
        size: value.size,
      }),
    decode: (text) => cacheMetadataSchema.parse(superjson.parse(text)),
  }
}
