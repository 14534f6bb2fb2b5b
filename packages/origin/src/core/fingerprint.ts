import { createHash } from "node:crypto"

/** ETag without weak marker or quotes, or the hex sha256 of `content`. */
export function deriveFingerprint(etag: string | undefined, content: Uint8Array): string {
  const validator = etag
    ?.trim()
    .replace(/^W\//, "")
    .replace(/^"+|"+$/g, "")

  if (validator) return validator

  return createHash("sha256").update(content).digest("hex")
}
