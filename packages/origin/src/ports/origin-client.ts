import type { OriginFileInfo, OriginFileRef } from "./origin-file"

/**
 * Read-only access to files at the origin.
 *
 * Implementations throw `UpstreamError` for every failure except a
 * confirmed absence, which `fetchInfo` reports as `null`.
 */
export interface OriginClient {
  fetchInfo(file: OriginFileRef): Promise<OriginFileInfo | null>
  download(downloadUrl: string): Promise<Uint8Array>
}
