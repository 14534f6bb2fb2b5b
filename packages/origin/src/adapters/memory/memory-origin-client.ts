import { detectContentType } from "../../core/content-type"
import { deriveFingerprint } from "../../core/fingerprint"
import { buildOriginUrl } from "../../core/normalize"
import { UpstreamError } from "../../core/origin.errors"
import type { OriginClient } from "../../ports/origin-client"
import type { OriginFileInfo, OriginFileRef } from "../../ports/origin-file"

export type MemoryOriginFile = {
  content: Uint8Array
  contentType?: string
  etag?: string
}

/**
 * Origin backed by an in-process map, keyed by the normalized origin URL.
 * Applies the same normalization, fingerprint and content-type rules as the
 * HTTP client.
 */
export class MemoryOriginClient implements OriginClient {
  private readonly files = new Map<string, MemoryOriginFile>()

  readonly calls = { fetchInfo: 0, download: 0 }

  public constructor(private readonly baseUrl = "memory://origin") {}

  put(file: OriginFileRef, entry: MemoryOriginFile): void {
    this.files.set(buildOriginUrl(this.baseUrl, file), {
      ...entry,
      content: new Uint8Array(entry.content),
    })
  }

  remove(file: OriginFileRef): void {
    this.files.delete(buildOriginUrl(this.baseUrl, file))
  }

  async fetchInfo(file: OriginFileRef): Promise<OriginFileInfo | null> {
    this.calls.fetchInfo += 1

    const url = buildOriginUrl(this.baseUrl, file)
    const entry = this.files.get(url)

    if (!entry) return null

    return {
      fingerprint: deriveFingerprint(entry.etag, entry.content),
      contentType: detectContentType(file.path, entry.contentType),
      size: entry.content.byteLength,
      downloadUrl: url,
    }
  }

  async download(downloadUrl: string): Promise<Uint8Array> {
    this.calls.download += 1

    const entry = this.files.get(downloadUrl)

    if (!entry) throw UpstreamError.rejected(downloadUrl, 404)

    return new Uint8Array(entry.content)
  }
}
