import { MemoryOriginClient, type OriginClient, type OriginFileInfo } from "@rawcache/origin"
import type { CacheMetadata } from "@rawcache/store"
import { type FileKey, fileKey } from "../domains/files/model/file-key"

export const startOfTest = new Date("2026-01-01T00:00:00.000Z")

export const files = {
  readme: (): FileKey => fileKey({ owner: "acme", repository: "widgets", path: "README.md" }),
  source: (): FileKey =>
    fileKey({ owner: "acme", repository: "widgets", path: "src/main.go", ref: "main" }),
  script: (): FileKey =>
    fileKey({ owner: "acme", repository: "widgets", path: "dist/app.js", ref: "v1.2.0" }),
}

export const text = (value: string): Uint8Array => new TextEncoder().encode(value)

export const decode = (value: Uint8Array): string => new TextDecoder().decode(value)

export function metadata(overrides: Partial<CacheMetadata> = {}): CacheMetadata {
  return {
    fingerprint: "0123456789abcdef0123",
    contentType: "text/markdown",
    cachedAt: startOfTest,
    size: 5,
    ...overrides,
  }
}

/**
 * Origin whose `fetchInfo` calls wait until `open()` is called, so tests
 * can pile up concurrent callers behind one fetch.
 */
export class GatedOriginClient implements OriginClient {
  readonly inner = new MemoryOriginClient()
  private gate: Promise<void>
  private release: () => void = () => {}

  constructor() {
    this.gate = new Promise((resolve) => {
      this.release = resolve
    })
  }

  open(): void {
    this.release()
  }

  async fetchInfo(file: FileKey): Promise<OriginFileInfo | null> {
    await this.gate
    return this.inner.fetchInfo(file)
  }

  async download(downloadUrl: string): Promise<Uint8Array> {
    return this.inner.download(downloadUrl)
  }
}
