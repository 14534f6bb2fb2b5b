export {
  HttpOriginClient,
  type HttpOriginClientDeps,
  type HttpOriginClientOptions,
  isTimeoutError,
} from "./adapters/http/http-origin-client"
export { MemoryOriginClient, type MemoryOriginFile } from "./adapters/memory/memory-origin-client"
export { detectContentType, fallbackContentType } from "./core/content-type"
export { deriveFingerprint } from "./core/fingerprint"
export { buildOriginPath, buildOriginUrl, normalizePath, normalizeRef } from "./core/normalize"
export { UpstreamError, type UpstreamErrorCode } from "./core/origin.errors"
export type { OriginClient } from "./ports/origin-client"
export type { OriginFileInfo, OriginFileRef } from "./ports/origin-file"
