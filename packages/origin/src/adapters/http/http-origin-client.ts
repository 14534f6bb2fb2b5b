import type { Milliseconds } from "@rawcache/clock"
import type { Logger } from "@rawcache/logger"
import { type Dispatcher, errors, request } from "undici"
import { detectContentType } from "../../core/content-type"
import { deriveFingerprint } from "../../core/fingerprint"
import { buildOriginUrl } from "../../core/normalize"
import { UpstreamError } from "../../core/origin.errors"
import type { OriginClient } from "../../ports/origin-client"
import type { OriginFileInfo, OriginFileRef } from "../../ports/origin-file"

export type HttpOriginClientDeps = {
  logger: Logger
  /** Connection pool used for every request. Defaults to undici's global agent. */
  dispatcher?: Dispatcher
}

export type HttpOriginClientOptions = {
  /** e.g. `https://raw.githubusercontent.com` */
  baseUrl: string
  /** Upper bound for one request, from dispatch until the body is read. */
  timeoutMs: Milliseconds
}

type OriginResponse = {
  status: number
  headers: Dispatcher.ResponseData["headers"]
  body: Uint8Array
}

/**
 * Origin client for raw file hosts that serve `/{owner}/{repo}/{ref}/{path}`.
 *
 * `fetchInfo` issues a full GET, since such hosts expose no metadata
 * endpoint; the body is handed back in `OriginFileInfo.content`.
 */
export class HttpOriginClient implements OriginClient {
  private readonly logger: Logger

  public constructor(
    private readonly deps: HttpOriginClientDeps,
    private readonly opts: HttpOriginClientOptions,
  ) {
    this.logger = deps.logger.child({ module: "origin" })
  }

  async fetchInfo(file: OriginFileRef): Promise<OriginFileInfo | null> {
    const url = buildOriginUrl(this.opts.baseUrl, file)
    const res = await this.get(url)

    if (res.status === 404) {
      this.logger.debug("Origin reports file absent", { url })
      return null
    }

    if (!isSuccess(res.status)) throw UpstreamError.rejected(url, res.status)

    return {
      fingerprint: deriveFingerprint(headerValue(res.headers, "etag"), res.body),
      contentType: detectContentType(file.path, headerValue(res.headers, "content-type")),
      size: res.body.byteLength,
      downloadUrl: url,
      content: res.body,
    }
  }

  async download(downloadUrl: string): Promise<Uint8Array> {
    const res = await this.get(downloadUrl)

    if (!isSuccess(res.status)) throw UpstreamError.rejected(downloadUrl, res.status)

    return res.body
  }

  private async get(url: string): Promise<OriginResponse> {
    const startedAt = performance.now()

    try {
      const res = await request(url, {
        method: "GET",
        headersTimeout: this.opts.timeoutMs,
        bodyTimeout: this.opts.timeoutMs,
        signal: AbortSignal.timeout(this.opts.timeoutMs),
        ...(this.deps.dispatcher !== undefined && { dispatcher: this.deps.dispatcher }),
      })

      const body = isSuccess(res.statusCode)
        ? new Uint8Array(await res.body.arrayBuffer())
        : await res.body.dump().then(() => new Uint8Array())

      this.logger.debug("Origin responded", {
        url,
        status: res.statusCode,
        durationMs: Math.round(performance.now() - startedAt),
      })

      return { status: res.statusCode, headers: res.headers, body }
    } catch (err) {
      const timedOut = isTimeoutError(err)

      this.logger.warn("Origin request failed", { url, timedOut, err })

      throw UpstreamError.unreachable(url, err, timedOut)
    }
  }
}

function isSuccess(status: number): boolean {
  return status >= 200 && status < 300
}

export function isTimeoutError(err: unknown): boolean {
  return (
    err instanceof errors.HeadersTimeoutError ||
    err instanceof errors.BodyTimeoutError ||
    err instanceof errors.ConnectTimeoutError ||
    (err instanceof Error && err.name === "TimeoutError")
  )
}

function headerValue(
  headers: Dispatcher.ResponseData["headers"],
  name: string,
): string | undefined {
  const value = headers[name]
  return Array.isArray(value) ? value[0] : value
}
