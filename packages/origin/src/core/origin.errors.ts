import { BaseError } from "@rawcache/errors"

export type UpstreamErrorCode = "upstream_rejected" | "upstream_unreachable" | "upstream_failed"

export class UpstreamError extends BaseError<UpstreamErrorCode> {
  /** The origin answered with a status other than success or not found. */
  static rejected(url: string, status: number): UpstreamError {
    return new UpstreamError(`Origin responded with status ${status}`, {
      code: "upstream_rejected",
      context: { url, status },
    })
  }

  /** No usable response: connection failure, reset or timeout. */
  static unreachable(url: string, cause: unknown, timedOut: boolean): UpstreamError {
    return new UpstreamError(timedOut ? "Origin request timed out" : "Origin is unreachable", {
      code: "upstream_unreachable",
      context: { url, timedOut },
      cause,
    })
  }

  static failed(cause: unknown): UpstreamError {
    return new UpstreamError("Origin fetch failed", {
      code: "upstream_failed",
      cause,
    })
  }
}
