import { BaseError } from "@rawcache/errors"
import type { HookFailure } from "../lifecycle/run-hooks"

export type ServerErrorCode = "server_startup_failed" | "server_already_started"

export class ServerStartupError extends BaseError<ServerErrorCode> {
  static hooksFailed(failures: readonly HookFailure[], timedOut: boolean): ServerStartupError {
    const first = failures[0]

    return new ServerStartupError(
      first ? `Startup hook failed: ${first.hook}` : "Startup timed out",
      {
        code: "server_startup_failed",
        context: { hooks: failures.map((f) => f.hook), timedOut },
        cause: first?.error,
      },
    )
  }

  static alreadyStarted(): ServerStartupError {
    return new ServerStartupError("Server already started", {
      code: "server_already_started",
    })
  }
}
