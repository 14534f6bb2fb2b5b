import { serve } from "@hono/node-server"
import type { Logger } from "@rawcache/logger"
import type { Application } from "../server/server"
import type { Closeable } from "./shutdown"

export type ListenOptions = {
  host: string
  port: number
}

export function listen(app: Application, options: ListenOptions, logger: Logger): Closeable {
  const server = serve({ fetch: app.fetch, port: options.port, hostname: options.host })

  logger.info(`Server listening on http://${options.host}:${options.port}`)

  return server
}
