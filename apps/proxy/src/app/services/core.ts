import { type Clock, SystemClock } from "@rawcache/clock"
import { createPinoLogger, type Logger } from "@rawcache/logger"
import type { AppConfig } from "../config"

export type CoreServices = {
  logger: Logger
  clock: Clock
}

export function createCoreServices(config: AppConfig): CoreServices {
  const clock = new SystemClock()

  const logger = createPinoLogger(
    {},
    {
      level: config.logging.level,
      prettify: config.logging.prettify,
    },
  ).child({ service: config.app.serviceName, env: config.app.env })

  return { clock, logger }
}
