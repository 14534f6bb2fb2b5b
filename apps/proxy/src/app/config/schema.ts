import type { Milliseconds, Seconds } from "@rawcache/clock"
import { type LogLevelName, logLevelNames } from "@rawcache/logger"
import type { PathString } from "@rawcache/server"
import type { RedisConnectionSettings } from "@rawcache/store"
import { z } from "zod"

const port = z.coerce.number().int().min(0).max(65_535)
const durationMs = z.coerce.number().int().positive()
const routePath = z.templateLiteral(["/", z.string()])

/** Unset and blank values both read as absent. */
const optionalString = z
  .string()
  .trim()
  .transform((v) => (v === "" ? undefined : v))
  .optional()

/** Comma-separated list; blank entries are dropped. */
const tokenList = z
  .string()
  .transform((v) =>
    v
      .split(",")
      .map((item) => item.trim())
      .filter((item) => item.length > 0),
  )

export const cacheBackends = ["auto", "redis", "sqlite"] as const

export const envSchema = z.object({
  APP_ENV: z.string().default("development"),
  SERVICE_NAME: z.string().default("rawcache"),

  SERVER_HOST: z.string().default("0.0.0.0"),
  SERVER_PORT: port.default(8000),
  SERVER_SHUTDOWN_TIMEOUT_MS: durationMs.default(10_000),
  SERVER_LIVENESS_PATH: routePath.default("/health"),
  SERVER_READINESS_PATH: routePath.default("/ready"),

  LOG_LEVEL: z.enum(logLevelNames).default("info"),
  LOG_PRETTY: z.stringbool().default(false),

  REQUEST_ID_ENABLED: z.stringbool().default(true),
  REQUEST_ID_HEADER: z.string().min(1).default("x-request-id"),
  REQUEST_ID_FALLBACK_TO_TRACEPARENT: z.stringbool().default(false),

  REQUEST_LOGGING_ENABLED: z.stringbool().default(true),
  REQUEST_LOGGING_LEVEL: z.enum(logLevelNames).default("info"),

  GITHUB_RAW_URL: z.url().default("https://raw.githubusercontent.com"),
  ORIGIN_TIMEOUT_MS: durationMs.default(30_000),
  ORIGIN_MAX_REDIRECTIONS: z.coerce.number().int().min(0).default(3),

  CACHE_TTL_SECONDS: z.coerce.number().int().positive().default(300),
  CACHE_BACKEND: z.enum(cacheBackends).default("auto"),
  CACHE_FILE_PATH: z.string().min(1).default("rawcache.db"),
  CACHE_SWEEP_INTERVAL_MS: durationMs.optional(),
  CACHE_LOCK_TIMEOUT_MS: durationMs.optional(),

  REDIS_URL: optionalString,
  REDIS_HOST: optionalString,
  REDIS_PORT: port.default(6379),
  REDIS_DB: z.coerce.number().int().min(0).default(0),
  REDIS_PASSWORD: optionalString,
  REDIS_KEY_PREFIX: z.string().default("gh:"),

  REPOSITORIES: tokenList.default([]),
})

export type EnvConfig = z.infer<typeof envSchema>

export type CacheStoreConfig =
  | {
      kind: "redis"
      connection: RedisConnectionSettings
      keyPrefix: string
    }
  | {
      kind: "sqlite"
      filePath: string
      sweepIntervalMs?: Milliseconds
    }

export type AppConfig = {
  app: {
    env: string
    serviceName: string
  }

  server: {
    host: string
    port: number
    shutdownTimeoutMs: Milliseconds
    livenessPath: PathString
    readinessPath: PathString
  }

  logging: {
    level: LogLevelName
    prettify: boolean
  }

  requestId: {
    enabled: boolean
    header: string
    fallbackToTraceparent: boolean
  }

  requestLogging: {
    enabled: boolean
    level: LogLevelName
  }

  origin: {
    baseUrl: string
    timeoutMs: Milliseconds
    maxRedirections: number
  }

  cache: {
    ttlSeconds: Seconds
    /** Bound on waiting for another request's fetch of the same file. */
    lockTimeoutMs?: Milliseconds
    store: CacheStoreConfig
  }

  /**
   * Allowed repository tokens: an owner, an `owner/repo` slug or a URL.
   * Empty allows every repository.
   */
  repositories: string[]
}
