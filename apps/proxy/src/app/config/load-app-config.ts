import fs from "node:fs/promises"
import path from "node:path"
import { parse } from "dotenv"
import { z } from "zod"
import { ConfigError } from "./config.errors"
import { type AppConfig, type CacheStoreConfig, type EnvConfig, envSchema } from "./schema"

export function mapEnvToConfig(env: EnvConfig): AppConfig {
  return {
    app: {
      env: env.APP_ENV,
      serviceName: env.SERVICE_NAME,
    },
    server: {
      host: env.SERVER_HOST,
      port: env.SERVER_PORT,
      shutdownTimeoutMs: env.SERVER_SHUTDOWN_TIMEOUT_MS,
      livenessPath: env.SERVER_LIVENESS_PATH,
      readinessPath: env.SERVER_READINESS_PATH,
    },
    logging: {
      level: env.LOG_LEVEL,
      prettify: env.LOG_PRETTY,
    },
    requestId: {
      enabled: env.REQUEST_ID_ENABLED,
      header: env.REQUEST_ID_HEADER,
      fallbackToTraceparent: env.REQUEST_ID_FALLBACK_TO_TRACEPARENT,
    },
    requestLogging: {
      enabled: env.REQUEST_LOGGING_ENABLED,
      level: env.REQUEST_LOGGING_LEVEL,
    },
    origin: {
      baseUrl: env.GITHUB_RAW_URL,
      timeoutMs: env.ORIGIN_TIMEOUT_MS,
      maxRedirections: env.ORIGIN_MAX_REDIRECTIONS,
    },
    cache: {
      ttlSeconds: env.CACHE_TTL_SECONDS,
      ...(env.CACHE_LOCK_TIMEOUT_MS !== undefined && {
        lockTimeoutMs: env.CACHE_LOCK_TIMEOUT_MS,
      }),
      store: mapCacheStore(env),
    },
    repositories: env.REPOSITORIES,
  }
}

/**
 * `auto` picks Redis as soon as a Redis URL or host is configured and the
 * embedded SQLite file otherwise.
 */
function mapCacheStore(env: EnvConfig): CacheStoreConfig {
  const redisConfigured = env.REDIS_URL !== undefined || env.REDIS_HOST !== undefined
  const useRedis =
    env.CACHE_BACKEND === "redis" || (env.CACHE_BACKEND === "auto" && redisConfigured)

  if (!useRedis) {
    return {
      kind: "sqlite",
      filePath: env.CACHE_FILE_PATH,
      ...(env.CACHE_SWEEP_INTERVAL_MS !== undefined && {
        sweepIntervalMs: env.CACHE_SWEEP_INTERVAL_MS,
      }),
    }
  }

  if (env.REDIS_URL !== undefined) {
    return { kind: "redis", connection: { url: env.REDIS_URL }, keyPrefix: env.REDIS_KEY_PREFIX }
  }

  return {
    kind: "redis",
    connection: {
      host: env.REDIS_HOST ?? "localhost",
      port: env.REDIS_PORT,
      db: env.REDIS_DB,
      ...(env.REDIS_PASSWORD !== undefined && { password: env.REDIS_PASSWORD }),
    },
    keyPrefix: env.REDIS_KEY_PREFIX,
  }
}

/**
 * Reads `.env` from `cwd` (if present), overlays the process environment
 * and validates the result.
 *
 * @throws ConfigError when a value fails validation
 */
export async function loadAppConfig(
  env: NodeJS.ProcessEnv,
  cwd: string = process.cwd(),
): Promise<AppConfig> {
  const fromFile = await readDotenv(path.resolve(cwd, ".env"))

  const merged: Record<string, string> = { ...fromFile }

  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined) merged[key] = value
  }

  const result = envSchema.safeParse(merged)

  if (!result.success) throw ConfigError.invalid(z.prettifyError(result.error))

  return mapEnvToConfig(result.data)
}

async function readDotenv(filePath: string): Promise<Record<string, string>> {
  try {
    return parse(await fs.readFile(filePath, "utf-8"))
  } catch (err) {
    if (isMissingFile(err)) return {}
    throw err
  }
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT"
}
