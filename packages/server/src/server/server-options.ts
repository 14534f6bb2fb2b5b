import { randomUUID } from "node:crypto"
import type { Clock, Milliseconds } from "@rawcache/clock"
import type { Logger, LogLevelName } from "@rawcache/logger"
import type { ErrorMappingsConfig } from "../errors/errors"
import type { LifecycleHook } from "../lifecycle/run-hooks"
import type { Application, Middleware } from "./server"

export type PathString = `/${string}`

export interface DisabledConfig {
  enabled: false
}

export interface ServerDependencies {
  logger: Logger
  clock: Clock
}

export interface EnabledRequestIdConfig {
  enabled: true

  /**
   * Header name to read/write request ID.
   * @default "x-request-id"
   */
  header?: string

  /**
   * If true, extract trace-id from `traceparent` header when request ID header is not present.
   * @default false
   */
  fallbackToTraceparent?: boolean

  /**
   * Function to generate a new request ID when none is present.
   * @default crypto.randomUUID()
   */
  generate?: () => string
}

export interface EnabledRequestLoggingConfig {
  enabled: true

  /**
   * Log level for request logging.
   * 5xx responses always log at `error` regardless of this setting.
   * @default "info"
   */
  level?: LogLevelName

  /**
   * Paths to ignore for request logging.
   * @default [livenessPath, readinessPath] if health checks are enabled, otherwise []
   */
  ignorePaths?: PathString[]
}

export interface ReadinessCheck {
  name: string
  timeoutMs?: Milliseconds
  fn: (signal: AbortSignal) => Promise<boolean>
}

export interface EnabledHealthConfig {
  enabled: true

  /** @default "/health" */
  livenessPath?: PathString

  /** @default "/ready" */
  readinessPath?: PathString

  /**
   * Checks run on each request to the readiness endpoint.
   * @default []
   */
  readinessChecks?: ReadinessCheck[]

  /**
   * Default timeout for readiness checks. Individual checks can override via `timeoutMs`.
   * @default 5_000
   */
  checkTimeoutMs?: Milliseconds
}

export type RequestIdConfig = DisabledConfig | EnabledRequestIdConfig
export type RequestLoggingConfig = DisabledConfig | EnabledRequestLoggingConfig
export type HealthConfig = DisabledConfig | EnabledHealthConfig

export interface ServerOptions {
  port: number

  /**
   * Host to bind to.
   * @default "0.0.0.0"
   */
  host?: string

  /**
   * Timeout for server startup in milliseconds.
   * @default 2_147_483_647 (max timer value, effectively no timeout)
   */
  startupTimeoutMs?: Milliseconds

  /**
   * Timeout for graceful shutdown in milliseconds.
   * @default 10_000
   */
  shutdownTimeoutMs?: Milliseconds

  requestId?: RequestIdConfig
  requestLogging?: RequestLoggingConfig
  health?: HealthConfig

  errorHandling: ErrorMappingsConfig

  routes: (app: Application) => void

  middleware?: {
    pre?: Middleware[]
    post?: Middleware[]
  }

  startHooks?: LifecycleHook[]
  stopHooks?: LifecycleHook[]
}

export type ResolvedRequestIdConfig = DisabledConfig | Required<EnabledRequestIdConfig>

export type ResolvedRequestLoggingConfig =
  | DisabledConfig
  | Required<EnabledRequestLoggingConfig>

export type ResolvedHealthConfig = DisabledConfig | Required<EnabledHealthConfig>

export type ResolvedServerOptions = {
  port: number
  host: string
  startupTimeoutMs: Milliseconds
  shutdownTimeoutMs: Milliseconds
  requestId: ResolvedRequestIdConfig
  requestLogging: ResolvedRequestLoggingConfig
  health: ResolvedHealthConfig
  errorHandling: ErrorMappingsConfig
  routes: (app: Application) => void
  middleware: { pre: Middleware[]; post: Middleware[] }
  startHooks: LifecycleHook[]
  stopHooks: LifecycleHook[]
}

const MAX_TIMER_MS: Milliseconds = 2_147_483_647

interface ServerDefaults {
  host: string
  startupTimeoutMs: Milliseconds
  shutdownTimeoutMs: Milliseconds
  requestId: Required<EnabledRequestIdConfig>
  requestLogging: { level: LogLevelName }
  health: Required<EnabledHealthConfig>
}

export const DEFAULTS: ServerDefaults = {
  host: "0.0.0.0",
  startupTimeoutMs: MAX_TIMER_MS,
  shutdownTimeoutMs: 10_000,
  requestId: {
    enabled: true,
    header: "x-request-id",
    fallbackToTraceparent: false,
    generate: () => randomUUID(),
  },
  requestLogging: {
    level: "info",
  },
  health: {
    enabled: true,
    livenessPath: "/health",
    readinessPath: "/ready",
    readinessChecks: [],
    checkTimeoutMs: 5_000,
  },
}

export function resolveOptions(options: ServerOptions): ResolvedServerOptions {
  const health = resolveHealthConfig(options)

  return {
    port: options.port,
    host: options.host ?? DEFAULTS.host,
    startupTimeoutMs: options.startupTimeoutMs ?? DEFAULTS.startupTimeoutMs,
    shutdownTimeoutMs: options.shutdownTimeoutMs ?? DEFAULTS.shutdownTimeoutMs,
    requestId: resolveRequestIdConfig(options),
    requestLogging: resolveRequestLoggingConfig(options, health),
    health,
    errorHandling: options.errorHandling,
    routes: options.routes,
    middleware: {
      pre: options.middleware?.pre ?? [],
      post: options.middleware?.post ?? [],
    },
    startHooks: options.startHooks ?? [],
    stopHooks: options.stopHooks ?? [],
  }
}

function resolveHealthConfig(options: ServerOptions): ResolvedHealthConfig {
  if (options.health?.enabled === false) return { enabled: false }

  return { ...DEFAULTS.health, ...options.health, enabled: true }
}

function resolveRequestIdConfig(options: ServerOptions): ResolvedRequestIdConfig {
  if (options.requestId?.enabled === false) return { enabled: false }

  return { ...DEFAULTS.requestId, ...options.requestId, enabled: true }
}

function resolveRequestLoggingConfig(
  options: ServerOptions,
  health: ResolvedHealthConfig,
): ResolvedRequestLoggingConfig {
  if (options.requestLogging?.enabled === false) return { enabled: false }

  return {
    enabled: true,
    level: options.requestLogging?.level ?? DEFAULTS.requestLogging.level,
    ignorePaths:
      options.requestLogging?.ignorePaths ??
      (health.enabled ? [health.livenessPath, health.readinessPath] : []),
  }
}
