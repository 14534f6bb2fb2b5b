export type { ServerContextVariables } from "./types/context"
export {
  createErrorFormatter,
  type ErrorMapping,
  type ErrorMappingsConfig,
  type ErrorResponse,
  type StatusCode,
} from "./errors/errors"
export { ServerStartupError } from "./errors/server.errors"
export type { ServerHandle } from "./lifecycle/create-stopper"
export type { LifecycleHook, LifecycleHookContext } from "./lifecycle/run-hooks"
export type { StopResult } from "./lifecycle/shutdown"
export {
  type Application,
  type Context,
  createServer,
  type Middleware,
  type Server,
} from "./server/server"
export type {
  PathString,
  ReadinessCheck,
  ServerDependencies,
  ServerOptions,
} from "./server/server-options"
