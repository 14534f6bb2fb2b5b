import { type AppConfig, loadAppConfig } from "./config"
import { type CreateStartHooksFn, createStartHooks } from "./lifecycle/start"
import { type CreateStopHooksFn, createStopHooks } from "./lifecycle/stop"
import { type RegisterRoutesFn, registerRoutes } from "./routes"
import { type AppServices, createDefaultDomainServices } from "./services"
import { type CoreServices, createCoreServices } from "./services/core"
import { createInfraClients, type InfraClients } from "./services/infra"

export type AppContextOptions = {
  env?: NodeJS.ProcessEnv

  /** Directory holding the optional `.env` file. */
  cwd?: string

  coreOverrides?: Partial<CoreServices>

  /** Replaces the default store and origin clients entirely. */
  infra?: (config: AppConfig, core: CoreServices) => InfraClients
}

export type AppContext = {
  config: AppConfig
  infra: InfraClients
  services: AppServices
  registerRoutes: RegisterRoutesFn
  createStartHooks: CreateStartHooksFn
  createStopHooks: CreateStopHooksFn
}

export async function createAppContext(options: AppContextOptions = {}): Promise<AppContext> {
  const config = await loadAppConfig(options.env ?? process.env, options.cwd)

  const core: CoreServices = { ...createCoreServices(config), ...options.coreOverrides }

  const infra = (options.infra ?? createInfraClients)(config, core)

  const domains = createDefaultDomainServices(config, core, infra)

  return {
    config,
    infra,
    services: { core, domains },
    registerRoutes,
    createStartHooks,
    createStopHooks,
  }
}
