import type { Application } from "@rawcache/server"
import { createFilesModule } from "../domains/files/api"
import type { AppConfig } from "./config"
import type { DomainServices } from "./services"

export type ApiModule = {
  name: string
  register: (app: Application) => void
}

export function registerRoutes(
  app: Application,
  config: AppConfig,
  services: DomainServices,
): void {
  const modules: ApiModule[] = [createFilesModule({ files: services.files })]

  for (const m of modules) {
    m.register(app)
  }

  app.get("/", (c) => c.text(`Welcome to ${config.app.serviceName}`))
}

export type RegisterRoutesFn = typeof registerRoutes
