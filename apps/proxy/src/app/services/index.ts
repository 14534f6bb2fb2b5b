import { createFileServices, type FileServices } from "../../domains/files/composition"
import type { AppConfig } from "../config"
import type { CoreServices } from "./core"
import type { InfraClients } from "./infra"

export type DomainServices = {
  files: FileServices
}

export type AppServices = {
  core: CoreServices
  domains: DomainServices
}

export function createDefaultDomainServices(
  config: AppConfig,
  core: CoreServices,
  infra: InfraClients,
): DomainServices {
  return {
    files: createFileServices(config, core, infra),
  }
}
