export { ConfigError } from "./config.errors"
export { loadAppConfig, mapEnvToConfig } from "./load-app-config"
export type { AppConfig, CacheStoreConfig, EnvConfig } from "./schema"
