export { DotenvSource, type DotenvSourceOptions } from "./adapters/dotenv/dotenv-source"
export { EnvSource, type EnvSourceOptions } from "./adapters/env/env-source"
export type { FileSourceOptions } from "./adapters/file/read-config-file"
export { JsonSource, type JsonSourceOptions } from "./adapters/json/json-source"
export { MemoryProvider } from "./adapters/memory/memory-provider"
export { ObjectSource } from "./adapters/object/object-source"
export { SourceProvider } from "./adapters/provider/source-provider"
export { Config } from "./core/config"
export { flattenValues, KEY_DELIMITER } from "./core/flatten"
export { type LoadConfigOptions, loadConfig, loadProviderRoot } from "./core/load"
export type { IConfig } from "./ports/config"
export type {
  ConfigProvider,
  ProviderHit,
  ProviderLookup,
  ProviderMiss,
  ProviderRoot,
} from "./ports/provider"
export type { ConfigSource } from "./ports/source"
