export { MemorySkinAssets } from "./adapters/assets/memory/memory-skin-assets"
export type { MemorySkinAssetsInit } from "./adapters/assets/memory/memory-skin-assets"
export { NullLogger } from "./adapters/logger/null/null-logger"
export { createPinoLogger, PinoLogger } from "./adapters/logger/pino/pino-logger"
export type { PinoLoggerDeps } from "./adapters/logger/pino/pino-logger"
export { DotenvSource } from "./adapters/settings/dotenv/dotenv-source"
export type { DotenvSourceOptions } from "./adapters/settings/dotenv/dotenv-source"
export { EnvSource } from "./adapters/settings/env/env-source"
export type { EnvSourceOptions } from "./adapters/settings/env/env-source"
export { ObjectSource } from "./adapters/settings/object/object-source"
export { ResolutionChain } from "./core/chain/resolution-chain"
export type { ResolutionChainDeps } from "./core/chain/resolution-chain"
export { comboColourFallback, versionFallback } from "./core/chain/fallback-policies"
export type { ComboColourFallback } from "./core/chain/fallback-policies"
export {
  colour,
  colourEquals,
  colourListEquals,
  DEFAULT_COMBO_COLOURS,
} from "./core/colour/colour"
export { coerce } from "./core/coercion/coerce"
export { ValueTypes } from "./core/coercion/value-types"
export type { EnumLike } from "./core/coercion/parsers"
export {
  ColourRangeError,
  ContractViolationError,
  SettingsError,
  StoreDefinitionError,
} from "./core/errors/errors"
export { isSkinError } from "./core/errors/is-skin-error"
export { serializeError, SkinError } from "./core/errors/skin-error"
export type { SkinErrorOptions } from "./core/errors/skin-error"
export { ProviderScope } from "./core/hierarchy/provider-scope"
export type { ProviderScopeDeps } from "./core/hierarchy/provider-scope"
export { assertCompatible, converterFor } from "./core/lookup/compatibility"
export { lookupKeyId, lookupKeysEqual } from "./core/lookup/lookup-key-id"
export { lookup, lookups } from "./core/lookup/lookups"
export { ObservableValue } from "./core/observable/observable-value"
export { SkinRequester } from "./core/requester/skin-requester"
export { createLogger, createSkinRuntime } from "./core/runtime/create-skin-runtime"
export type { SkinRuntime, SkinRuntimeOptions } from "./core/runtime/create-skin-runtime"
export { LoadedSettings } from "./core/settings/loaded-settings"
export { loadSettings } from "./core/settings/load-settings"
export type { LoadSettingsOptions } from "./core/settings/load-settings"
export type { RuntimeSettings } from "./core/settings/schema"
export { SkinSource } from "./core/source/skin-source"
export type { SkinSourceOptions } from "./core/source/skin-source"
export { ConfigurationStore } from "./core/store/configuration-store"
export type { ConfigurationStoreInit } from "./core/store/configuration-store"
export { decodeStore } from "./core/store/decode-store"
export { LATEST_VERSION, LEGACY_BASELINE_VERSION } from "./core/store/legacy-version"
export type { StoreDefinition } from "./core/store/store-definition.schema"
export type * from "./ports/assets"
export type * from "./ports/coercion-result"
export type { Colour } from "./ports/colour"
export type { AppError, ErrorCode, ErrorContext, SerializedError } from "./ports/error"
export type * from "./ports/local-lookup"
export type { LogContext, LogContextPatch, LogMeta } from "./ports/log-context"
export { logLevelNames, LogLevels } from "./ports/log-level"
export type { LogLevel, LogLevelName } from "./ports/log-level"
export type { Logger } from "./ports/logger"
export type { LoggerOptions } from "./ports/logger-options"
export type { Lookup } from "./ports/lookup"
export { globalColourNames, legacySettingNames } from "./ports/lookup-key"
export type {
  CustomColourKey,
  EnumKey,
  GlobalColourKey,
  GlobalColourName,
  LegacySettingKey,
  LegacySettingName,
  LookupKey,
  LookupKeyKind,
  SettingKey,
} from "./ports/lookup-key"
export type * from "./ports/observable"
export type { SettingsSource } from "./ports/settings-source"
export type { Skin } from "./ports/skin"
export type { Converter, Parsed, ValueType } from "./ports/value-type"
