export { ClientGenerator, generateFromSpec } from './generator.js';
export { loadSpec, normalizeDocument, isUrl } from './loader.js';
export { writePackage } from './writer.js';
export { loadConfig, saveConfig, parseConfig, buildConfigFromSpec, toGeneratorOptions } from './config.js';
export {
  GeneratorError,
  InvalidSpecificationError,
  UnsupportedConstructError,
  NameCollisionExhaustedError,
  ConfigurationError,
  WarningCollector,
} from './errors.js';
export { NameRegistry, sanitize } from './utils/naming.js';
export { resolveEnvironmentVariables, resolveHeadersEnvironmentVariables } from './types.js';
export type {
  APIConfig,
  AuthDescriptor,
  ForgeConfig,
  GeneratedPackage,
  GenerationResult,
  GeneratorConfig,
  GeneratorOptions,
  Operation,
  SpecDocument,
  TypeRef,
} from './types.js';
