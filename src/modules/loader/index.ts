/**
 * Barrel exports for the loader module.
 */

export {
  detectFormat,
  parseConfigDocument,
  loadConfigString,
  loadConfigFile,
  loadConfigFiles,
} from './config-loader.js'
export type { LoadConfigFileOptions } from './config-loader.js'
export {
  envVarName,
  coerceEnvValue,
  readEnvOverrides,
  unknownEnvVariables,
  applyEnvOverrides,
} from './env-overrides.js'
export {
  ConfigFormatSchema,
  ConfigDocumentSchema,
  EnvOverrideOptionsSchema,
} from './document-schema.js'
export type { ConfigFormat, ConfigDocument, EnvOverrideOptions } from './document-schema.js'
