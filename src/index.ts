/**
 * settree - Main module exports
 * Public API surface for the library
 */

// Core errors
export * from './core/errors.js'
// Utilities
export { createLogger, childLogger, logger } from './utils/logger.js'
export type { LoggerOptions } from './utils/logger.js'

// Schema declaration
export { Schema, SchemaBuilder, TemplateRegistry, defineSchema, isValidKey } from './modules/schema/index.js'
export type { SchemaBlock, SchemaDefinition } from './modules/schema/index.js'

// Configuration trees
export {
  ConfigNode,
  ValueStore,
  createConfig,
  interpolate,
  isConfigNode,
} from './modules/config-tree/index.js'
export type { ConfigKey, ConfigMapping } from './modules/config-tree/index.js'

// Loading from files and the environment
export * from './modules/loader/index.js'
