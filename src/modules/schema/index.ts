/**
 * Barrel exports for the schema module.
 */

export { Schema } from './schema.js'
export type { SchemaDefinition } from './schema.js'
export { SchemaBuilder, defineSchema } from './schema-builder.js'
export type { SchemaBlock } from './schema-builder.js'
export { TemplateRegistry } from './template-registry.js'
export { isValidKey } from './key-validator.js'
