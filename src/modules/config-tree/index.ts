/**
 * Barrel exports for the config-tree module.
 */

export { ConfigNode, createConfig, isConfigNode } from './config-node.js'
export type { ConfigKey, ConfigMapping } from './config-node.js'
export { ValueStore } from './value-store.js'
export { interpolate } from './interpolation.js'
