/**
 * ConfigNode: runtime view of a configuration tree.
 *
 * The root node owns the tree's ValueStore. Child nodes are created on first
 * access, cached in the root store by fully-qualified path, and forward every
 * read and write to the root after expanding their local key.
 *
 * Declared names are also reachable as attributes:
 *
 *   config.one = 'Hello'          // set('one', 'Hello')
 *   config.two                    // get('two') → cached child node
 *   config.missing                // throws UndefinedSettingError
 *
 *   config['two.four.five']       // get('two.four.five')
 *   config[Symbol.for('one')]     // get('one')
 *
 * Attribute sugar yields to the node's own members (`get`, `set`, `update`,
 * `values`, ...). Settings with such names stay reachable through get/set.
 * Unregistered symbols (`Symbol('one')`) work through get/set only.
 */

import { inspect } from 'util'
import {
  CannotModifyConfigurationError,
  ConfigArgumentError,
  UndefinedSettingError,
} from '../../core/errors.js'
import { isPlainObject } from '../../utils/helpers.js'
import type { Schema } from '../schema/schema.js'
import { ValueStore } from './value-store.js'

/** Lookup key: a name or dotted path; symbols stand for their description */
export type ConfigKey = string | symbol

/** Nested plain-object form of (part of) a configuration tree */
export type ConfigMapping = Record<string, unknown>

type PendingWrite = readonly [path: string, value: unknown]

// ---------------------------------------------------------------------------
// Write planning
// ---------------------------------------------------------------------------

/**
 * Resolve `key` against `schema` and queue the resulting leaf writes. Throws
 * before anything is written, so a failed batch leaves the store unchanged.
 */
function planWrite(schema: Schema, key: string, value: unknown, writes: PendingWrite[]): void {
  const dot = key.indexOf('.')
  if (dot !== -1) {
    const child = schema.child(key.slice(0, dot))
    if (child === undefined) throw new UndefinedSettingError(schema.expandKey(key))
    planWrite(child, key.slice(dot + 1), value, writes)
    return
  }

  const child = schema.child(key)
  if (child !== undefined) {
    if (!isPlainObject(value)) throw new CannotModifyConfigurationError(schema.expandKey(key))
    planMappingWrites(child, value, writes)
    return
  }

  if (!schema.isKeyDefined(key)) throw new UndefinedSettingError(schema.expandKey(key))
  writes.push([schema.expandKey(key), value])
}

function planMappingWrites(schema: Schema, mapping: ConfigMapping, writes: PendingWrite[]): void {
  for (const [key, value] of Object.entries(mapping)) {
    planWrite(schema, key, value, writes)
  }
}

function normalizeKey(key: ConfigKey): string {
  return typeof key === 'symbol' ? (key.description ?? '') : key
}

// ---------------------------------------------------------------------------
// Attribute access
// ---------------------------------------------------------------------------

/**
 * Names that test runners, pretty-printers and promise resolution probe on
 * arbitrary objects. Unless declared, they read as `undefined` instead of
 * raising, so nodes stay inspectable and awaitable.
 */
const PROBED_NAMES: ReadonlySet<string> = new Set([
  'then',
  '$$typeof',
  'asymmetricMatch',
  'nodeType',
  '_isMockFunction',
  '@@__IMMUTABLE_ITERABLE__@@',
  '@@__IMMUTABLE_RECORD__@@',
])

/**
 * Name a property stands for, or undefined when the node's own members or
 * the runtime should handle it. Symbols from the global registry stand for
 * their description when that names a declared setting or child.
 */
function attributeName(target: ConfigNode, property: string | symbol): string | undefined {
  if (property in target) return undefined
  if (typeof property === 'symbol') {
    const name = Symbol.keyFor(property)
    return name !== undefined && target.isDeclared(name) ? name : undefined
  }
  if (PROBED_NAMES.has(property) && !target.isDeclared(property)) return undefined
  return property
}

/**
 * Routes attribute reads and writes that the node does not define itself
 * through get/set, dotted paths included.
 */
const attributeAccess: ProxyHandler<ConfigNode> = {
  get(target, property, receiver: unknown) {
    const name = attributeName(target, property)
    if (name === undefined) return Reflect.get(target, property, receiver)
    return (isConfigNode(receiver) ? receiver : target).get(name)
  },

  set(target, property, value: unknown, receiver: unknown) {
    const name = attributeName(target, property)
    if (name === undefined) return Reflect.set(target, property, value)
    const node = isConfigNode(receiver) ? receiver : target
    node.set(name, value)
    return true
  },

  has(target, property) {
    const name = typeof property === 'symbol' ? Symbol.keyFor(property) : property
    if (name !== undefined && target.isDeclared(name)) return true
    return Reflect.has(target, property)
  },
}

// ---------------------------------------------------------------------------
// ConfigNode
// ---------------------------------------------------------------------------

export class ConfigNode {
  /** Declared settings and child configs, reachable as attributes */
  [key: string]: unknown
  [key: symbol]: unknown

  readonly schema: Schema
  /** Node that materialized this one; undefined on the root */
  readonly parent: ConfigNode | undefined

  private _store: ValueStore | undefined = undefined

  constructor(schema: Schema, parent?: ConfigNode) {
    if (parent === undefined && !schema.isRoot) {
      throw new ConfigArgumentError(
        `a root config node needs a root schema, got ${schema.toString()}`,
        { path: schema.pathFromRoot }
      )
    }
    this.schema = schema
    this.parent = parent
    return new Proxy(this, attributeAccess)
  }

  get configRoot(): ConfigNode {
    return this.parent === undefined ? this : this.parent.configRoot
  }

  get isChild(): boolean {
    return this.parent !== undefined
  }

  /** Interpolation variables of the whole tree; mutate directly */
  get assigns(): Record<string, unknown> {
    return this._rootStore().assigns
  }

  expandKey(key: string): string {
    return this.schema.expandKey(key)
  }

  /** Whether `name` is a setting or child config declared on this node */
  isDeclared(name: string): boolean {
    return this.schema.hasSetting(name) || this.schema.hasChild(name)
  }

  // -------------------------------------------------------------------------
  // Read / write
  // -------------------------------------------------------------------------

  /**
   * Value of a setting, or the cached child node for a child config.
   *
   * `key` may be a dotted path relative to this node. Without an explicit
   * `defaultValue` the declared default applies.
   *
   * @throws {UndefinedSettingError} when the key resolves to nothing declared
   */
  get(key: ConfigKey, defaultValue?: unknown): unknown {
    const name = normalizeKey(key)

    const dot = name.indexOf('.')
    if (dot !== -1) {
      const head = name.slice(0, dot)
      if (!this.schema.hasChild(head)) throw new UndefinedSettingError(this.expandKey(name))
      return this.child(head).get(name.slice(dot + 1), defaultValue)
    }

    if (this.schema.hasChild(name)) return this.child(name)

    if (!this.schema.isKeyDefined(name)) throw new UndefinedSettingError(this.expandKey(name))
    return this._rootStore().fetch(this.expandKey(name), defaultValue ?? this.schema.defaults.get(name))
  }

  /**
   * Write a setting, or apply a mapping.
   *
   * A mapping value on a child-config key is applied to that child, so
   * `set('two', { three: 'x' })` equals `child('two').update({ three: 'x' })`.
   *
   * @throws {UndefinedSettingError} when the key is not declared
   * @throws {CannotModifyConfigurationError} when a non-mapping targets a child config
   */
  set(entries: ConfigMapping): this
  set(key: ConfigKey, value: unknown): this
  set(keyOrEntries: ConfigKey | ConfigMapping, ...value: unknown[]): this {
    if (value.length > 1) {
      throw new ConfigArgumentError('too many arguments (1 or 2 expected)', {
        received: value.length + 1,
      })
    }

    const writes: PendingWrite[] = []
    if (isPlainObject(keyOrEntries)) {
      if (value.length > 0) {
        throw new ConfigArgumentError('a mapping of entries takes no separate value', {
          received: value.length + 1,
        })
      }
      planMappingWrites(this.schema, keyOrEntries, writes)
    } else {
      planWrite(this.schema, normalizeKey(keyOrEntries), value[0], writes)
    }

    this._rootStore().writeAll(writes)
    return this
  }

  /**
   * Recursively apply a nested mapping. Mapping values on child keys update
   * the child; everything else is set. `null`/`undefined` is a no-op.
   */
  update(mapping: ConfigMapping | null | undefined): this {
    if (mapping === null || mapping === undefined) return this
    if (!isPlainObject(mapping)) {
      throw new ConfigArgumentError('update expects a mapping', {
        path: this.schema.pathFromRoot,
        received: typeof mapping,
      })
    }

    const writes: PendingWrite[] = []
    planMappingWrites(this.schema, mapping, writes)
    this._rootStore().writeAll(writes)
    return this
  }

  /**
   * Stored value for a fully-qualified path, falling back to `defaultValue`,
   * interpolated against the assigns. Does not consult the schema.
   */
  fetch(path: string, defaultValue?: unknown): unknown {
    return this._rootStore().fetch(path, defaultValue)
  }

  /**
   * Child node for a child-config name or dotted path of child names. The
   * same instance is returned on every access.
   * @throws {UndefinedSettingError} when a segment is not a child config
   */
  child(path: string): ConfigNode {
    let node: ConfigNode = this
    for (const segment of path.split('.')) {
      node = node._childNode(segment)
    }
    return node
  }

  // -------------------------------------------------------------------------
  // Export
  // -------------------------------------------------------------------------

  /**
   * Plain nested object mirroring this node's schema: settings in declaration
   * order, then children. Unset settings without a default are `null`.
   */
  toHash(): ConfigMapping {
    const entries: Array<[string, unknown]> = this.schema.settings.map(
      (key): [string, unknown] => [key, this.get(key)]
    )
    for (const key of this.schema.children.keys()) {
      entries.push([key, this._childNode(key).toHash()])
    }
    return Object.fromEntries(entries)
  }

  toJSON(): ConfigMapping {
    return this.toHash()
  }

  /**
   * Explicitly assigned values below this node, keyed by fully-qualified
   * path. Defaults and unset settings are not included.
   */
  values(): Record<string, unknown> {
    const prefix = this.schema.pathFromRoot === '' ? '' : `${this.schema.pathFromRoot}.`
    const entries = [...this._rootStore().values].filter(([path]) => path.startsWith(prefix))
    return Object.fromEntries(entries)
  }

  /** Child nodes materialized so far in the whole tree, keyed by path */
  configs(): ReadonlyMap<string, ConfigNode> {
    return new Map(this._rootStore().configCache)
  }

  // -------------------------------------------------------------------------
  // Hash-like helpers (operate on a toHash() snapshot)
  // -------------------------------------------------------------------------

  keys(): string[] {
    return Object.keys(this.toHash())
  }

  entries(): Array<[string, unknown]> {
    return Object.entries(this.toHash())
  }

  each(callback: (value: unknown, key: string) => void): this {
    for (const [key, value] of this.entries()) callback(value, key)
    return this
  }

  map<T>(callback: (value: unknown, key: string) => T): T[] {
    return this.entries().map(([key, value]) => callback(value, key))
  }

  select(predicate: (value: unknown, key: string) => boolean): ConfigMapping {
    return Object.fromEntries(this.entries().filter(([key, value]) => predicate(value, key)))
  }

  except(...keys: string[]): ConfigMapping {
    return Object.fromEntries(this.entries().filter(([key]) => !keys.includes(key)))
  }

  /** Top-level snapshot keyed by `Symbol.for(name)` */
  symbolizeKeys(): Map<symbol, unknown> {
    return new Map(this.entries().map(([key, value]) => [Symbol.for(key), value]))
  }

  toString(): string {
    const path = this.schema.pathFromRoot
    return `Config(${path === '' ? '<root>' : path})`
  }

  [inspect.custom](): string {
    return this.toString()
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  private _rootStore(): ValueStore {
    const root = this.configRoot
    if (root._store === undefined) root._store = new ValueStore()
    return root._store
  }

  private _childNode(name: string): ConfigNode {
    const schema = this.schema.child(name)
    if (schema === undefined) throw new UndefinedSettingError(this.expandKey(name))

    const cache = this._rootStore().configCache
    let node = cache.get(schema.pathFromRoot)
    if (node === undefined) {
      node = new ConfigNode(schema, this)
      cache.set(schema.pathFromRoot, node)
    }
    return node
  }
}

export function isConfigNode(value: unknown): value is ConfigNode {
  return value instanceof ConfigNode
}

/**
 * Create the root node of a tree for `schema`, optionally applying initial
 * values through `update`.
 */
export function createConfig(schema: Schema, initial?: ConfigMapping | null): ConfigNode {
  const node = new ConfigNode(schema)
  return node.update(initial)
}
