/**
 * Immutable schema tree.
 *
 * A Schema describes one node type of a configuration tree: the settings it
 * declares directly, their defaults, and its child schemas. Schemas are
 * produced by `SchemaBuilder.build()` / `defineSchema()` and never change
 * afterwards.
 */

import type { SchemaBlock } from './schema-builder.js'

// ---------------------------------------------------------------------------
// Definition
// ---------------------------------------------------------------------------

/**
 * Plain description of a schema node, as accumulated by the builder.
 */
export interface SchemaDefinition {
  name?: string
  settings: readonly string[]
  defaults: ReadonlyMap<string, unknown>
  children: ReadonlyMap<string, SchemaDefinition>
  /** Only read on the root definition */
  templates?: ReadonlyMap<string, SchemaBlock>
}

// ---------------------------------------------------------------------------
// Schema
// ---------------------------------------------------------------------------

export class Schema {
  readonly name: string | undefined
  readonly parent: Schema | undefined
  /** Dotted prefix of this node below the root; `''` on the root */
  readonly pathFromRoot: string
  readonly settings: readonly string[]
  readonly defaults: ReadonlyMap<string, unknown>
  readonly children: ReadonlyMap<string, Schema>
  /** Template registry snapshot; present on the root schema only */
  readonly templates: ReadonlyMap<string, SchemaBlock> | undefined

  constructor(definition: SchemaDefinition, parent?: Schema) {
    this.parent = parent
    this.name = parent === undefined ? undefined : definition.name
    this.pathFromRoot =
      parent === undefined || definition.name === undefined
        ? ''
        : parent.expandKey(definition.name)
    this.settings = Object.freeze([...definition.settings])
    this.defaults = new Map(definition.defaults)
    this.children = new Map(
      [...definition.children].map(([key, child]) => [key, new Schema(child, this)])
    )
    this.templates = parent === undefined ? new Map(definition.templates ?? []) : undefined
    Object.freeze(this)
  }

  get isRoot(): boolean {
    return this.parent === undefined
  }

  get root(): Schema {
    return this.parent === undefined ? this : this.parent.root
  }

  /** Fully-qualified path of `key` declared on this schema */
  expandKey(key: string): string {
    return this.pathFromRoot === '' ? key : `${this.pathFromRoot}.${key}`
  }

  hasSetting(name: string): boolean {
    return this.settings.includes(name)
  }

  hasChild(name: string): boolean {
    return this.children.has(name)
  }

  child(name: string): Schema | undefined {
    return this.children.get(name)
  }

  /**
   * Whether `key` (dotted, or pre-split into segments) resolves to a leaf
   * setting. A key ending on a child config is not a defined setting.
   */
  isKeyDefined(key: string | readonly string[]): boolean {
    const [head, ...tail] = typeof key === 'string' ? key.split('.') : key
    if (head === undefined) return false

    const child = this.children.get(head)
    if (child !== undefined) return child.isKeyDefined(tail)
    return tail.length === 0 && this.settings.includes(head)
  }

  /**
   * Declared default for a dotted setting key, looked up on the schema that
   * declares the final segment.
   */
  defaultFor(key: string): unknown {
    const segments = key.split('.')
    const last = segments.pop()
    if (last === undefined) return undefined

    let schema: Schema = this
    for (const segment of segments) {
      const next = schema.children.get(segment)
      if (next === undefined) return undefined
      schema = next
    }
    return schema.defaults.get(last)
  }

  /**
   * Dotted paths of every leaf setting below this schema, relative to it,
   * settings before children.
   */
  settingPaths(): string[] {
    const paths = [...this.settings]
    for (const [key, child] of this.children) {
      for (const path of child.settingPaths()) {
        paths.push(`${key}.${path}`)
      }
    }
    return paths
  }

  toString(): string {
    return `Schema(${this.pathFromRoot === '' ? '<root>' : this.pathFromRoot})`
  }
}
