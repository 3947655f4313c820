/**
 * Declaration DSL for configuration schemas.
 *
 * @example
 * const schema = defineSchema((root) => {
 *   root.setting('database_url')
 *   root.template('credentials', (t) => {
 *     t.setting('client_id')
 *     t.setting('client_secret')
 *   })
 *   root.config('external_api', 'credentials', (api) => {
 *     api.setting('timeout_ms', 5000)
 *   })
 * })
 */

import { DeclarationError } from '../../core/errors.js'
import { isValidKey } from './key-validator.js'
import { Schema, type SchemaDefinition } from './schema.js'
import { TemplateRegistry } from './template-registry.js'

/** Procedure that adds settings and children to a schema under declaration */
export type SchemaBlock = (schema: SchemaBuilder) => void

export class SchemaBuilder {
  private readonly _settings: string[] = []
  private readonly _defaults = new Map<string, unknown>()
  private readonly _children = new Map<string, SchemaBuilder>()

  constructor(
    private readonly _templates: TemplateRegistry = new TemplateRegistry(),
    readonly name?: string,
    private readonly _parent?: SchemaBuilder
  ) {}

  get isRoot(): boolean {
    return this._parent === undefined
  }

  get pathFromRoot(): string {
    if (this._parent === undefined || this.name === undefined) return ''
    return this._parent.expandKey(this.name)
  }

  expandKey(key: string): string {
    const prefix = this.pathFromRoot
    return prefix === '' ? key : `${prefix}.${key}`
  }

  /** Names declared directly on this builder so far, in declaration order */
  get settings(): readonly string[] {
    return this._settings
  }

  // -------------------------------------------------------------------------
  // DSL
  // -------------------------------------------------------------------------

  /**
   * Declare a setting. A `null`/`undefined` default records no default.
   */
  setting(name: string, defaultValue?: unknown): this {
    this._assertDeclarable(name)

    this._settings.push(name)
    if (defaultValue !== undefined && defaultValue !== null) {
      this._defaults.set(name, defaultValue)
    }
    return this
  }

  /**
   * Declare a child configuration.
   *
   * Without a template or block, the template named like the child is
   * applied. A template given by name is applied first, then the block.
   */
  config(name: string, block?: SchemaBlock): SchemaBuilder
  config(name: string, template: string, block?: SchemaBlock): SchemaBuilder
  config(
    name: string,
    templateOrBlock?: string | SchemaBlock,
    maybeBlock?: SchemaBlock
  ): SchemaBuilder {
    this._assertDeclarable(name)

    const template = typeof templateOrBlock === 'string' ? templateOrBlock : undefined
    const block = typeof templateOrBlock === 'function' ? templateOrBlock : maybeBlock

    let templateBlock: SchemaBlock | undefined
    if (template === undefined && block === undefined) {
      templateBlock = this._templates.get(name)
      if (templateBlock === undefined) {
        throw new DeclarationError(
          `no template or block specified, and no template '${name}' found`,
          { path: this.expandKey(name), template: name }
        )
      }
    } else if (template !== undefined) {
      templateBlock = this._templates.get(template)
      if (templateBlock === undefined) {
        throw new DeclarationError(`template '${template}' not found`, {
          path: this.expandKey(name),
          template,
        })
      }
    }

    const child = new SchemaBuilder(this._templates, name, this)
    templateBlock?.(child)
    block?.(child)

    this._children.set(name, child)
    return child
  }

  /**
   * Declare a reusable template. Only the root may declare templates, and a
   * template must be declared before a `config` refers to it.
   */
  template(name: string, block?: SchemaBlock): this {
    if (!this.isRoot) {
      throw new DeclarationError(
        `template '${name}' must be declared on the root schema`,
        { template: name, path: this.pathFromRoot }
      )
    }
    this._templates.define(name, block)
    return this
  }

  // -------------------------------------------------------------------------
  // Build
  // -------------------------------------------------------------------------

  toDefinition(): SchemaDefinition {
    return {
      name: this.name,
      settings: [...this._settings],
      defaults: new Map(this._defaults),
      children: new Map(
        [...this._children].map(([key, child]) => [key, child.toDefinition()])
      ),
      templates: this.isRoot ? this._templates.snapshot() : undefined,
    }
  }

  /**
   * Freeze the declarations into an immutable Schema tree.
   * @throws {DeclarationError} when called on a child builder
   */
  build(): Schema {
    if (!this.isRoot) {
      throw new DeclarationError('only the root schema can be built', {
        path: this.pathFromRoot,
      })
    }
    return new Schema(this.toDefinition())
  }

  private _assertDeclarable(name: string): void {
    if (!isValidKey(name)) {
      throw new DeclarationError(`invalid key: ${name}`, { key: name, path: this.pathFromRoot })
    }
    if (this._settings.includes(name) || this._children.has(name)) {
      throw new DeclarationError(`'${this.expandKey(name)}' is already declared`, {
        key: name,
        path: this.expandKey(name),
      })
    }
  }
}

/**
 * Run `block` against a fresh root builder and return the frozen schema.
 */
export function defineSchema(block: SchemaBlock): Schema {
  const root = new SchemaBuilder()
  block(root)
  return root.build()
}
