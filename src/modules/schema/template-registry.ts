/**
 * Registry of reusable schema fragments, owned by the root of a schema tree.
 */

import { ConfigArgumentError, DeclarationError } from '../../core/errors.js'
import type { SchemaBlock } from './schema-builder.js'

export class TemplateRegistry {
  private readonly _templates = new Map<string, SchemaBlock>()

  /**
   * Register `block` under `name`.
   * @throws {ConfigArgumentError} when no block is given
   * @throws {DeclarationError} when the name is taken
   */
  define(name: string, block?: SchemaBlock): void {
    if (typeof block !== 'function') {
      throw new ConfigArgumentError('block required', { template: name })
    }
    if (this._templates.has(name)) {
      throw new DeclarationError(`template '${name}' is already defined`, { template: name })
    }
    this._templates.set(name, block)
  }

  get(name: string): SchemaBlock | undefined {
    return this._templates.get(name)
  }

  has(name: string): boolean {
    return this._templates.has(name)
  }

  names(): string[] {
    return [...this._templates.keys()]
  }

  /** Snapshot of all registered templates, in declaration order */
  snapshot(): ReadonlyMap<string, SchemaBlock> {
    return new Map(this._templates)
  }
}
