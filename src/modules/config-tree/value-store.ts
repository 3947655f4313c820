/**
 * Root-owned storage for a configuration tree.
 *
 * Every leaf value of the tree lives in `values`, keyed by its fully-qualified
 * dotted path. Child nodes never hold values of their own.
 */

import type { ConfigNode } from './config-node.js'
import { interpolate } from './interpolation.js'

export class ValueStore {
  /** Fully-qualified setting path → raw stored value */
  readonly values = new Map<string, unknown>()
  /** Interpolation variables; mutate freely */
  readonly assigns: Record<string, unknown> = {}
  /** Fully-qualified child path → materialized node */
  readonly configCache = new Map<string, ConfigNode>()

  /**
   * Stored value for `path`, or `defaultValue` when unset or null. Strings are
   * interpolated on every read; the stored value is left untouched.
   */
  fetch(path: string, defaultValue?: unknown): unknown {
    const value = this.values.get(path) ?? defaultValue ?? null
    return typeof value === 'string' ? interpolate(value, this.assigns, { path }) : value
  }

  writeAll(entries: Iterable<readonly [string, unknown]>): void {
    for (const [path, value] of entries) {
      this.values.set(path, value)
    }
  }
}
