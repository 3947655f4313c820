/**
 * General utility helpers for settree
 */

/**
 * Check if a value is a plain object (not an array, Date, config node or other special object)
 * @param value - Value to check
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false
  }
  const proto = Object.getPrototypeOf(value) as unknown
  return proto === Object.prototype || proto === null
}

