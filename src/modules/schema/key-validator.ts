/**
 * Key validation for setting and child-config names.
 *
 * Applied when a schema is declared. Runtime lookups are checked against the
 * schema instead.
 */

const VALID_KEY_PATTERN = /^[A-Za-z0-9_]+$/

/**
 * Whether `name` is a legal setting or child-config name: one or more ASCII
 * letters, digits or underscores.
 */
export function isValidKey(name: string): boolean {
  return VALID_KEY_PATTERN.test(name)
}
