/**
 * Read-time string interpolation against an assigns dictionary.
 *
 * `%{name}` is replaced by the assign `name`, `%%` by a literal `%`. Any other
 * `%` is left alone.
 */

import { InterpolationError } from '../../core/errors.js'

const PLACEHOLDER_PATTERN = /%(%|\{([^}]*)\})/g

/**
 * Substitute every placeholder in `template`.
 * @throws {InterpolationError} when a placeholder names a missing assign
 */
export function interpolate(
  template: string,
  assigns: Readonly<Record<string, unknown>>,
  context: Record<string, unknown> = {}
): string {
  return template.replace(
    PLACEHOLDER_PATTERN,
    (_match: string, token: string, name: string | undefined) => {
      if (token === '%') return '%'
      if (name === undefined || !Object.hasOwn(assigns, name)) {
        throw new InterpolationError(name ?? '', context)
      }
      return String(assigns[name])
    }
  )
}
