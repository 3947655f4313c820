/**
 * Environment variable overlay for configuration trees.
 *
 * Every declared setting maps to one variable: the prefix followed by the
 * setting's fully-qualified path, upper-cased, with `__` between segments.
 *
 *   APP_ + two.four.five  →  APP_TWO__FOUR__FIVE
 */

import { ConfigArgumentError } from '../../core/errors.js'
import { childLogger, logger as rootLogger } from '../../utils/logger.js'
import { isPlainObject } from '../../utils/helpers.js'
import type { ConfigMapping, ConfigNode } from '../config-tree/config-node.js'
import type { Schema } from '../schema/schema.js'
import { EnvOverrideOptionsSchema, type EnvOverrideOptions } from './document-schema.js'

const logger = childLogger(rootLogger, { module: 'env-overrides' })

type Environment = Readonly<Record<string, string | undefined>>

function parseOptions(options: EnvOverrideOptions): { prefix: string; separator: string } {
  const result = EnvOverrideOptionsSchema.safeParse(options)
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `  • ${issue.path.join('.')}: ${issue.message}`)
      .join('\n')
    throw new ConfigArgumentError(`Invalid environment override options:\n${issues}`, {
      issues: result.error.issues,
    })
  }
  return result.data
}

/** Variable name for a fully-qualified setting path */
export function envVarName(path: string, prefix: string, separator = '__'): string {
  return `${prefix}${path.split('.').join(separator)}`.toUpperCase()
}

/**
 * Coerce a raw variable value: `true`/`false`, integers and decimals become
 * booleans and numbers, anything else stays a string. Integers outside the
 * safe range stay strings.
 */
export function coerceEnvValue(rawValue: string): unknown {
  if (rawValue === 'true') return true
  if (rawValue === 'false') return false
  if (/^-?\d+$/.test(rawValue)) {
    const parsed = parseInt(rawValue, 10)
    return Number.isSafeInteger(parsed) ? parsed : rawValue
  }
  if (/^-?\d*\.\d+$/.test(rawValue)) return parseFloat(rawValue)
  return rawValue
}

/**
 * Nested mapping of the settings below `schema` that have a variable set in
 * `env`, keyed relative to `schema`.
 * @throws {ConfigArgumentError} when two settings map to the same variable
 */
export function readEnvOverrides(
  schema: Schema,
  env: Environment,
  options: EnvOverrideOptions
): ConfigMapping {
  const { prefix, separator } = parseOptions(options)
  const overrides: ConfigMapping = {}
  const claimedBy = new Map<string, string>()

  for (const path of schema.settingPaths()) {
    const variable = envVarName(schema.expandKey(path), prefix, separator)
    const other = claimedBy.get(variable)
    if (other !== undefined) {
      throw new ConfigArgumentError(
        `settings '${schema.expandKey(other)}' and '${schema.expandKey(path)}' both map to ${variable}`,
        { variable, paths: [schema.expandKey(other), schema.expandKey(path)] }
      )
    }
    claimedBy.set(variable, path)

    const rawValue = env[variable]
    if (rawValue === undefined) continue

    const parts = path.split('.')
    const leaf = parts.pop() ?? path
    let cursor = overrides
    for (const part of parts) {
      const next = cursor[part]
      if (isPlainObject(next)) {
        cursor = next
      } else {
        const created: ConfigMapping = {}
        cursor[part] = created
        cursor = created
      }
    }
    cursor[leaf] = coerceEnvValue(rawValue)
  }

  return overrides
}

/**
 * Prefixed variables in `env` that name no declared setting of the tree.
 * Always empty for an empty prefix.
 */
export function unknownEnvVariables(
  schema: Schema,
  env: Environment,
  options: EnvOverrideOptions
): string[] {
  const { prefix, separator } = parseOptions(options)
  if (prefix === '') return []

  const known = new Set(
    schema.root.settingPaths().map((path) => envVarName(path, prefix, separator))
  )
  return Object.keys(env).filter(
    (name) => name.startsWith(prefix.toUpperCase()) && !known.has(name)
  )
}

/**
 * Apply the variables of `env` (default `process.env`) to `node`.
 * @returns the applied mapping
 */
export function applyEnvOverrides(
  node: ConfigNode,
  options: EnvOverrideOptions,
  env: Environment = process.env
): ConfigMapping {
  const log = childLogger(logger, { node: node.toString() })
  for (const variable of unknownEnvVariables(node.schema, env, options)) {
    log.warn({ variable }, 'Environment variable does not name a declared setting; ignored')
  }

  const overrides = readEnvOverrides(node.schema, env, options)
  const keys = Object.keys(overrides)
  if (keys.length > 0) {
    node.update(overrides)
  }
  log.debug({ keys }, 'Environment overrides applied')
  return overrides
}
