/**
 * Config loader: applies YAML or JSON documents to a configuration tree.
 *
 * The tree only knows `update(mapping)`. This module turns files and strings
 * into such mappings, then hands them over.
 */

import { access, readFile } from 'fs/promises'
import { extname } from 'path'
import yaml from 'js-yaml'
import { ConfigLoadError } from '../../core/errors.js'
import { childLogger, logger as rootLogger } from '../../utils/logger.js'
import type { ConfigNode } from '../config-tree/config-node.js'
import {
  ConfigDocumentSchema,
  type ConfigDocument,
  type ConfigFormat,
} from './document-schema.js'

const logger = childLogger(rootLogger, { module: 'loader' })

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface LoadConfigFileOptions {
  /** Overrides detection from the file extension */
  format?: ConfigFormat
  /** Resolve to `null` instead of failing when the file does not exist */
  optional?: boolean
}

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

/**
 * Format implied by a file extension: `.yaml`/`.yml` or `.json`.
 * @throws {ConfigLoadError} for any other extension
 */
export function detectFormat(filePath: string): ConfigFormat {
  switch (extname(filePath).toLowerCase()) {
    case '.yaml':
    case '.yml':
      return 'yaml'
    case '.json':
      return 'json'
    default:
      throw new ConfigLoadError(`Unsupported config file extension: ${filePath}`, { filePath })
  }
}

/**
 * Parse `text` into a config mapping. Blank documents yield `{}`.
 * @throws {ConfigLoadError} on syntax errors or when the top level is not a mapping
 */
export function parseConfigDocument(
  text: string,
  format: ConfigFormat,
  context: Record<string, unknown> = {}
): ConfigDocument {
  if (text.trim() === '') return {}

  let parsed: unknown
  try {
    parsed = format === 'yaml' ? yaml.load(text) : JSON.parse(text)
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err)
    throw new ConfigLoadError(`Failed to parse ${format} config: ${message}`, { format, ...context })
  }

  if (parsed === null || parsed === undefined) return {}

  const result = ConfigDocumentSchema.safeParse(parsed)
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `  • ${issue.message}`).join('\n')
    throw new ConfigLoadError(`Config document must be a mapping:\n${issues}`, {
      format,
      issues: result.error.issues,
      ...context,
    })
  }
  return result.data
}

// ---------------------------------------------------------------------------
// Loading
// ---------------------------------------------------------------------------

/**
 * Parse `text` and apply it to `node`. Undeclared keys raise the tree's own
 * errors and leave the node unchanged.
 * @returns the applied document
 */
export function loadConfigString(
  node: ConfigNode,
  text: string,
  format: ConfigFormat
): ConfigDocument {
  const document = parseConfigDocument(text, format)
  node.update(document)
  return document
}

/**
 * Read a YAML or JSON file and apply it to `node`.
 * @returns the applied document, or `null` for a missing optional file
 * @throws {ConfigLoadError} when the file cannot be read or parsed
 */
export async function loadConfigFile(
  node: ConfigNode,
  filePath: string,
  options: LoadConfigFileOptions = {}
): Promise<ConfigDocument | null> {
  const format = options.format ?? detectFormat(filePath)
  const log = childLogger(logger, { filePath })

  if (options.optional === true && !(await fileExists(filePath))) {
    log.debug('Optional config file not found, skipping')
    return null
  }

  let raw: string
  try {
    raw = await readFile(filePath, 'utf-8')
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err)
    throw new ConfigLoadError(`Failed to read config file at ${filePath}: ${message}`, { filePath })
  }

  const document = parseConfigDocument(raw, format, { filePath })
  node.update(document)
  log.debug({ format, node: node.toString() }, 'Config file applied')
  return document
}

/**
 * Apply several files in order; later files override earlier ones.
 * @returns the paths that were actually applied
 */
export async function loadConfigFiles(
  node: ConfigNode,
  filePaths: readonly string[],
  options: LoadConfigFileOptions = {}
): Promise<string[]> {
  const applied: string[] = []
  for (const filePath of filePaths) {
    const document = await loadConfigFile(node, filePath, options)
    if (document !== null) applied.push(filePath)
  }
  return applied
}

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await access(filePath)
    return true
  } catch {
    return false
  }
}
