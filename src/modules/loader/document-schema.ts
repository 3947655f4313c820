/**
 * Zod schemas for documents and options accepted by the loader.
 */

import { z } from 'zod'

/** Supported serialized formats */
export const ConfigFormatSchema = z.enum(['yaml', 'json'])
export type ConfigFormat = z.infer<typeof ConfigFormatSchema>

/**
 * Top level of a config document: a mapping whose nested shape mirrors the
 * schema. Values are checked by the tree itself when applied.
 */
export const ConfigDocumentSchema = z.record(z.string(), z.unknown())
export type ConfigDocument = z.infer<typeof ConfigDocumentSchema>

export const EnvOverrideOptionsSchema = z
  .object({
    /** Prepended to every variable name, e.g. `APP_` */
    prefix: z.string().regex(/^[A-Za-z0-9_]*$/, 'prefix may only contain letters, digits and underscores'),
    /** Joins path segments inside a variable name */
    separator: z.string().min(1).default('__'),
  })
  .strict()

export type EnvOverrideOptions = z.input<typeof EnvOverrideOptionsSchema>
