/**
 * Zod validation schemas for the logbake configuration file.
 *
 * Sections:
 *  - global      logging
 *  - input       which files a run picks up and how they are compressed
 *  - render      template, marker and output location
 *  - validation  record policy
 *  - output      collision policy and concurrency
 */

import { z } from 'zod'
import { COMPRESSION_FORMATS } from '../decoder/types.js'
import { MarkerConfigSchema, MarkerPresetNameSchema } from '../template-engine/schemas.js'

// ---------------------------------------------------------------------------
// Sections
// ---------------------------------------------------------------------------

export const LogLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'])
export type LogLevelValue = z.infer<typeof LogLevelSchema>

export const GlobalSettingsSchema = z
  .object({
    log_level: LogLevelSchema,
  })
  .strict()

export type GlobalSettings = z.infer<typeof GlobalSettingsSchema>

export const InputSettingsSchema = z
  .object({
    /** Glob matched against paths relative to an input directory */
    pattern: z.string().min(1),
    /** Max files taken from a directory (absent = unlimited) */
    limit: z.number().int().min(0).optional(),
    compression: z.enum(COMPRESSION_FORMATS),
  })
  .strict()

export type InputSettings = z.infer<typeof InputSettingsSchema>

/** A preset name, or a full marker definition */
export const MarkerSettingSchema = z.union([MarkerPresetNameSchema, MarkerConfigSchema])
export type MarkerSetting = z.infer<typeof MarkerSettingSchema>

export const RenderSettingsSchema = z
  .object({
    /** Template file (absent = bundled viewer) */
    template_path: z.string().min(1).optional(),
    marker: MarkerSettingSchema,
    /** Output directory (absent = beside each input) */
    output_dir: z.string().min(1).optional(),
    /** Re-extract the records from every rendered document before writing */
    verify_output: z.boolean(),
  })
  .strict()

export type RenderSettings = z.infer<typeof RenderSettingsSchema>

export const ValidationSettingsSchema = z
  .object({
    required_fields: z.array(z.string().min(1)),
    /** Invalid lines tolerated per file (absent = unlimited) */
    max_invalid_records: z.number().int().min(0).optional(),
    min_records: z.number().int().min(0),
  })
  .strict()

export type ValidationSettings = z.infer<typeof ValidationSettingsSchema>

export const OutputSettingsSchema = z
  .object({
    on_collision: z.enum(['fail', 'overwrite']),
    concurrency: z.number().int().min(1).max(64),
  })
  .strict()

export type OutputSettings = z.infer<typeof OutputSettingsSchema>

// ---------------------------------------------------------------------------
// Top-level configuration document
// ---------------------------------------------------------------------------

/** Current config format version */
export const CURRENT_CONFIG_FORMAT_VERSION = '1'

/** All config format versions this release can read */
export const SUPPORTED_CONFIG_FORMAT_VERSIONS: readonly string[] = ['1']

export const LogbakeConfigSchema = z
  .object({
    config_format_version: z.literal('1'),
    global: GlobalSettingsSchema,
    input: InputSettingsSchema,
    render: RenderSettingsSchema,
    validation: ValidationSettingsSchema,
    output: OutputSettingsSchema,
  })
  .strict()

export type LogbakeConfig = z.infer<typeof LogbakeConfigSchema>

// ---------------------------------------------------------------------------
// Partial config (one layer before merging)
// ---------------------------------------------------------------------------

export const PartialLogbakeConfigSchema = z
  .object({
    config_format_version: z.literal('1').optional(),
    global: GlobalSettingsSchema.partial().optional(),
    input: InputSettingsSchema.partial().optional(),
    render: RenderSettingsSchema.partial().optional(),
    validation: ValidationSettingsSchema.partial().optional(),
    output: OutputSettingsSchema.partial().optional(),
  })
  .strict()

export type PartialLogbakeConfig = z.infer<typeof PartialLogbakeConfigSchema>
