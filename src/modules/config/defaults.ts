/**
 * Built-in default values for the logbake configuration system.
 *
 * These are the lowest-priority defaults; they are overridden by:
 *   global config → project config → environment variables → CLI flags
 */

import type {
  LogbakeConfig,
  GlobalSettings,
  InputSettings,
  RenderSettings,
  ValidationSettings,
  OutputSettings,
} from './config-schema.js'

export const DEFAULT_GLOBAL_SETTINGS: GlobalSettings = {
  log_level: 'warn',
}

export const DEFAULT_INPUT_SETTINGS: InputSettings = {
  pattern: '*.json.gz',
  compression: 'gzip',
}

export const DEFAULT_RENDER_SETTINGS: RenderSettings = {
  marker: 'default',
  verify_output: false,
}

// Partial success: skip bad lines, keep files with zero records
export const DEFAULT_VALIDATION_SETTINGS: ValidationSettings = {
  required_fields: [],
  min_records: 0,
}

export const DEFAULT_OUTPUT_SETTINGS: OutputSettings = {
  on_collision: 'fail',
  concurrency: 1,
}

export const DEFAULT_CONFIG: LogbakeConfig = {
  config_format_version: '1',
  global: DEFAULT_GLOBAL_SETTINGS,
  input: DEFAULT_INPUT_SETTINGS,
  render: DEFAULT_RENDER_SETTINGS,
  validation: DEFAULT_VALIDATION_SETTINGS,
  output: DEFAULT_OUTPUT_SETTINGS,
}
