/**
 * ConfigSystem implementation — loads configuration in hierarchy order.
 *
 * Hierarchy (lowest → highest priority):
 *   built-in defaults
 *     → global user config  (~/.logbake/config.yaml)
 *     → project config      (./.logbake/config.yaml)
 *     → environment vars    (LOGBAKE_* prefixed)
 *     → CLI flag overrides  (passed via ConfigSystemOptions.cliOverrides)
 */

import { readFile } from 'fs/promises'
import { join, resolve } from 'path'
import { homedir } from 'os'
import yaml from 'js-yaml'
import type { ZodIssue } from 'zod'
import { createLogger } from '../../utils/logger.js'
import { isPlainObject } from '../../utils/helpers.js'
import { ConfigError, ConfigIncompatibleFormatError, errorMessage } from '../../core/errors.js'
import {
  LogbakeConfigSchema,
  PartialLogbakeConfigSchema,
  SUPPORTED_CONFIG_FORMAT_VERSIONS,
  type LogbakeConfig,
  type PartialLogbakeConfig,
} from './config-schema.js'
import { DEFAULT_CONFIG } from './defaults.js'
import type { ConfigSystem, ConfigSystemOptions } from './config-system.js'

const logger = createLogger('config')

export const CONFIG_FILE_NAME = 'config.yaml'
export const CONFIG_DIR_NAME = '.logbake'

// ---------------------------------------------------------------------------
// Deep merge utility
// ---------------------------------------------------------------------------

type PlainObject = Record<string, unknown>

/** Values at these paths are replaced as a whole, never merged key by key */
const ATOMIC_PATHS: ReadonlySet<string> = new Set(['render.marker'])

function deepMerge(base: PlainObject, override: PlainObject, prefix = ''): PlainObject {
  const result: PlainObject = { ...base }
  for (const [key, val] of Object.entries(override)) {
    if (val === undefined) continue
    const path = prefix === '' ? key : `${prefix}.${key}`
    const current = result[key]
    if (isPlainObject(val) && isPlainObject(current) && !ATOMIC_PATHS.has(path)) {
      result[key] = deepMerge(current, val, path)
    } else {
      result[key] = val
    }
  }
  return result
}

function formatIssues(issues: readonly ZodIssue[]): string {
  return issues.map((issue) => `  • ${issue.path.join('.')}: ${issue.message}`).join('\n')
}

// ---------------------------------------------------------------------------
// Environment variable resolution
// ---------------------------------------------------------------------------

type EnvValueKind = 'string' | 'integer' | 'boolean' | 'list'

/** LOGBAKE_ environment variables and the config paths they set */
const ENV_VAR_MAP: Record<string, { path: string; kind: EnvValueKind }> = {
  LOGBAKE_LOG_LEVEL: { path: 'global.log_level', kind: 'string' },
  LOGBAKE_PATTERN: { path: 'input.pattern', kind: 'string' },
  LOGBAKE_LIMIT: { path: 'input.limit', kind: 'integer' },
  LOGBAKE_COMPRESSION: { path: 'input.compression', kind: 'string' },
  LOGBAKE_TEMPLATE: { path: 'render.template_path', kind: 'string' },
  LOGBAKE_MARKER: { path: 'render.marker', kind: 'string' },
  LOGBAKE_OUTPUT_DIR: { path: 'render.output_dir', kind: 'string' },
  LOGBAKE_VERIFY: { path: 'render.verify_output', kind: 'boolean' },
  LOGBAKE_REQUIRED_FIELDS: { path: 'validation.required_fields', kind: 'list' },
  LOGBAKE_MAX_INVALID: { path: 'validation.max_invalid_records', kind: 'integer' },
  LOGBAKE_MIN_RECORDS: { path: 'validation.min_records', kind: 'integer' },
  LOGBAKE_ON_COLLISION: { path: 'output.on_collision', kind: 'string' },
  LOGBAKE_CONCURRENCY: { path: 'output.concurrency', kind: 'integer' },
}

function coerceEnvValue(raw: string, kind: EnvValueKind): unknown {
  switch (kind) {
    case 'integer':
      // Left as a string when malformed so validation reports it
      return /^\d+$/.test(raw) ? parseInt(raw, 10) : raw
    case 'boolean':
      return raw === 'true' ? true : raw === 'false' ? false : raw
    case 'list':
      return raw
        .split(',')
        .map((part) => part.trim())
        .filter((part) => part.length > 0)
    case 'string':
      return raw
  }
}

/**
 * Set `value` at a dot-notation `path` inside `target`, creating
 * intermediate objects as needed.
 */
function setByPath(target: PlainObject, path: string, value: unknown): void {
  const parts = path.split('.')
  const lastKey = parts.pop()
  let cursor = target
  for (const part of parts) {
    const existing = cursor[part]
    const next: PlainObject = isPlainObject(existing) ? existing : {}
    cursor[part] = next
    cursor = next
  }
  if (lastKey !== undefined) cursor[lastKey] = value
}

/**
 * Get a value from a nested object using dot-notation key.
 */
function getByPath(obj: unknown, path: string): unknown {
  let cursor: unknown = obj
  for (const part of path.split('.')) {
    if (!isPlainObject(cursor)) return undefined
    cursor = cursor[part]
  }
  return cursor
}

/**
 * Read LOGBAKE_* variables and return a partial config overlay.
 * An invalid overlay is ignored with a warning.
 */
function readEnvOverrides(env: NodeJS.ProcessEnv): PartialLogbakeConfig {
  const overrides: PlainObject = {}
  for (const [envKey, { path, kind }] of Object.entries(ENV_VAR_MAP)) {
    const rawValue = env[envKey]
    if (rawValue === undefined || rawValue === '') continue
    setByPath(overrides, path, coerceEnvValue(rawValue, kind))
  }

  const parsed = PartialLogbakeConfigSchema.safeParse(overrides)
  if (!parsed.success) {
    logger.warn({ errors: parsed.error.issues }, 'Invalid environment variable overrides ignored')
    return {}
  }
  return parsed.data
}

// ---------------------------------------------------------------------------
// ConfigSystemImpl
// ---------------------------------------------------------------------------

export class ConfigSystemImpl implements ConfigSystem {
  private _config: LogbakeConfig | null = null
  private _sources: string[] = []
  private readonly _projectConfigDir: string
  private readonly _globalConfigDir: string
  private readonly _cliOverrides: PartialLogbakeConfig
  private readonly _env: NodeJS.ProcessEnv

  constructor(options: ConfigSystemOptions = {}) {
    this._projectConfigDir = options.projectConfigDir
      ? resolve(options.projectConfigDir)
      : resolve(process.cwd(), CONFIG_DIR_NAME)
    this._globalConfigDir = options.globalConfigDir
      ? resolve(options.globalConfigDir)
      : resolve(homedir(), CONFIG_DIR_NAME)
    this._cliOverrides = options.cliOverrides ?? {}
    this._env = options.env ?? process.env
  }

  get isLoaded(): boolean {
    return this._config !== null
  }

  get sources(): readonly string[] {
    return this._sources
  }

  async load(): Promise<void> {
    const sources: string[] = []

    // 1. Built-in defaults
    let merged: PlainObject = structuredClone(DEFAULT_CONFIG)

    // 2-3. Global, then project config files
    for (const dir of [this._globalConfigDir, this._projectConfigDir]) {
      const filePath = join(dir, CONFIG_FILE_NAME)
      const fileConfig = await this._loadYamlFile(filePath)
      if (fileConfig !== null) {
        merged = deepMerge(merged, fileConfig)
        sources.push(filePath)
      }
    }

    // 4. Environment variable overrides
    merged = deepMerge(merged, readEnvOverrides(this._env))

    // 5. CLI flag overrides
    merged = deepMerge(merged, this._cliOverrides)

    // 6. Validate the merged config
    const result = LogbakeConfigSchema.safeParse(merged)
    if (!result.success) {
      throw new ConfigError(`Configuration validation failed:\n${formatIssues(result.error.issues)}`, {
        issues: result.error.issues,
      })
    }

    this._config = result.data
    this._sources = sources
    logger.debug({ sources }, 'Configuration loaded')
  }

  getConfig(): LogbakeConfig {
    if (this._config === null) {
      throw new ConfigError('Configuration has not been loaded. Call load() before getConfig().', {})
    }
    return this._config
  }

  get(key: string): unknown {
    return getByPath(this.getConfig(), key)
  }

  // ---------------------------------------------------------------------------
  // Private helpers
  // ---------------------------------------------------------------------------

  private async _loadYamlFile(filePath: string): Promise<PartialLogbakeConfig | null> {
    let raw: string
    try {
      raw = await readFile(filePath, 'utf-8')
    } catch (err) {
      if (typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT') return null
      throw new ConfigError(`Failed to read config file at ${filePath}: ${errorMessage(err)}`, { filePath })
    }

    let parsed: unknown
    try {
      parsed = yaml.load(raw)
    } catch (err) {
      throw new ConfigError(`Failed to parse config file at ${filePath}: ${errorMessage(err)}`, { filePath })
    }
    // An empty file is an empty layer
    if (parsed === undefined || parsed === null) return {}

    if (isPlainObject(parsed)) {
      const version = parsed['config_format_version']
      // YAML reads `config_format_version: 1` as a number
      const versionText = typeof version === 'number' ? String(version) : version
      if (typeof versionText === 'string') {
        if (!SUPPORTED_CONFIG_FORMAT_VERSIONS.includes(versionText)) {
          throw new ConfigIncompatibleFormatError(
            `Configuration format version "${versionText}" in ${filePath} is not supported. ` +
              `This release supports: ${SUPPORTED_CONFIG_FORMAT_VERSIONS.join(', ')}.`,
            { filePath, version: versionText },
          )
        }
        parsed = { ...parsed, config_format_version: versionText }
      }
    }

    const result = PartialLogbakeConfigSchema.safeParse(parsed)
    if (!result.success) {
      throw new ConfigError(`Invalid config file at ${filePath}:\n${formatIssues(result.error.issues)}`, {
        filePath,
        issues: result.error.issues,
      })
    }
    return result.data
  }
}

// ---------------------------------------------------------------------------
// Factory function
// ---------------------------------------------------------------------------

/**
 * Create a new ConfigSystem instance.
 *
 * @example
 * const config = createConfigSystem()
 * await config.load()
 * const cfg = config.getConfig()
 */
export function createConfigSystem(options: ConfigSystemOptions = {}): ConfigSystem {
  return new ConfigSystemImpl(options)
}
