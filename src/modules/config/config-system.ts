/**
 * ConfigSystem interface — public contract for the configuration subsystem.
 *
 * All callers should depend on this interface, not the concrete implementation.
 * Create an instance via `createConfigSystem()` from config-system-impl.ts.
 */

import type { LogbakeConfig, PartialLogbakeConfig } from './config-schema.js'

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface ConfigSystemOptions {
  /** Project-level .logbake/ directory (default: <cwd>/.logbake) */
  projectConfigDir?: string
  /** User-level .logbake/ directory (default: ~/.logbake) */
  globalConfigDir?: string
  /**
   * Values that override every other source.
   * Typically populated from CLI flags.
   */
  cliOverrides?: PartialLogbakeConfig
  /** Environment to read LOGBAKE_* variables from (default: process.env) */
  env?: NodeJS.ProcessEnv
}

// ---------------------------------------------------------------------------
// ConfigSystem interface
// ---------------------------------------------------------------------------

/**
 * Provides access to fully-merged, validated logbake configuration.
 *
 * Hierarchy (lowest → highest priority):
 *   built-in defaults < global config < project config < env vars < CLI flags
 */
export interface ConfigSystem {
  /**
   * Load and validate configuration from all sources in hierarchy order.
   * Must be called before `getConfig()`.
   */
  load(): Promise<void>

  /**
   * Return the fully-merged, validated configuration.
   * @throws {ConfigError} if `load()` has not been called.
   */
  getConfig(): LogbakeConfig

  /**
   * Return a single value by dot-notation key (e.g. "render.marker").
   * @returns the value, or undefined if the key does not exist.
   */
  get(key: string): unknown

  /** Config files that contributed to the merged configuration, lowest priority first */
  readonly sources: readonly string[]

  readonly isLoaded: boolean
}
