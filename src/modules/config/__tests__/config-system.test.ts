/**
 * Unit tests for config-system-impl.ts
 *
 * Tests:
 *  - Hierarchy loading (defaults < global < project < env < CLI)
 *  - Config validation errors
 *  - get() dot-notation access
 *  - Format version checks
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdir, writeFile, rm } from 'fs/promises'
import { join } from 'path'
import { tmpdir } from 'os'
import { createConfigSystem } from '../config-system-impl.js'
import type { ConfigSystemOptions } from '../config-system.js'
import { DEFAULT_CONFIG } from '../defaults.js'
import { ConfigError, ConfigIncompatibleFormatError } from '../../../core/errors.js'

// ---------------------------------------------------------------------------
// Test setup — temporary directories
// ---------------------------------------------------------------------------

let testDir: string
let projectConfigDir: string
let globalConfigDir: string

beforeEach(async () => {
  testDir = join(tmpdir(), `logbake-config-test-${String(Date.now())}-${Math.random().toString(36).slice(2)}`)
  projectConfigDir = join(testDir, 'project', '.logbake')
  globalConfigDir = join(testDir, 'global', '.logbake')
  await mkdir(projectConfigDir, { recursive: true })
  await mkdir(globalConfigDir, { recursive: true })
})

afterEach(async () => {
  await rm(testDir, { recursive: true, force: true })
})

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function createSystem(overrides: ConfigSystemOptions = {}): ReturnType<typeof createConfigSystem> {
  return createConfigSystem({
    projectConfigDir,
    globalConfigDir,
    env: {},
    ...overrides,
  })
}

async function writeYaml(dir: string, content: string): Promise<void> {
  await writeFile(join(dir, 'config.yaml'), content, 'utf-8')
}

// ---------------------------------------------------------------------------
// Default config loading
// ---------------------------------------------------------------------------

describe('ConfigSystem - default config', () => {
  it('returns the built-in defaults when no config files exist', async () => {
    const system = createSystem()
    await system.load()
    expect(system.getConfig()).toEqual(DEFAULT_CONFIG)
    expect(system.sources).toEqual([])
  })

  it('throws ConfigError if getConfig called before load', () => {
    const system = createSystem()
    expect(system.isLoaded).toBe(false)
    expect(() => system.getConfig()).toThrow(ConfigError)
  })

  it('does not share state with DEFAULT_CONFIG', async () => {
    const system = createSystem({ cliOverrides: { validation: { required_fields: ['type'] } } })
    await system.load()
    expect(DEFAULT_CONFIG.validation.required_fields).toEqual([])
  })
})

// ---------------------------------------------------------------------------
// Hierarchy loading
// ---------------------------------------------------------------------------

describe('ConfigSystem - hierarchy loading', () => {
  it('global config overrides defaults', async () => {
    await writeYaml(globalConfigDir, 'input:\n  pattern: "*.jsonl.gz"\n')
    const system = createSystem()
    await system.load()
    expect(system.getConfig().input.pattern).toBe('*.jsonl.gz')
    expect(system.getConfig().input.compression).toBe('gzip')
    expect(system.sources).toEqual([join(globalConfigDir, 'config.yaml')])
  })

  it('project config overrides global config', async () => {
    await writeYaml(globalConfigDir, 'output:\n  concurrency: 2\n')
    await writeYaml(projectConfigDir, 'output:\n  concurrency: 4\n')
    const system = createSystem()
    await system.load()
    expect(system.getConfig().output).toEqual({ on_collision: 'fail', concurrency: 4 })
    expect(system.sources).toEqual([join(globalConfigDir, 'config.yaml'), join(projectConfigDir, 'config.yaml')])
  })

  it('env var overrides project config', async () => {
    await writeYaml(projectConfigDir, 'global:\n  log_level: info\n')
    const system = createSystem({ env: { LOGBAKE_LOG_LEVEL: 'error' } })
    await system.load()
    expect(system.getConfig().global.log_level).toBe('error')
  })

  it('CLI overrides take highest priority', async () => {
    await writeYaml(projectConfigDir, 'input:\n  limit: 5\n')
    const system = createSystem({
      env: { LOGBAKE_LIMIT: '10' },
      cliOverrides: { input: { limit: 2 } },
    })
    await system.load()
    expect(system.getConfig().input.limit).toBe(2)
  })

  it('replaces the marker as a whole', async () => {
    await writeYaml(
      globalConfigDir,
      ['render:', '  marker:', '    kind: span', '    start: "<!--a-->"', '    end: "<!--b-->"'].join('\n') + '\n',
    )
    await writeYaml(projectConfigDir, ['render:', '  marker:', '    kind: sentinel', '    token: "@@DATA@@"'].join('\n') + '\n')
    const system = createSystem()
    await system.load()
    expect(system.getConfig().render.marker).toEqual({
      kind: 'sentinel',
      token: '@@DATA@@',
      context: 'json',
      count: 1,
    })
  })

  it('lets a preset name replace a marker object', async () => {
    await writeYaml(globalConfigDir, 'render:\n  marker:\n    kind: sentinel\n    token: "@@DATA@@"\n')
    const system = createSystem({ cliOverrides: { render: { marker: 'template-literal' } } })
    await system.load()
    expect(system.getConfig().render.marker).toBe('template-literal')
  })

  it('treats an empty config file as an empty layer', async () => {
    await writeYaml(projectConfigDir, '')
    const system = createSystem()
    await system.load()
    expect(system.getConfig()).toEqual(DEFAULT_CONFIG)
  })
})

// ---------------------------------------------------------------------------
// Environment variables
// ---------------------------------------------------------------------------

describe('ConfigSystem - environment variable overrides', () => {
  it('coerces integers, booleans and lists', async () => {
    const system = createSystem({
      env: {
        LOGBAKE_CONCURRENCY: '3',
        LOGBAKE_VERIFY: 'true',
        LOGBAKE_REQUIRED_FIELDS: 'type, actor,,',
        LOGBAKE_OUTPUT_DIR: '2024',
      },
    })
    await system.load()
    const config = system.getConfig()
    expect(config.output.concurrency).toBe(3)
    expect(config.render.verify_output).toBe(true)
    expect(config.validation.required_fields).toEqual(['type', 'actor'])
    expect(config.render.output_dir).toBe('2024')
  })

  it('ignores empty variables', async () => {
    const system = createSystem({ env: { LOGBAKE_PATTERN: '' } })
    await system.load()
    expect(system.getConfig().input.pattern).toBe('*.json.gz')
  })

  it('ignores an invalid overlay and keeps loading', async () => {
    const system = createSystem({ env: { LOGBAKE_CONCURRENCY: '0', LOGBAKE_LOG_LEVEL: 'debug' } })
    await system.load()
    expect(system.getConfig().output.concurrency).toBe(1)
    expect(system.getConfig().global.log_level).toBe('warn')
  })
})

// ---------------------------------------------------------------------------
// Validation errors
// ---------------------------------------------------------------------------

describe('ConfigSystem - validation errors', () => {
  it('throws ConfigError naming the offending path', async () => {
    await writeYaml(projectConfigDir, 'output:\n  on_collision: rename\n')
    const system = createSystem()
    await expect(system.load()).rejects.toThrow(/output\.on_collision/)
  })

  it('rejects unknown keys', async () => {
    await writeYaml(projectConfigDir, 'render:\n  theme: dark\n')
    await expect(createSystem().load()).rejects.toThrow(ConfigError)
  })

  it('rejects invalid CLI overrides', async () => {
    const system = createSystem({ cliOverrides: { output: { concurrency: 0 } } })
    await expect(system.load()).rejects.toThrow(/Configuration validation failed:\n {2}• output\.concurrency/)
  })

  it('reports malformed YAML', async () => {
    await writeYaml(projectConfigDir, 'input: [unterminated\n')
    await expect(createSystem().load()).rejects.toThrow(/Failed to parse config file/)
  })
})

// ---------------------------------------------------------------------------
// Format version
// ---------------------------------------------------------------------------

describe('ConfigSystem - format version', () => {
  it('accepts a numeric version 1', async () => {
    await writeYaml(projectConfigDir, 'config_format_version: 1\n')
    const system = createSystem()
    await system.load()
    expect(system.getConfig().config_format_version).toBe('1')
  })

  it('throws ConfigIncompatibleFormatError for an unknown version', async () => {
    await writeYaml(projectConfigDir, 'config_format_version: "7"\n')
    await expect(createSystem().load()).rejects.toBeInstanceOf(ConfigIncompatibleFormatError)
  })
})

// ---------------------------------------------------------------------------
// get() dot-notation
// ---------------------------------------------------------------------------

describe('ConfigSystem - get()', () => {
  it('returns nested values by dot-notation key', async () => {
    const system = createSystem()
    await system.load()
    expect(system.get('config_format_version')).toBe('1')
    expect(system.get('render.marker')).toBe('default')
    expect(system.get('output')).toEqual({ on_collision: 'fail', concurrency: 1 })
  })

  it('returns undefined for a missing key', async () => {
    const system = createSystem()
    await system.load()
    expect(system.get('render.nope')).toBeUndefined()
    expect(system.get('render.marker.kind')).toBeUndefined()
  })
})
