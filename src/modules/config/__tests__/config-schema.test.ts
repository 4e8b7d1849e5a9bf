/**
 * Unit tests for config-schema.ts
 */

import { describe, it, expect } from 'vitest'
import {
  LogbakeConfigSchema,
  PartialLogbakeConfigSchema,
  InputSettingsSchema,
  MarkerSettingSchema,
} from '../config-schema.js'
import { DEFAULT_CONFIG } from '../defaults.js'

describe('LogbakeConfigSchema', () => {
  it('accepts the built-in default config', () => {
    expect(LogbakeConfigSchema.safeParse(DEFAULT_CONFIG).success).toBe(true)
  })

  it('requires every section', () => {
    const { render: _, ...rest } = DEFAULT_CONFIG
    expect(LogbakeConfigSchema.safeParse(rest).success).toBe(false)
  })

  it('rejects an unknown config_format_version', () => {
    expect(LogbakeConfigSchema.safeParse({ ...DEFAULT_CONFIG, config_format_version: '2' }).success).toBe(false)
  })

  it('rejects extra top-level fields (strict)', () => {
    expect(LogbakeConfigSchema.safeParse({ ...DEFAULT_CONFIG, extra: true }).success).toBe(false)
  })
})

describe('InputSettingsSchema', () => {
  it('accepts a limit of 0', () => {
    expect(InputSettingsSchema.safeParse({ pattern: '*.gz', compression: 'gzip', limit: 0 }).success).toBe(true)
  })

  it('rejects negative limits, empty patterns and unknown formats', () => {
    expect(InputSettingsSchema.safeParse({ pattern: '*.gz', compression: 'gzip', limit: -1 }).success).toBe(false)
    expect(InputSettingsSchema.safeParse({ pattern: '', compression: 'gzip' }).success).toBe(false)
    expect(InputSettingsSchema.safeParse({ pattern: '*.gz', compression: 'zstd' }).success).toBe(false)
  })
})

describe('MarkerSettingSchema', () => {
  it('accepts preset names', () => {
    expect(MarkerSettingSchema.parse('sentinel')).toBe('sentinel')
  })

  it('accepts a span marker and fills in defaults', () => {
    expect(MarkerSettingSchema.parse({ kind: 'span', start: '/*a*/', end: '/*b*/', count: 2 })).toEqual({
      kind: 'span',
      start: '/*a*/',
      end: '/*b*/',
      context: 'json',
      count: 2,
    })
  })

  it('rejects unknown preset names', () => {
    expect(MarkerSettingSchema.safeParse('fancy').success).toBe(false)
  })
})

describe('PartialLogbakeConfigSchema', () => {
  it('accepts an empty object', () => {
    expect(PartialLogbakeConfigSchema.parse({})).toEqual({})
  })

  it('accepts a single nested value', () => {
    expect(PartialLogbakeConfigSchema.parse({ validation: { min_records: 1 } })).toEqual({
      validation: { min_records: 1 },
    })
  })
})
