import { describe, it, expect } from 'vitest'
import { formatDuration, isPlainObject } from '../helpers.js'

describe('formatDuration', () => {
  it.each([
    [0, '0ms'],
    [999, '999ms'],
    [1500, '1.5s'],
    [61_000, '1m 1s'],
    [3_723_000, '1h 2m'],
  ])('%d → %s', (ms, expected) => {
    expect(formatDuration(ms)).toBe(expected)
  })
})

describe('isPlainObject', () => {
  it('accepts object literals and null-prototype objects', () => {
    expect(isPlainObject({ a: 1 })).toBe(true)
    expect(isPlainObject(Object.create(null))).toBe(true)
  })

  it('rejects arrays, dates, null and primitives', () => {
    expect(isPlainObject([])).toBe(false)
    expect(isPlainObject(new Date())).toBe(false)
    expect(isPlainObject(null)).toBe(false)
    expect(isPlainObject('x')).toBe(false)
  })
})
