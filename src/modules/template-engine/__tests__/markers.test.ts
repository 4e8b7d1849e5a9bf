/**
 * Unit tests for marker presets, schemas and span discovery.
 */

import { describe, it, expect } from 'vitest'
import { MARKER_PRESETS, findMarkerSpans, resolveMarker } from '../markers.js'
import { MarkerConfigSchema } from '../schemas.js'

describe('resolveMarker()', () => {
  it('maps a preset name to its marker', () => {
    expect(resolveMarker('sentinel')).toBe(MARKER_PRESETS.sentinel)
  })

  it('passes an explicit marker through', () => {
    const marker = { kind: 'sentinel', token: '@@DATA@@', context: 'json', count: 1 } as const
    expect(resolveMarker(marker)).toBe(marker)
  })
})

describe('MarkerConfigSchema', () => {
  it('defaults context to json and count to 1', () => {
    expect(MarkerConfigSchema.parse({ kind: 'sentinel', token: '@@DATA@@' })).toEqual({
      kind: 'sentinel',
      token: '@@DATA@@',
      context: 'json',
      count: 1,
    })
  })

  it('rejects unknown keys and empty tokens', () => {
    expect(MarkerConfigSchema.safeParse({ kind: 'sentinel', token: '' }).success).toBe(false)
    expect(MarkerConfigSchema.safeParse({ kind: 'span', start: 'a', end: 'b', extra: 1 }).success).toBe(false)
  })
})

describe('findMarkerSpans()', () => {
  it('returns the replaced range and the range including the markers', () => {
    const source = '<script>x = /*logbake:records*/[]/*/logbake:records*/</script>'
    const [span] = findMarkerSpans(source, MARKER_PRESETS.default)
    const start = source.indexOf('[]')
    expect(span).toEqual({
      start,
      end: start + 2,
      outerStart: start - '/*logbake:records*/'.length,
      outerEnd: start + 2 + '/*/logbake:records*/'.length,
    })
  })

  it('covers exactly the token for a sentinel marker', () => {
    const source = '<script>x = __LOGBAKE_RECORDS__</script>'
    const [span] = findMarkerSpans(source, MARKER_PRESETS.sentinel)
    const start = source.indexOf('__LOGBAKE_RECORDS__')
    expect(span?.start).toBe(start)
    expect(span?.end).toBe(start + '__LOGBAKE_RECORDS__'.length)
  })

  it('names the template path in errors', () => {
    expect(() => findMarkerSpans('<script></script>', MARKER_PRESETS.sentinel, '/tpl/viewer.html')).toThrow(
      /\/tpl\/viewer\.html/,
    )
  })
})
