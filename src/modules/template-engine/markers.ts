/**
 * Marker presets and marker-span discovery.
 *
 * Policy: a template must contain exactly `marker.count` marker occurrences.
 * Zero is "not found", any other number is "ambiguous". Every occurrence is
 * replaced, and each must sit inside a <script> element.
 */

import { TemplateError } from '../../core/errors.js'
import type { MarkerConfig, MarkerPresetName } from './schemas.js'

export const MARKER_PRESETS: Readonly<Record<MarkerPresetName, MarkerConfig>> = {
  default: {
    kind: 'span',
    start: '/*logbake:records*/',
    end: '/*/logbake:records*/',
    context: 'json',
    count: 1,
  },
  sentinel: {
    kind: 'sentinel',
    token: '__LOGBAKE_RECORDS__',
    context: 'json',
    count: 1,
  },
  // Viewers that keep one record per line in a template literal and
  // JSON.parse each line in the page.
  'template-literal': {
    kind: 'span',
    start: 'allActions = `\n',
    end: "\n    `.trim().split('\\n').map(s => JSON.parse(s))",
    context: 'template-literal-lines',
    count: 1,
  },
}

/** Marker configuration for a preset name or an explicit marker object */
export function resolveMarker(marker: MarkerPresetName | MarkerConfig): MarkerConfig {
  return typeof marker === 'string' ? MARKER_PRESETS[marker] : marker
}

/**
 * Half-open range of template text replaced by the payload.
 * `outerStart`/`outerEnd` also cover the markers themselves.
 */
export interface MarkerSpan {
  start: number
  end: number
  outerStart: number
  outerEnd: number
}

function describeMarker(marker: MarkerConfig): string {
  return marker.kind === 'sentinel'
    ? `sentinel ${JSON.stringify(marker.token)}`
    : `span ${JSON.stringify(marker.start)} … ${JSON.stringify(marker.end)}`
}

function scanSentinels(source: string, token: string): MarkerSpan[] {
  const spans: MarkerSpan[] = []
  let from = 0
  for (;;) {
    const idx = source.indexOf(token, from)
    if (idx === -1) return spans
    const end = idx + token.length
    spans.push({ start: idx, end, outerStart: idx, outerEnd: end })
    from = end
  }
}

function scanSpans(source: string, startMarker: string, endMarker: string, path?: string): MarkerSpan[] {
  const spans: MarkerSpan[] = []
  let from = 0
  for (;;) {
    const open = source.indexOf(startMarker, from)
    if (open === -1) return spans
    const contentStart = open + startMarker.length
    const close = source.indexOf(endMarker, contentStart)
    if (close === -1) {
      throw new TemplateError(
        `Unterminated marker span at offset ${String(open)}: no ${JSON.stringify(endMarker)} after ${JSON.stringify(startMarker)}`,
        { path, offset: open },
      )
    }
    const nextOpen = source.indexOf(startMarker, contentStart)
    if (nextOpen !== -1 && nextOpen < close) {
      throw new TemplateError(
        `Nested marker span at offset ${String(nextOpen)}: start marker repeated before its end marker`,
        { path, offset: nextOpen },
      )
    }
    const outerEnd = close + endMarker.length
    spans.push({ start: contentStart, end: close, outerStart: open, outerEnd })
    from = outerEnd
  }
}

/** Ranges of text inside <script>…</script> elements */
function scriptBodies(source: string): Array<[number, number]> {
  const bodies: Array<[number, number]> = []
  const openTag = /<script\b[^>]*>/gi
  const closeTag = /<\/script/gi
  let open: RegExpExecArray | null
  while ((open = openTag.exec(source)) !== null) {
    const bodyStart = open.index + open[0].length
    closeTag.lastIndex = bodyStart
    const close = closeTag.exec(source)
    const bodyEnd = close === null ? source.length : close.index
    bodies.push([bodyStart, bodyEnd])
    openTag.lastIndex = bodyEnd
  }
  return bodies
}

/**
 * Locate every marker span in `source` and enforce the count and
 * script-context rules.
 */
export function findMarkerSpans(source: string, marker: MarkerConfig, path?: string): MarkerSpan[] {
  const spans =
    marker.kind === 'sentinel'
      ? scanSentinels(source, marker.token)
      : scanSpans(source, marker.start, marker.end, path)

  if (spans.length === 0) {
    const where = path !== undefined ? ` in ${path}` : ''
    throw new TemplateError(`Template marker not found: ${describeMarker(marker)}${where}`, { path })
  }
  if (spans.length !== marker.count) {
    throw new TemplateError(
      `Template marker is ambiguous: found ${String(spans.length)} occurrence(s) of ${describeMarker(marker)}, expected ${String(marker.count)}`,
      { path, found: spans.length, expected: marker.count },
    )
  }

  const bodies = scriptBodies(source)
  for (const span of spans) {
    const inside = bodies.some(([from, to]) => span.outerStart >= from && span.outerEnd <= to)
    if (!inside) {
      throw new TemplateError(
        `Template marker at offset ${String(span.outerStart)} is not inside a <script> element`,
        { path, offset: span.outerStart },
      )
    }
  }

  return spans
}
