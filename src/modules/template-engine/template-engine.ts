/**
 * Template Engine — marker-bounded substitution of record payloads.
 *
 * Usage:
 *   const template = await loadTemplate(resolveBundledTemplatePath(), MARKER_PRESETS.default)
 *   const doc = renderTemplate(template, records)
 *
 * Bytes outside the marker spans are copied verbatim from the template; the
 * template is never reparsed or reserialised.
 */

import { existsSync } from 'fs'
import { readFile } from 'fs/promises'
import { dirname, resolve } from 'path'
import { fileURLToPath } from 'url'
import { TemplateError, errorMessage } from '../../core/errors.js'
import { createLogger } from '../../utils/logger.js'
import type { LogRecord } from '../validator/types.js'
import { parsePayload, serializePayload } from './escaping.js'
import { findMarkerSpans } from './markers.js'
import type { MarkerConfig } from './schemas.js'
import type { RenderedDocument, Template } from './types.js'

const logger = createLogger('template-engine')

/** File name of the viewer template shipped with the package */
export const BUNDLED_TEMPLATE_NAME = 'viewer.html'

/**
 * Absolute path of the bundled viewer template.
 *
 * Resolved relative to this module; src/ and dist/ sit at the same depth
 * below the package root.
 */
export function resolveBundledTemplatePath(): string {
  const here = dirname(fileURLToPath(import.meta.url))
  const candidates = [
    resolve(here, '../../../templates', BUNDLED_TEMPLATE_NAME),
    resolve(here, '../../templates', BUNDLED_TEMPLATE_NAME),
  ]
  return candidates.find((p) => existsSync(p)) ?? (candidates[0] ?? BUNDLED_TEMPLATE_NAME)
}

/**
 * Build a Template from source text. Marker rules are enforced here, once,
 * so every later render is infallible with respect to markers.
 */
export function createTemplate(source: string, marker: MarkerConfig, path?: string): Template {
  const spans = findMarkerSpans(source, marker, path)
  const segments: string[] = []
  let cursor = 0
  for (const span of spans) {
    segments.push(source.slice(cursor, span.start))
    cursor = span.end
  }
  segments.push(source.slice(cursor))

  return Object.freeze({
    ...(path !== undefined && { path }),
    source,
    marker,
    spans: Object.freeze(spans.map((s) => Object.freeze({ ...s }))),
    segments: Object.freeze(segments),
  })
}

/**
 * Read and prepare the template at `templatePath`.
 * @throws {TemplateError} when the file cannot be read or its markers are invalid
 */
export async function loadTemplate(templatePath: string, marker: MarkerConfig): Promise<Template> {
  let source: string
  try {
    source = await readFile(templatePath, 'utf-8')
  } catch (err) {
    throw new TemplateError(`Cannot read template ${templatePath}: ${errorMessage(err)}`, {
      path: templatePath,
    })
  }
  const template = createTemplate(source, marker, templatePath)
  logger.debug({ path: templatePath, spans: template.spans.length, kind: marker.kind }, 'Template loaded')
  return template
}

/** Substitute `records` into every marker span of `template` */
export function renderTemplate(template: Template, records: readonly LogRecord[]): RenderedDocument {
  const payload = serializePayload(records, template.marker.context)
  return {
    content: template.segments.join(payload),
    injectionCount: template.spans.length,
    recordCount: records.length,
  }
}

/**
 * Recover the records injected into `content` by `renderTemplate`.
 *
 * Every injection carries the same payload, so its length follows from the
 * total length of the literal segments.
 *
 * @throws {TemplateError} when `content` was not rendered from `template`
 */
export function extractRecords(template: Template, content: string): LogRecord[] {
  const { segments } = template
  const injections = segments.length - 1
  const literalLength = segments.reduce((sum, seg) => sum + seg.length, 0)
  const payloadTotal = content.length - literalLength
  if (payloadTotal < 0 || payloadTotal % injections !== 0) {
    throw new TemplateError('Document does not match the template layout', { path: template.path })
  }
  const payloadLength = payloadTotal / injections

  let payload: string | undefined
  let cursor = 0
  for (const [index, segment] of segments.entries()) {
    if (!content.startsWith(segment, cursor)) {
      throw new TemplateError(`Document differs from the template in literal segment ${String(index)}`, {
        path: template.path,
      })
    }
    cursor += segment.length
    if (index === injections) break

    const current = content.slice(cursor, cursor + payloadLength)
    if (payload !== undefined && current !== payload) {
      throw new TemplateError(`Injection ${String(index)} differs from the first injection`, {
        path: template.path,
      })
    }
    payload = current
    cursor += payloadLength
  }

  return parsePayload(payload ?? '', template.marker.context)
}
