/**
 * Barrel exports for the template-engine module.
 */

export {
  createTemplate,
  loadTemplate,
  renderTemplate,
  extractRecords,
  resolveBundledTemplatePath,
  BUNDLED_TEMPLATE_NAME,
} from './template-engine.js'
export {
  escapeJsonForScript,
  escapeTemplateLiteral,
  unescapeTemplateLiteral,
  serializePayload,
  parsePayload,
} from './escaping.js'
export { MARKER_PRESETS, findMarkerSpans, resolveMarker } from './markers.js'
export type { MarkerSpan } from './markers.js'
export {
  MarkerConfigSchema,
  MarkerPresetNameSchema,
  SentinelMarkerSchema,
  SpanMarkerSchema,
  PayloadContextSchema,
} from './schemas.js'
export type {
  MarkerConfig,
  MarkerPresetName,
  PayloadContext,
  SentinelMarker,
  SpanMarker,
} from './schemas.js'
export type { Template, RenderedDocument } from './types.js'
