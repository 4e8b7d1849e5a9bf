/**
 * Template Engine — shared types
 */

import type { MarkerSpan } from './markers.js'
import type { MarkerConfig } from './schemas.js'

/**
 * A loaded template. Immutable; shared read-only by every render in a run.
 *
 * `segments` are the literal template pieces around the marker spans:
 * `segments.length === spans.length + 1`.
 */
export interface Template {
  readonly path?: string
  readonly source: string
  readonly marker: MarkerConfig
  readonly spans: readonly MarkerSpan[]
  readonly segments: readonly string[]
}

/** Output of one render call */
export interface RenderedDocument {
  content: string
  injectionCount: number
  recordCount: number
}
