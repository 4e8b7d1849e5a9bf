/**
 * Zod schemas for template marker configuration.
 */

import { z } from 'zod'

/** Syntactic context the payload is substituted into */
export const PayloadContextSchema = z.enum(['json', 'template-literal-lines'])
export type PayloadContext = z.infer<typeof PayloadContextSchema>

/** Number of marker occurrences a template must contain */
const MarkerCountSchema = z.number().int().min(1).max(16).default(1)

/** An exact token replaced in full by the payload */
export const SentinelMarkerSchema = z
  .object({
    kind: z.literal('sentinel'),
    token: z.string().min(1),
    context: PayloadContextSchema.default('json'),
    count: MarkerCountSchema,
  })
  .strict()

/** A start/end pair; the text between them is replaced, both markers stay */
export const SpanMarkerSchema = z
  .object({
    kind: z.literal('span'),
    start: z.string().min(1),
    end: z.string().min(1),
    context: PayloadContextSchema.default('json'),
    count: MarkerCountSchema,
  })
  .strict()

export const MarkerConfigSchema = z.discriminatedUnion('kind', [
  SentinelMarkerSchema,
  SpanMarkerSchema,
])

export type SentinelMarker = z.infer<typeof SentinelMarkerSchema>
export type SpanMarker = z.infer<typeof SpanMarkerSchema>
export type MarkerConfig = z.infer<typeof MarkerConfigSchema>

export const MarkerPresetNameSchema = z.enum(['default', 'sentinel', 'template-literal'])
export type MarkerPresetName = z.infer<typeof MarkerPresetNameSchema>
