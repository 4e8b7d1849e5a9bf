/**
 * Batch Orchestrator Module — shared types
 */

import type { CompressionFormat } from '../decoder/types.js'

/** Pipeline stage a file failed in */
export type FailureStage = 'decode' | 'validate' | 'render' | 'write' | 'collision'

/** Collision policy for two inputs mapping to the same output file */
export type CollisionPolicy = 'fail' | 'overwrite'

export interface FileSuccess {
  status: 'success'
  inputPath: string
  outputPath: string
  recordCount: number
  /** Malformed lines skipped under the partial-success policy */
  skippedLines: number
  durationMs: number
}

export interface FileFailure {
  status: 'failure'
  inputPath: string
  stage: FailureStage
  reason: string
  /** LogbakeError code when the failure came from a typed error */
  code?: string
  durationMs: number
}

export type FileOutcome = FileSuccess | FileFailure

/** Aggregated, ordered report of one batch run */
export interface BatchResult {
  /** One outcome per input, in resolved input order */
  outcomes: FileOutcome[]
  total: number
  succeeded: number
  failed: number
  startedAt: string
  durationMs: number
}

export interface BatchRunOptions {
  /** Directory receiving the .html files (default: each input's own directory) */
  outputDir?: string
  compression?: CompressionFormat
  requiredFields?: readonly string[]
  /** Fail a file once it has more invalid lines than this (default: unlimited) */
  maxInvalidRecords?: number
  /** Fail a file with fewer valid records than this (default: 0) */
  minRecords?: number
  onCollision?: CollisionPolicy
  /** Files processed at once (default: 1) */
  concurrency?: number
  /** Re-extract the payload from each rendered document and compare it */
  verifyOutput?: boolean
  /** Called as each file finishes; `index` is the file's position in the run */
  onOutcome?: (outcome: FileOutcome, index: number, total: number) => void
}
