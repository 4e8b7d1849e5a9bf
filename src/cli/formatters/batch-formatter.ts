/**
 * Batch formatter — run summary rendering for `logbake render`.
 *
 * Provides:
 *   - `formatBatchSummary` — human-readable summary with a failure table
 *   - `batchResultToJson` — JSON payload for `--output-format json`
 */

import { basename } from 'path'
import type { BatchResult, FileFailure } from '../../modules/batch-orchestrator/types.js'
import type { ResolvedInputs } from '../../modules/file-resolver/types.js'
import { formatDuration } from '../../utils/helpers.js'
import { formatTable } from '../utils/formatting.js'

/** Longest failure reason shown in the table before it is cut */
const MAX_REASON_WIDTH = 120

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface BatchJsonData {
  input: string
  mode: ResolvedInputs['mode']
  matched: number
  total: number
  succeeded: number
  failed: number
  started_at: string
  duration_ms: number
  outcomes: BatchResult['outcomes']
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function truncate(text: string, width: number): string {
  return text.length > width ? `${text.slice(0, width - 3)}...` : text
}

function plural(count: number, noun: string): string {
  return `${String(count)} ${noun}${count === 1 ? '' : 's'}`
}

function failures(result: BatchResult): FileFailure[] {
  return result.outcomes.filter((o): o is FileFailure => o.status === 'failure')
}

/**
 * The reason shared by every failure when all of them happened while
 * writing, which usually means the output location itself is unusable.
 */
export function commonWriteFailure(result: BatchResult): FileFailure | undefined {
  const failed = failures(result)
  const first = failed[0]
  if (first === undefined || failed.length !== result.total) return undefined
  return failed.every((f) => f.stage === 'write') ? first : undefined
}

// ---------------------------------------------------------------------------
// formatBatchSummary
// ---------------------------------------------------------------------------

/**
 * Render the run summary: one line per generated file, a totals line and a
 * table listing every failure with its own reason.
 */
export function formatBatchSummary(result: BatchResult, inputs: ResolvedInputs): string {
  if (result.total === 0) {
    return inputs.mode === 'directory'
      ? `No files matching the pattern in ${inputs.root}`
      : 'Nothing to process'
  }

  const lines: string[] = []

  const writeFailure = commonWriteFailure(result)
  if (writeFailure !== undefined) {
    lines.push(`Error: could not write any output. ${writeFailure.reason}`, '')
  }

  for (const outcome of result.outcomes) {
    if (outcome.status !== 'success') continue
    const skipped = outcome.skippedLines > 0 ? `, ${plural(outcome.skippedLines, 'line')} skipped` : ''
    lines.push(`Generated: ${outcome.outputPath} (${plural(outcome.recordCount, 'record')}${skipped})`)
  }

  if (inputs.mode === 'directory' && inputs.matchedCount > result.total) {
    lines.push(`Limit reached: processed ${String(result.total)} of ${String(inputs.matchedCount)} matching files`)
  }

  lines.push(
    `Processed ${plural(result.total, 'file')} in ${formatDuration(result.durationMs)}: ` +
      `${String(result.succeeded)} succeeded, ${String(result.failed)} failed`,
  )

  const failed = failures(result)
  if (failed.length > 0) {
    lines.push('', 'Failures:')
    const rows = failed.map((f) => ({
      file: basename(f.inputPath),
      stage: f.stage,
      reason: truncate(f.reason.replace(/\s*\n\s*/g, ' '), MAX_REASON_WIDTH),
    }))
    lines.push(formatTable(['File', 'Stage', 'Reason'], rows, ['file', 'stage', 'reason']))
  }

  return lines.join('\n')
}

// ---------------------------------------------------------------------------
// batchResultToJson
// ---------------------------------------------------------------------------

export function batchResultToJson(result: BatchResult, inputs: ResolvedInputs): BatchJsonData {
  return {
    input: inputs.root,
    mode: inputs.mode,
    matched: inputs.matchedCount,
    total: result.total,
    succeeded: result.succeeded,
    failed: result.failed,
    started_at: result.startedAt,
    duration_ms: result.durationMs,
    outcomes: result.outcomes,
  }
}
