/**
 * BatchOrchestratorImpl — concrete implementation of BatchOrchestrator.
 *
 * Record policy: partial success. Malformed lines are skipped and counted;
 * `maxInvalidRecords` and `minRecords` turn a file into a failure.
 *
 * Collision policy: an input whose output path was already written by an
 * earlier input (in resolved order) of the same run fails with stage
 * `collision`, unless `onCollision` is `overwrite`. An earlier input that
 * failed claims nothing. Inputs sharing an output path wait for their
 * earlier siblings to settle, so the decision and the write order follow
 * the resolved order at any concurrency.
 */

import { mkdir, writeFile } from 'fs/promises'
import { basename, dirname } from 'path'
import { LogbakeError, TemplateError, WriteError, errorMessage } from '../../core/errors.js'
import type { RecordError } from '../../core/errors.js'
import { childLogger, createLogger } from '../../utils/logger.js'
import { decodeFile } from '../decoder/decoder.js'
import { collectRecords } from '../validator/validator.js'
import { extractRecords, renderTemplate } from '../template-engine/template-engine.js'
import type { Template } from '../template-engine/types.js'
import type { BatchOrchestrator, BatchOrchestratorDeps } from './batch-orchestrator.js'
import { resolveOutputPath } from './output-naming.js'
import type {
  BatchResult,
  BatchRunOptions,
  FailureStage,
  FileFailure,
  FileOutcome,
  FileSuccess,
} from './types.js'

const logger = createLogger('batch-orchestrator')

// ---------------------------------------------------------------------------
// Output planning
// ---------------------------------------------------------------------------

interface PlannedOutput {
  outputPath: string
  /** Indices of earlier inputs mapping to the same `outputPath` */
  earlier: readonly number[]
}

function planOutputs(paths: readonly string[], outputDir?: string): PlannedOutput[] {
  const claims = new Map<string, number[]>()
  return paths.map((inputPath, index) => {
    const outputPath = resolveOutputPath(inputPath, outputDir)
    const siblings = claims.get(outputPath) ?? []
    const earlier = [...siblings]
    siblings.push(index)
    claims.set(outputPath, siblings)
    return { outputPath, earlier }
  })
}

async function defaultWriteOutput(outputPath: string, content: string): Promise<void> {
  try {
    await mkdir(dirname(outputPath), { recursive: true })
    await writeFile(outputPath, content, 'utf-8')
  } catch (err) {
    throw new WriteError(`Cannot write ${outputPath}: ${errorMessage(err)}`, { outputPath })
  }
}

/**
 * Check that `content` carries exactly `records`.
 * @throws {TemplateError} on any difference
 */
export function verifyRendered(template: Template, content: string, records: readonly unknown[]): void {
  const extracted = extractRecords(template, content)
  if (JSON.stringify(extracted) !== JSON.stringify(records)) {
    throw new TemplateError('Rendered document does not reproduce the input records', {
      path: template.path,
      expected: records.length,
      actual: extracted.length,
    })
  }
}

function isOutcome(value: FileOutcome | undefined): value is FileOutcome {
  return value !== undefined
}

// ---------------------------------------------------------------------------
// BatchOrchestratorImpl
// ---------------------------------------------------------------------------

export class BatchOrchestratorImpl implements BatchOrchestrator {
  private readonly _decode: NonNullable<BatchOrchestratorDeps['decode']>
  private readonly _writeOutput: NonNullable<BatchOrchestratorDeps['writeOutput']>
  private readonly _now: () => number

  constructor(deps: BatchOrchestratorDeps = {}) {
    this._decode = deps.decode ?? decodeFile
    this._writeOutput = deps.writeOutput ?? defaultWriteOutput
    this._now = deps.now ?? Date.now
  }

  async run(
    inputs: Iterable<string>,
    template: Template,
    options: BatchRunOptions = {},
  ): Promise<BatchResult> {
    const startedAt = this._now()
    const paths = [...inputs]
    const total = paths.length
    const plan = planOutputs(paths, options.outputDir)
    const outcomes: Array<FileOutcome | undefined> = paths.map(() => undefined)
    const concurrency = Math.max(1, Math.floor(options.concurrency ?? 1))

    logger.info({ total, concurrency, outputDir: options.outputDir }, 'Batch run started')

    const settled: Array<Promise<FileOutcome> | undefined> = paths.map(() => undefined)
    let next = 0
    const worker = async (): Promise<void> => {
      while (next < total) {
        const index = next
        next += 1
        const inputPath = paths[index]
        const planned = plan[index]
        if (inputPath === undefined || planned === undefined) continue

        // Registered before any await so later siblings can wait on it
        const task = this._producerOf(planned, settled).then((producedBy) => {
          logger.info(`Processing ${String(index + 1)}/${String(total)}: ${basename(inputPath)}`)
          return this._processFile(inputPath, planned.outputPath, producedBy, template, options)
        })
        settled[index] = task
        const outcome = await task
        outcomes[index] = outcome
        options.onOutcome?.(outcome, index, total)
      }
    }

    await Promise.all(Array.from({ length: Math.min(concurrency, total) }, () => worker()))

    const ordered = outcomes.filter(isOutcome)
    const succeeded = ordered.filter((o) => o.status === 'success').length
    const result: BatchResult = {
      outcomes: ordered,
      total,
      succeeded,
      failed: ordered.length - succeeded,
      startedAt: new Date(startedAt).toISOString(),
      durationMs: this._now() - startedAt,
    }

    logger.info(
      { total, succeeded: result.succeeded, failed: result.failed, durationMs: result.durationMs },
      'Batch run finished',
    )
    return result
  }

  // ---------------------------------------------------------------------------
  // Per-file pipeline
  // ---------------------------------------------------------------------------

  /**
   * Wait for every earlier input sharing this output path and return the
   * first one that wrote it, if any.
   */
  private async _producerOf(
    planned: PlannedOutput,
    settled: ReadonlyArray<Promise<FileOutcome> | undefined>,
  ): Promise<string | undefined> {
    if (planned.earlier.length === 0) return undefined
    const earlier = await Promise.all(planned.earlier.map((index) => settled[index]))
    return earlier.find((outcome) => outcome?.status === 'success')?.inputPath
  }

  private async _processFile(
    inputPath: string,
    outputPath: string,
    producedBy: string | undefined,
    template: Template,
    options: BatchRunOptions,
  ): Promise<FileOutcome> {
    const startedAt = this._now()
    const fileLog = childLogger(logger, { file: inputPath })

    if (producedBy !== undefined) {
      if ((options.onCollision ?? 'fail') === 'fail') {
        return this._failure(
          inputPath,
          'collision',
          `Output ${outputPath} is already produced by ${producedBy} in this run`,
          startedAt,
        )
      }
      fileLog.warn({ outputPath, producedBy }, 'Overwriting output of an earlier input')
    }

    let stage: FailureStage = 'decode'
    try {
      const collected = await collectRecords(
        this._decode(inputPath, options.compression ?? 'gzip'),
        { ...(options.requiredFields !== undefined && { requiredFields: options.requiredFields }) },
      )

      stage = 'validate'
      for (const error of collected.errors) {
        fileLog.warn({ lineNumber: error.lineNumber }, `Skipping invalid line: ${error.message}`)
      }
      const policyViolation = this._checkRecordPolicy(collected.records.length, collected.errors, options)
      if (policyViolation !== null) {
        return this._failure(inputPath, 'validate', policyViolation, startedAt)
      }

      stage = 'render'
      const rendered = renderTemplate(template, collected.records)
      if (options.verifyOutput === true) {
        verifyRendered(template, rendered.content, collected.records)
      }

      stage = 'write'
      await this._writeOutput(outputPath, rendered.content)

      const success: FileSuccess = {
        status: 'success',
        inputPath,
        outputPath,
        recordCount: collected.records.length,
        skippedLines: collected.errors.length,
        durationMs: this._now() - startedAt,
      }
      fileLog.info({ outputPath, records: success.recordCount, skipped: success.skippedLines }, `Generated: ${outputPath}`)
      return success
    } catch (err) {
      const failure = this._failure(inputPath, stage, errorMessage(err), startedAt, err)
      fileLog.error({ stage, code: failure.code, reason: failure.reason }, 'File failed')
      return failure
    }
  }

  private _checkRecordPolicy(
    validCount: number,
    errors: readonly RecordError[],
    options: BatchRunOptions,
  ): string | null {
    const { maxInvalidRecords, minRecords = 0 } = options
    if (maxInvalidRecords !== undefined && errors.length > maxInvalidRecords) {
      const first = errors[0]
      return (
        `${String(errors.length)} invalid line(s) exceed the limit of ${String(maxInvalidRecords)}` +
        (first !== undefined ? ` (first: ${first.message})` : '')
      )
    }
    if (validCount < minRecords) {
      return `Only ${String(validCount)} valid record(s), at least ${String(minRecords)} required`
    }
    return null
  }

  private _failure(
    inputPath: string,
    stage: FailureStage,
    reason: string,
    startedAt: number,
    cause?: unknown,
  ): FileFailure {
    return {
      status: 'failure',
      inputPath,
      stage,
      reason,
      ...(cause instanceof LogbakeError && { code: cause.code }),
      durationMs: this._now() - startedAt,
    }
  }
}

/** Create a BatchOrchestrator; pass deps to replace the file-system collaborators */
export function createBatchOrchestrator(deps: BatchOrchestratorDeps = {}): BatchOrchestrator {
  return new BatchOrchestratorImpl(deps)
}
