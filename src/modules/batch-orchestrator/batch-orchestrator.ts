/**
 * BatchOrchestrator interface — public contract for running a batch.
 *
 * Create an instance via `createBatchOrchestrator()` from
 * batch-orchestrator-impl.ts.
 */

import type { Template } from '../template-engine/types.js'
import type { CompressionFormat } from '../decoder/types.js'
import type { BatchResult, BatchRunOptions } from './types.js'

/**
 * Drives Decoder → Validator → Template Engine → write for every input.
 *
 * A failing file never stops the batch: its failure is recorded in the
 * BatchResult and the next file is processed.
 */
export interface BatchOrchestrator {
  run(inputs: Iterable<string>, template: Template, options?: BatchRunOptions): Promise<BatchResult>
}

/** Collaborators the orchestrator can be given in place of the real ones */
export interface BatchOrchestratorDeps {
  /** Line source for one input file (default: decodeFile) */
  decode?: (inputPath: string, format: CompressionFormat) => AsyncIterable<string>
  /** Persist one rendered document (default: mkdir -p + writeFile) */
  writeOutput?: (outputPath: string, content: string) => Promise<void>
  /** Clock used for durations (default: Date.now) */
  now?: () => number
}
