/**
 * Barrel exports for the batch-orchestrator module.
 */

export { createBatchOrchestrator, BatchOrchestratorImpl, verifyRendered } from './batch-orchestrator-impl.js'
export type { BatchOrchestrator, BatchOrchestratorDeps } from './batch-orchestrator.js'
export { deriveOutputName, resolveOutputPath, LOG_EXTENSIONS } from './output-naming.js'
export type {
  BatchResult,
  BatchRunOptions,
  CollisionPolicy,
  FailureStage,
  FileFailure,
  FileOutcome,
  FileSuccess,
} from './types.js'
