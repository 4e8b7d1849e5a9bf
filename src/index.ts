/**
 * logbake - Main module exports
 * Public API surface for embedding the pipeline
 */

// Core errors
export * from './core/errors.js'
// Utilities
export { createLogger, childLogger, logger, setLogLevel } from './utils/logger.js'
export type { LoggerOptions } from './utils/logger.js'
export { formatDuration } from './utils/helpers.js'

// Pipeline stages
export * from './modules/decoder/index.js'
export * from './modules/validator/index.js'
export * from './modules/template-engine/index.js'
export * from './modules/file-resolver/index.js'
export * from './modules/batch-orchestrator/index.js'

// Configuration
export * from './modules/config/index.js'

// CLI entry points, for embedding the commands in another program
export { createProgram } from './cli/program.js'
export { runRenderAction } from './cli/commands/render.js'
export type { RenderActionOptions } from './cli/commands/render.js'
