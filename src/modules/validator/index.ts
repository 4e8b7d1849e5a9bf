/**
 * Barrel exports for the validator module.
 */

export { validateLine, collectRecords, isLogRecord, findLossyNumber } from './validator.js'
export type { LogRecord, LineOutcome, CollectedRecords, ValidatorOptions } from './types.js'
