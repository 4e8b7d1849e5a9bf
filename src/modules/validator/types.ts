/**
 * Validator Module — shared types
 */

import type { RecordError } from '../../core/errors.js'

/** One decoded game-event entry: a JSON object with heterogeneous values */
export type LogRecord = Record<string, unknown>

/** Options applied to every line */
export interface ValidatorOptions {
  /** Keys every record must carry (e.g. `type` for game-event logs) */
  requiredFields?: readonly string[]
}

/** Result of validating a single decoded line */
export type LineOutcome =
  | { kind: 'record'; record: LogRecord }
  | { kind: 'blank' }
  | { kind: 'invalid'; error: RecordError }

/** Everything the validator learned about one file's lines */
export interface CollectedRecords {
  records: LogRecord[]
  errors: RecordError[]
  blankLines: number
  /** Total number of decoded lines, blank ones included */
  lineCount: number
}
