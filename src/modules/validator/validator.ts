/**
 * Validator — parses one decoded line into a LogRecord.
 *
 * A malformed line yields a RecordError outcome; the validator never decides
 * whether that invalidates the whole file.
 *
 * Records are re-serialised when rendered, so a number literal that does not
 * survive `JSON.parse` (overflow to Infinity, underflow to 0, an integer past
 * 2^53 that rounds) makes the line invalid.
 */

import { RecordError } from '../../core/errors.js'
import type { CollectedRecords, LineOutcome, LogRecord, ValidatorOptions } from './types.js'

/** True for plain JSON objects: not null, not an array */
export function isLogRecord(value: unknown): value is LogRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function describeJsonType(value: unknown): string {
  if (value === null) return 'null'
  if (Array.isArray(value)) return 'array'
  return typeof value
}

const NUMBER_TOKEN = /-?(?:0|[1-9]\d*)(\.\d+)?([eE][+-]?\d+)?/y

/** Why the number literal `token` would change on re-serialisation, or null */
function lossyNumberReason(token: string, isInteger: boolean): string | null {
  const value = Number(token)
  if (!Number.isFinite(value)) return `number ${token} is out of range`
  const mantissa = token.split(/[eE]/)[0] ?? token
  if (value === 0 && /[1-9]/.test(mantissa)) return `number ${token} underflows to 0`
  if (isInteger && !Number.isSafeInteger(value) && BigInt(token) !== BigInt(value)) {
    return `integer ${token} cannot be represented exactly`
  }
  return null
}

/**
 * Scan the number literals of a JSON text that already parsed.
 * String contents are skipped.
 */
export function findLossyNumber(text: string): string | null {
  let i = 0
  while (i < text.length) {
    const ch = text.charAt(i)
    if (ch === '"') {
      i += 1
      while (i < text.length && text.charAt(i) !== '"') {
        i += text.charAt(i) === '\\' ? 2 : 1
      }
      i += 1
      continue
    }
    if (ch === '-' || (ch >= '0' && ch <= '9')) {
      NUMBER_TOKEN.lastIndex = i
      const match = NUMBER_TOKEN.exec(text)
      if (match === null) return null
      const token = match[0]
      const reason = lossyNumberReason(token, match[1] === undefined && match[2] === undefined)
      if (reason !== null) return reason
      i += token.length
      continue
    }
    i += 1
  }
  return null
}

/**
 * Validate a single line.
 *
 * @param line       - decoded text line (untrimmed)
 * @param lineNumber - 1-based position of the line in the decoded file
 */
export function validateLine(
  line: string,
  lineNumber: number,
  options: ValidatorOptions = {},
): LineOutcome {
  const text = line.trim()
  if (text.length === 0) return { kind: 'blank' }

  let parsed: unknown
  try {
    parsed = JSON.parse(text)
  } catch (err) {
    const detail = err instanceof SyntaxError ? err.message : 'invalid JSON'
    return { kind: 'invalid', error: new RecordError(lineNumber, text, `invalid JSON (${detail})`) }
  }

  if (!isLogRecord(parsed)) {
    return {
      kind: 'invalid',
      error: new RecordError(lineNumber, text, `expected a JSON object, got ${describeJsonType(parsed)}`),
    }
  }

  const lossy = findLossyNumber(text)
  if (lossy !== null) {
    return { kind: 'invalid', error: new RecordError(lineNumber, text, lossy) }
  }

  const record = parsed
  const missing = (options.requiredFields ?? []).filter((field) => !Object.hasOwn(record, field))
  if (missing.length > 0) {
    return {
      kind: 'invalid',
      error: new RecordError(lineNumber, text, `missing required field(s) ${missing.join(', ')}`),
    }
  }

  return { kind: 'record', record }
}

/**
 * Consume a decoded line sequence and sort every line into records, errors
 * or blanks, preserving original order.
 *
 * Errors raised by the line source itself (e.g. DecodeError) propagate.
 */
export async function collectRecords(
  lines: AsyncIterable<string> | Iterable<string>,
  options: ValidatorOptions = {},
): Promise<CollectedRecords> {
  const records: LogRecord[] = []
  const errors: RecordError[] = []
  let blankLines = 0
  let lineCount = 0

  for await (const line of lines) {
    lineCount += 1
    const outcome = validateLine(line, lineCount, options)
    switch (outcome.kind) {
      case 'record':
        records.push(outcome.record)
        break
      case 'blank':
        blankLines += 1
        break
      case 'invalid':
        errors.push(outcome.error)
        break
    }
  }

  return { records, errors, blankLines, lineCount }
}
