/**
 * Context-aware payload serialisation for script blocks.
 *
 * Two contexts are supported:
 *
 *  - `json`: the record array as a JSON array literal placed directly in
 *    script code. `JSON.stringify` already escapes quotes, backslashes and
 *    control characters; on top of that `<`, `>`, `&`, U+2028 and U+2029 are
 *    written as `\uXXXX` so the literal can never contain `</script`, `<!--`
 *    or a line terminator. The result is still valid JSON.
 *
 *  - `template-literal-lines`: one compact JSON document per line inside a
 *    JS template literal. Backslash, backtick, `$`, `<`, CR, U+2028 and
 *    U+2029 are escaped so the literal's cooked value equals the
 *    newline-joined JSON text.
 */

import { TemplateError, errorMessage } from '../../core/errors.js'
import { isLogRecord } from '../validator/validator.js'
import type { LogRecord } from '../validator/types.js'
import type { PayloadContext } from './schemas.js'

const JSON_SCRIPT_UNSAFE = /[<>&\u2028\u2029]/g

function unicodeEscape(ch: string): string {
  return `\\u${ch.charCodeAt(0).toString(16).padStart(4, '0')}`
}

/** Serialise `value` as a JSON literal safe to embed in a <script> element */
export function escapeJsonForScript(value: unknown): string {
  const json = JSON.stringify(value)
  if (json === undefined) {
    throw new TemplateError('Value is not JSON-serialisable', { type: typeof value })
  }
  return json.replace(JSON_SCRIPT_UNSAFE, unicodeEscape)
}

const TEMPLATE_LITERAL_ESCAPES: Readonly<Record<string, string>> = {
  '\\': '\\\\',
  '`': '\\`',
  $: '\\$',
  '<': '\\x3C',
  '\r': '\\r',
  '\u2028': '\\u2028',
  '\u2029': '\\u2029',
}

const TEMPLATE_LITERAL_UNSAFE = /[\\`$<\r\u2028\u2029]/g

/** Escape text so a template literal containing it cooks back to the same text */
export function escapeTemplateLiteral(text: string): string {
  return text.replace(TEMPLATE_LITERAL_UNSAFE, (ch) => TEMPLATE_LITERAL_ESCAPES[ch] ?? ch)
}

const SIMPLE_UNESCAPES: Readonly<Record<string, string>> = {
  '\\': '\\',
  '`': '`',
  $: '$',
  r: '\r',
  n: '\n',
  t: '\t',
  '{': '{',
}

function readHex(text: string, from: number, digits: number): string {
  const hex = text.slice(from, from + digits)
  if (hex.length !== digits || !/^[0-9a-fA-F]+$/.test(hex)) {
    throw new TemplateError(`Malformed escape sequence at offset ${String(from - 2)}`, { offset: from - 2 })
  }
  return String.fromCharCode(parseInt(hex, 16))
}

/**
 * Inverse of `escapeTemplateLiteral` for the escapes it produces (plus
 * `\n`, `\t` and `\{`). Any other escape is a TemplateError.
 */
export function unescapeTemplateLiteral(text: string): string {
  let out = ''
  let i = 0
  while (i < text.length) {
    const slash = text.indexOf('\\', i)
    if (slash === -1) {
      out += text.slice(i)
      break
    }
    out += text.slice(i, slash)
    const next = text.charAt(slash + 1)
    if (next === 'x') {
      out += readHex(text, slash + 2, 2)
      i = slash + 4
    } else if (next === 'u') {
      out += readHex(text, slash + 2, 4)
      i = slash + 6
    } else {
      const simple = SIMPLE_UNESCAPES[next]
      if (simple === undefined) {
        throw new TemplateError(`Unsupported escape sequence \\${next} at offset ${String(slash)}`, {
          offset: slash,
        })
      }
      out += simple
      i = slash + 2
    }
  }
  return out
}

/** Serialise records for the given context */
export function serializePayload(records: readonly LogRecord[], context: PayloadContext): string {
  switch (context) {
    case 'json':
      return escapeJsonForScript(records)
    case 'template-literal-lines':
      if (records.length === 0) {
        // `''.split('\n')` yields [''], which the page would hand to JSON.parse
        throw new TemplateError('A template-literal payload cannot represent an empty log')
      }
      return escapeTemplateLiteral(records.map((record) => JSON.stringify(record)).join('\n'))
  }
}

function assertRecordArray(value: unknown): LogRecord[] {
  if (!Array.isArray(value)) {
    throw new TemplateError('Injected payload is not an array')
  }
  const records: LogRecord[] = []
  for (const item of value) {
    records.push(assertRecord(item))
  }
  return records
}

function assertRecord(value: unknown): LogRecord {
  if (!isLogRecord(value)) {
    throw new TemplateError('Injected payload contains a non-object record')
  }
  return value
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text)
  } catch (err) {
    throw new TemplateError(`Injected payload is not valid JSON: ${errorMessage(err)}`)
  }
}

/** Parse a payload produced by `serializePayload` back into records */
export function parsePayload(payload: string, context: PayloadContext): LogRecord[] {
  switch (context) {
    case 'json':
      return assertRecordArray(parseJson(payload))
    case 'template-literal-lines':
      return unescapeTemplateLiteral(payload)
        .trim()
        .split('\n')
        .map((line) => assertRecord(parseJson(line)))
  }
}
