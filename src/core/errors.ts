/**
 * Error definitions for logbake
 * Structured error hierarchy shared by every pipeline stage
 */

/** Base error class for all logbake errors */
export class LogbakeError extends Error {
  public readonly code: string
  public readonly context: Record<string, unknown>

  constructor(
    message: string,
    code: string,
    context: Record<string, unknown> = {}
  ) {
    super(message)
    this.name = 'LogbakeError'
    this.code = code
    this.context = context
    // Maintains proper stack trace for V8 (not available in all environments)
    // eslint-disable-next-line @typescript-eslint/no-unnecessary-condition
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, LogbakeError)
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context,
      stack: this.stack,
    }
  }
}

/** Error thrown when the input path or pattern cannot be resolved to files */
export class ResolutionError extends LogbakeError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'RESOLUTION_ERROR', context)
    this.name = 'ResolutionError'
  }
}

/** Error thrown when a compressed stream is corrupt, truncated or empty */
export class DecodeError extends LogbakeError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'DECODE_ERROR', context)
    this.name = 'DecodeError'
  }
}

/** Maximum number of raw characters carried in a RecordError message */
export const RECORD_PREVIEW_LENGTH = 100

/** Error describing a single malformed log line */
export class RecordError extends LogbakeError {
  public readonly lineNumber: number
  public readonly rawText: string

  constructor(lineNumber: number, rawText: string, detail: string) {
    const preview =
      rawText.length > RECORD_PREVIEW_LENGTH
        ? `${rawText.slice(0, RECORD_PREVIEW_LENGTH)}...`
        : rawText
    super(`Line ${String(lineNumber)}: ${detail}: ${preview}`, 'RECORD_ERROR', {
      lineNumber,
      detail,
    })
    this.name = 'RecordError'
    this.lineNumber = lineNumber
    this.rawText = rawText
  }
}

/** Error thrown when a template is unreadable or its markers are missing/ambiguous */
export class TemplateError extends LogbakeError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'TEMPLATE_ERROR', context)
    this.name = 'TemplateError'
  }
}

/** Error thrown when a rendered document cannot be written */
export class WriteError extends LogbakeError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'WRITE_ERROR', context)
    this.name = 'WriteError'
  }
}

/** Error thrown when configuration is invalid or missing */
export class ConfigError extends LogbakeError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'CONFIG_ERROR', context)
    this.name = 'ConfigError'
  }
}

/** Error thrown when a config file uses an incompatible format version */
export class ConfigIncompatibleFormatError extends LogbakeError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'CONFIG_INCOMPATIBLE_FORMAT', context)
    this.name = 'ConfigIncompatibleFormatError'
  }
}

/** Extract a human-readable message from any thrown value */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}
