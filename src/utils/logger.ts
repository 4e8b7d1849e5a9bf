/**
 * Logger utility for logbake
 * Uses pino for structured JSON logging with pretty printing in development
 */

import pino from 'pino'

/** Logger configuration options */
export interface LoggerOptions {
  level?: string
  name?: string
  pretty?: boolean
}

/**
 * Level set at runtime from configuration (global.log_level).
 * LOG_LEVEL in the environment still wins.
 */
let configuredLevel: string | undefined

/** Default log level based on environment */
function getDefaultLogLevel(): string {
  const envLevel = process.env.LOG_LEVEL
  if (envLevel) return envLevel
  if (configuredLevel !== undefined) return configuredLevel
  if (process.env.NODE_ENV === 'production') return 'info'
  if (process.env.NODE_ENV === 'development') return 'debug'
  // Tests assert on stdout; keep pino quiet unless LOG_LEVEL asks otherwise
  if (process.env.NODE_ENV === 'test') return 'silent'
  // No NODE_ENV set (typical CLI use) — default to warn to avoid noise
  return 'warn'
}

/** Whether to use pretty printing (development mode) */
function isPrettyMode(): boolean {
  if (process.env.LOG_PRETTY !== undefined) {
    return process.env.LOG_PRETTY === 'true'
  }
  // pino-pretty runs in a worker thread; only start it when explicitly developing
  return process.env.NODE_ENV === 'development'
}

const registry = new Set<pino.Logger>()

/**
 * Create a named logger instance
 * @param name - Logger name (module identifier)
 * @param options - Optional logger configuration overrides
 */
export function createLogger(
  name: string,
  options: LoggerOptions = {}
): pino.Logger {
  const level = options.level ?? getDefaultLogLevel()
  const pretty = options.pretty ?? isPrettyMode()

  const baseOptions: pino.LoggerOptions = {
    name: options.name ?? name,
    level,
    formatters: {
      level(label) {
        return { level: label }
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    base: {
      pid: process.pid,
    },
  }

  let instance: pino.Logger
  if (pretty) {
    // pino-pretty is a devDependency; only use in non-production environments.
    instance = pino({
      ...baseOptions,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
        },
      },
    })
  } else {
    // Logs go to stderr so stdout stays reserved for the run summary
    instance = pino(baseOptions, pino.destination(2))
  }

  if (options.level === undefined) {
    registry.add(instance)
  }
  return instance
}

/**
 * Apply a level from configuration to every logger created without an
 * explicit level, and to loggers created afterwards. No-op when LOG_LEVEL
 * is set in the environment.
 */
export function setLogLevel(level: string): void {
  if (process.env.LOG_LEVEL) return
  configuredLevel = level
  for (const instance of registry) {
    instance.level = level
  }
}

/** Root application logger */
export const logger = createLogger('logbake')

/** Create a child logger with additional context */
export function childLogger(
  parent: pino.Logger,
  bindings: Record<string, unknown>
): pino.Logger {
  return parent.child(bindings)
}
