/**
 * Logger utility for settree
 * Uses pino for structured JSON logging with pretty printing in development
 */

import pino from 'pino'

/** Logger configuration options */
export interface LoggerOptions {
  level?: string
  name?: string
  pretty?: boolean
}

/** Default log level based on environment */
function getDefaultLogLevel(): string {
  const envLevel = process.env.LOG_LEVEL
  if (envLevel) return envLevel
  if (process.env.NODE_ENV === 'production') return 'info'
  if (process.env.NODE_ENV === 'test' || process.env.NODE_ENV === 'development') return 'debug'
  // Library use without NODE_ENV: stay quiet unless something goes wrong
  return 'warn'
}

/** Whether to use pretty printing (development mode) */
function isPrettyMode(): boolean {
  if (process.env.LOG_PRETTY !== undefined) {
    return process.env.LOG_PRETTY === 'true'
  }
  // pino-pretty runs in a worker thread; keep it out of production processes.
  return process.env.NODE_ENV === 'development' || process.env.NODE_ENV === 'test'
}

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

  if (pretty) {
    // pino-pretty is a devDependency; only use in non-production environments.
    return pino({
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
  }

  return pino(baseOptions)
}

/** Root library logger */
export const logger = createLogger('settree')

/** Create a child logger with additional context */
export function childLogger(
  parent: pino.Logger,
  bindings: Record<string, unknown>
): pino.Logger {
  return parent.child(bindings)
}
