/**
 * Logger utility for taskloop
 * Uses pino for structured JSON logging with pretty printing in development
 */

import pino from 'pino'

/** Logger configuration options */
export interface LoggerOptions {
  level?: string
  name?: string
  pretty?: boolean
}

/** Loggers created so far, so a configured level can be applied to all of them */
const loggers = new Set<pino.Logger>()
let configuredLevel: string | undefined

/** Default log level based on environment */
function getDefaultLogLevel(): string {
  const envLevel = process.env.LOG_LEVEL
  if (envLevel) return envLevel
  if (configuredLevel !== undefined) return configuredLevel
  if (process.env.NODE_ENV === 'production') return 'info'
  if (process.env.NODE_ENV === 'test' || process.env.NODE_ENV === 'development') return 'debug'
  // No NODE_ENV (plain CLI use): progress goes to stdout through the event bus
  return 'warn'
}

/** Whether to use pretty printing (development mode) */
function isPrettyMode(): boolean {
  if (process.env.LOG_PRETTY !== undefined) {
    return process.env.LOG_PRETTY === 'true'
  }
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
    instance = pino(baseOptions)
  }

  if (options.level === undefined) loggers.add(instance)
  return instance
}

/**
 * Set the level of every logger that did not pick one explicitly, including
 * those created later. `LOG_LEVEL` in the environment still wins.
 */
export function setLogLevel(level: string): void {
  if (process.env.LOG_LEVEL) return
  configuredLevel = level
  for (const instance of loggers) {
    instance.level = level
  }
}

/** Root application logger */
export const logger = createLogger('taskloop')

/** Create a child logger with additional context */
export function childLogger(
  parent: pino.Logger,
  bindings: Record<string, unknown>
): pino.Logger {
  return parent.child(bindings)
}
