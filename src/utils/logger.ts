/**
 * Logger utility for idea-gauntlet
 * Uses pino for structured JSON logging with pretty printing in development
 */

import pino from 'pino'
import { PINO_REDACT_PATHS } from '../cli/utils/masking.js'

export type Logger = pino.Logger

/** Logger configuration options */
export interface LoggerOptions {
  level?: string
  name?: string
  pretty?: boolean
}

function getDefaultLogLevel(): string {
  const envLevel = process.env['LOG_LEVEL']
  if (envLevel) return envLevel
  if (process.env['NODE_ENV'] === 'production') return 'info'
  if (process.env['NODE_ENV'] === 'test' || process.env['NODE_ENV'] === 'development') return 'debug'
  // CLI use without NODE_ENV: keep stderr quiet
  return 'warn'
}

function isPrettyMode(): boolean {
  if (process.env['LOG_PRETTY'] !== undefined) {
    return process.env['LOG_PRETTY'] === 'true'
  }
  return process.env['NODE_ENV'] === 'development'
}

const loggers = new Set<Logger>()

/**
 * Create a named logger instance
 * @param name - Logger name (module identifier)
 */
export function createLogger(name: string, options: LoggerOptions = {}): Logger {
  const instance = buildLogger(name, options)
  loggers.add(instance)
  return instance
}

/**
 * Change the level of every logger created so far. Module loggers are built
 * at import time, before configuration is read.
 */
export function setLogLevel(level: string): void {
  for (const instance of loggers) {
    instance.level = level
  }
}

function buildLogger(name: string, options: LoggerOptions): Logger {
  const level = options.level ?? getDefaultLogLevel()
  const pretty = options.pretty ?? isPrettyMode()

  const baseOptions: pino.LoggerOptions = {
    name: options.name ?? name,
    level,
    redact: PINO_REDACT_PATHS,
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
    // pino-pretty is a devDependency
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

  // Diagnostics go to stderr so stdout stays reserved for reports and --json output
  return pino(baseOptions, pino.destination(2))
}

/** Root application logger */
export const logger = createLogger('gauntlet')

/** Create a child logger with additional context such as sessionId or stage */
export function childLogger(parent: Logger, bindings: Record<string, unknown>): Logger {
  return parent.child(bindings)
}
