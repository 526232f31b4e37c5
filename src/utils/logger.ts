/**
 * Logger utility for etude-daily
 * Uses pino for structured JSON logging with pretty printing in development
 */

import pino from 'pino'
import { PINO_REDACT_PATHS } from '../cli/utils/masking.js'

/** Logger configuration options */
export interface LoggerOptions {
  level?: string
  name?: string
  pretty?: boolean
}

/** Level applied by setLogLevel(); wins over the environment defaults */
let levelOverride: string | undefined

/** Loggers whose level follows setLogLevel() */
const sharedLoggers = new Set<pino.Logger>()

/** Default log level based on environment */
function getDefaultLogLevel(): string {
  const envLevel = process.env.LOG_LEVEL
  if (envLevel) return envLevel
  if (process.env.NODE_ENV === 'production') return 'info'
  if (process.env.NODE_ENV === 'test' || process.env.NODE_ENV === 'development') return 'debug'
  // Plain CLI use: stdout carries the snapshot JSON, keep logs quiet
  return 'warn'
}

/** Whether to use pretty printing (development mode) */
function isPrettyMode(): boolean {
  if (process.env.LOG_PRETTY !== undefined) {
    return process.env.LOG_PRETTY === 'true'
  }
  return process.env.NODE_ENV === 'development'
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
  const level = options.level ?? levelOverride ?? getDefaultLogLevel()
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

  let log: pino.Logger
  if (pretty) {
    // Logs go to stderr so that `etude-daily daily > snapshot.json` stays clean.
    log = pino({
      ...baseOptions,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
          destination: 2,
        },
      },
    })
  } else {
    log = pino(baseOptions, pino.destination(2))
  }

  if (options.level === undefined) sharedLoggers.add(log)
  return log
}

/**
 * Set the level of every logger created without an explicit level, and of
 * those created later. `undefined` restores the environment-derived default.
 */
export function setLogLevel(level: string | undefined): void {
  levelOverride = level
  const effective = level ?? getDefaultLogLevel()
  for (const log of sharedLoggers) {
    log.level = effective
  }
}

/** Root application logger */
export const logger = createLogger('etude-daily')

/** Create a child logger with additional context */
export function childLogger(
  parent: pino.Logger,
  bindings: Record<string, unknown>
): pino.Logger {
  return parent.child(bindings)
}
