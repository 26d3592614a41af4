/**
 * Shared Structured Logger
 *
 * pino-based JSON logger. Each service gets a child logger tagged with
 * `service`; entries carry an ISO `timestamp` and a string `level`.
 *
 * Usage:
 *   import { createLogger, Logger } from '@tensorgate/shared';
 */

import { type JsonRecord, type LogLevel, LogLevelSchema } from '@tensorgate/types'
import pino from 'pino'
import { getEnv, isProduction } from './env'

export type { LogLevel }

type PinoLogger = pino.Logger

export interface Logger {
  debug: (message: string, data?: JsonRecord) => void
  info: (message: string, data?: JsonRecord) => void
  warn: (message: string, data?: JsonRecord) => void
  error: (message: string, data?: JsonRecord) => void
}

export interface LoggerConfig {
  level?: LogLevel
  silent?: boolean
  /** Alternate output, mostly for tests */
  destination?: pino.DestinationStream
}

/** Log level from LOG_LEVEL, else info in production and debug elsewhere */
export function getLogLevel(): LogLevel {
  const parsed = LogLevelSchema.safeParse(getEnv('LOG_LEVEL'))
  if (parsed.success) return parsed.data
  return isProduction() ? 'info' : 'debug'
}

function createPinoOptions(level: LogLevel): pino.LoggerOptions {
  return {
    level,
    formatters: {
      level: (label: string) => ({ level: label }),
    },
    timestamp: () => `,"timestamp":"${new Date().toISOString()}"`,
  }
}

let basePinoLogger: PinoLogger | null = null

function getBasePinoLogger(): PinoLogger {
  if (!basePinoLogger) {
    basePinoLogger = pino(createPinoOptions(getLogLevel()))
  }
  return basePinoLogger
}

function wrap(childLogger: PinoLogger): Logger {
  return {
    debug: (message: string, data?: JsonRecord) => {
      if (data) childLogger.debug(data, message)
      else childLogger.debug(message)
    },
    info: (message: string, data?: JsonRecord) => {
      if (data) childLogger.info(data, message)
      else childLogger.info(message)
    },
    warn: (message: string, data?: JsonRecord) => {
      if (data) childLogger.warn(data, message)
      else childLogger.warn(message)
    },
    error: (message: string, data?: JsonRecord) => {
      if (data) childLogger.error(data, message)
      else childLogger.error(message)
    },
  }
}

/**
 * Create a logger instance for a specific service/component
 */
export function createLogger(service: string, config?: LoggerConfig): Logger {
  const level = config?.level ?? getLogLevel()
  const base = config?.destination
    ? pino(createPinoOptions(level), config.destination)
    : getBasePinoLogger()

  const childLogger = base.child({ service })
  childLogger.level = config?.silent ? 'silent' : level
  return wrap(childLogger)
}
