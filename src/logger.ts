/**
 * Structured Logger using pino
 */

import { type Logger as PinoInstance, pino } from 'pino'

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent'

export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void
  info(message: string, data?: Record<string, unknown>): void
  warn(message: string, data?: Record<string, unknown>): void
  error(message: string, data?: Record<string, unknown>): void
}

export interface LoggerConfig {
  /** Drop every message from this logger */
  silent?: boolean
}

const LOG_LEVELS: readonly LogLevel[] = [
  'debug',
  'info',
  'warn',
  'error',
  'silent',
]

function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value)
}

// Determine environment settings
const isProduction = process.env.NODE_ENV === 'production'
const envLevel = process.env.LOG_LEVEL
const defaultLevel: LogLevel = isLogLevel(envLevel) ? envLevel : 'info'
const useJson = process.env.LOG_FORMAT === 'json' || isProduction

let baseLogger: PinoInstance | null = null

// Created on first use so that importing this module starts no transport
function getBaseLogger(): PinoInstance {
  if (!baseLogger) {
    baseLogger = pino({
      level: defaultLevel,
      transport: !useJson
        ? {
            target: 'pino-pretty',
            options: {
              colorize: true,
              translateTime: 'SYS:standard',
              ignore: 'pid,hostname',
            },
          }
        : undefined,
      formatters: {
        level: (label) => ({ level: label }),
      },
      timestamp: () => `,"timestamp":"${new Date().toISOString()}"`,
    })
  }
  return baseLogger
}

class PinoLogger implements Logger {
  private logger: PinoInstance
  private silent: boolean

  constructor(component: string, config: LoggerConfig = {}) {
    this.silent = config.silent ?? false
    this.logger = getBaseLogger().child({ component })
  }

  debug(message: string, data?: Record<string, unknown>) {
    if (this.silent) return
    data ? this.logger.debug(data, message) : this.logger.debug(message)
  }

  info(message: string, data?: Record<string, unknown>) {
    if (this.silent) return
    data ? this.logger.info(data, message) : this.logger.info(message)
  }

  warn(message: string, data?: Record<string, unknown>) {
    if (this.silent) return
    data ? this.logger.warn(data, message) : this.logger.warn(message)
  }

  error(message: string, data?: Record<string, unknown>) {
    if (this.silent) return
    data ? this.logger.error(data, message) : this.logger.error(message)
  }
}

export function createLogger(component: string, config?: LoggerConfig): Logger {
  return new PinoLogger(component, config)
}
