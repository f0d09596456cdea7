/**
 * Logger Utility
 *
 * pino logger with pretty-print in development and silence under test.
 */

import { pino, type Logger } from 'pino'

const isTest = process.env.NODE_ENV === 'test' || process.env.VITEST !== undefined
const isDev = process.env.NODE_ENV !== 'production' && !isTest

function defaultLevel(): string {
  if (isTest) return 'silent'
  return isDev ? 'debug' : 'info'
}

/**
 * Base logger instance
 */
const baseLogger = pino({
  level: process.env.LOG_LEVEL ?? defaultLevel(),
  transport: isDev
    ? {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
        },
      }
    : undefined,
})

/**
 * Create a child logger with a component name
 */
export function createLogger(component: string): Logger {
  return baseLogger.child({ component })
}

/**
 * Get the base logger
 */
export function getLogger(): Logger {
  return baseLogger
}
