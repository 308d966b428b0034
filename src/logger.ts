/**
 * Logging
 *
 * Thin pino setup. The level comes from the options, then from
 * FUZZY_DATES_LOG_LEVEL, and defaults to 'silent'.
 */

import { pino, type DestinationStream, type Logger } from 'pino'
import { InvalidConfigError } from './errors'

export type { Logger } from 'pino'

export const LOG_LEVEL_ENV = 'FUZZY_DATES_LOG_LEVEL'

const LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const

export type LogLevel = (typeof LEVELS)[number]

export type LoggerOptions = {
  level?: string
  destination?: DestinationStream
}

export function isLogLevel(value: string): value is LogLevel {
  return (LEVELS as readonly string[]).includes(value)
}

export function resolveLogLevel(level?: string): LogLevel {
  const raw = (level ?? process.env[LOG_LEVEL_ENV] ?? 'silent').trim().toLowerCase()
  if (!isLogLevel(raw)) {
    throw new InvalidConfigError(`Unknown log level: '${raw}'`)
  }
  return raw
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const config = { name: 'fuzzy-dates', level: resolveLogLevel(options.level) }
  return options.destination ? pino(config, options.destination) : pino(config)
}
