import pino from 'pino'
import { config } from '../config/index.js'

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const

type LogLevel = typeof LOG_LEVELS[number]

function resolveLogLevel(value: string): LogLevel {
  return LOG_LEVELS.find(level => level === value) ?? 'info'
}

export const logger = pino({
  name: config.appName,
  level: resolveLogLevel(config.logLevel),
})
