/**
 * Logging
 *
 * Namespaced `debug` loggers. Enable with DEBUG=recurra:* (or a narrower
 * namespace such as recurra:scheduler:error).
 */

import createDebug from 'debug'

export type LogFn = (message: string, ...args: unknown[]) => void

export type Logger = {
  debug: LogFn
  info: LogFn
  warn: LogFn
  error: LogFn
}

export type LogLevel = keyof Logger

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error']

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((l) => l === value)
}

export function createLogger(scope: string): Logger {
  const base = createDebug(`recurra:${scope}`)
  return {
    debug: base,
    info: base.extend('info'),
    warn: base.extend('warn'),
    error: base.extend('error'),
  }
}
