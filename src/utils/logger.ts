/**
 * Logging for profile construction and analysis
 * @module utils/logger
 */

/**
 * Logger accepted by the profile builder and the registry entry points
 */
export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void
  info(message: string, context?: Record<string, unknown>): void
  warn(message: string, context?: Record<string, unknown>): void
  error(message: string, context?: Record<string, unknown>): void
}

export type LogLevel = keyof Logger

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error']

/**
 * Console logger writing `[LEVEL] message` for every level at or above `minLevel`.
 * `warn` and `error` go to stderr.
 *
 * @example
 * ```typescript
 * const logger = createConsoleLogger('debug')
 * buildProfile(runs, config, { logger })
 * // [DEBUG] [profile-builder] Built performance profile { records: 11, ... }
 * ```
 */
export function createConsoleLogger(minLevel: LogLevel = 'info'): Logger {
  const threshold = LOG_LEVELS.indexOf(minLevel)
  const write =
    (level: LogLevel, sink: (...args: unknown[]) => void) =>
    (message: string, context?: Record<string, unknown>) => {
      if (LOG_LEVELS.indexOf(level) >= threshold) {
        sink(`[${level.toUpperCase()}] ${message}`, context ?? '')
      }
    }

  return {
    debug: write('debug', (...args) => console.log(...args)),
    info: write('info', (...args) => console.log(...args)),
    warn: write('warn', (...args) => console.warn(...args)),
    error: write('error', (...args) => console.error(...args)),
  }
}

/**
 * Console logger at `info`
 */
export const defaultLogger: Logger = createConsoleLogger('info')

/**
 * Creates a no-op logger, the builder's default
 */
export function createSilentLogger(): Logger {
  const noop = () => {}
  return {
    debug: noop,
    info: noop,
    warn: noop,
    error: noop,
  }
}

/**
 * Creates a logger that prefixes messages with a component name
 */
export function createPrefixedLogger(componentName: string, baseLogger: Logger): Logger {
  const prefix = `[${componentName}]`
  const forward =
    (level: LogLevel) => (message: string, context?: Record<string, unknown>) =>
      baseLogger[level](`${prefix} ${message}`, context)

  return {
    debug: forward('debug'),
    info: forward('info'),
    warn: forward('warn'),
    error: forward('error'),
  }
}
