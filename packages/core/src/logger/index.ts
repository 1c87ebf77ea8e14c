import pino, { type Logger } from 'pino'
import type { LoggingConfig } from '../schemas/client-config.js'

export type { Logger } from 'pino'

const STDERR = 2

/**
 * Logger for CLI use. Everything goes to stderr so that command output
 * on stdout stays pipeable.
 */
export function createLogger(config: LoggingConfig): Logger {
  const usePretty =
    config.pretty || process.env.NODE_ENV !== 'production'

  if (usePretty) {
    return pino({
      level: config.level,
      transport: {
        target: 'pino-pretty',
        options: { destination: STDERR, ignore: 'pid,hostname' },
      },
    })
  }
  return pino({ level: config.level }, pino.destination(STDERR))
}

/** Library default: callers that pass no logger get no output. */
export function silentLogger(): Logger {
  return pino({ level: 'silent' })
}
