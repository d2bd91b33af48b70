import pino from 'pino'
import type { DestinationStream, Logger } from 'pino'

export type { Logger } from 'pino'

const REDACT_PATHS = ['password', 'token', '*.password', '*.token']

export interface LoggerOptions {
  bindings?: Record<string, unknown>
  level?: string
  /** Defaults to on everywhere except under Vitest. */
  enabled?: boolean
  destination?: DestinationStream
}

export function makeLogger(options: LoggerOptions = {}): Logger {
  const isVitest = process.env.VITEST === 'true'
  const config = {
    level: options.level ?? process.env.LOG_LEVEL ?? 'info',
    enabled: options.enabled ?? !isVitest,
    base: { ...options.bindings, suite: 'trading-app-e2e' },
    messageKey: 'msg',
    timestamp: pino.stdTimeFunctions.isoTime,
    redact: { paths: REDACT_PATHS, censor: '[REDACTED]' },
  }
  return options.destination ? pino(config, options.destination) : pino(config)
}
