/**
 * Structured logging for lockbox, backed by pino.
 *
 * Logs are written to stderr so that stdout stays free for the output of the
 * host process or the CLI. Secret values are redacted by path.
 */

import pino, { type LoggerOptions } from 'pino'

/** Structured context attached to a log line. */
export type LogContext = Record<string, unknown>

/**
 * Minimal logger surface used throughout lockbox.
 *
 * @remarks
 * A pino logger satisfies this interface; tests can pass a hand-built fake.
 *
 * @public
 */
export interface Logger {
  debug(context: LogContext, msg: string): void
  info(context: LogContext, msg: string): void
  warn(context: LogContext, msg: string): void
  error(context: LogContext, msg: string): void
  child(bindings: LogContext): Logger
}

/** Options for {@link createLogger}. */
export interface CreateLoggerOptions {
  /** Logger name. Defaults to `'lockbox'`. */
  name?: string | undefined
  /** pino level (`'debug'`, `'info'`, `'silent'`, ...). Defaults to `LOG_LEVEL` or `'info'`. */
  level?: string | undefined
}

/** Create a structured pino logger writing to stderr. */
export function createLogger(options?: CreateLoggerOptions): Logger {
  const level = options?.level ?? process.env.LOG_LEVEL ?? 'info'
  const pinoOptions: LoggerOptions = {
    name: options?.name ?? 'lockbox',
    level,
    serializers: {
      err: pino.stdSerializers.err,
    },
    redact: {
      paths: [
        'value',
        'secrets',
        'accessToken',
        'token',
        'password',
        '*.value',
        '*.secrets',
        '*.accessToken',
        '*.token',
        '*.password',
      ],
      censor: '[REDACTED]',
    },
  }

  if (process.env.NODE_ENV === 'development') {
    return pino({
      ...pinoOptions,
      transport: { target: 'pino-pretty', options: { colorize: true, destination: 2 } },
    })
  }
  return pino(pinoOptions, pino.destination(2))
}

const SILENT: Logger = pino({ level: 'silent' })

/** A logger that discards everything. Every call returns the same instance. */
export function silentLogger(): Logger {
  return SILENT
}
