/**
 * Structured logging.
 *
 * Emits one JSON line per event with timestamp, level, scope and message,
 * plus any extra fields. Lines go to stderr by default so that stdout carries
 * only the report.
 */

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const

export type LogLevel = (typeof LOG_LEVELS)[number]

export type LogFields = Record<string, unknown>

/** Receives one serialized entry, without a trailing newline. */
export type LogSink = (line: string) => void

export interface Logger {
  debug(msg: string, fields?: LogFields): void
  info(msg: string, fields?: LogFields): void
  warn(msg: string, fields?: LogFields): void
  error(msg: string, fields?: LogFields): void
  /** Same sink and level, nested scope (`parent:child`). */
  child(scope: string): Logger
}

export interface LoggerOptions {
  scope: string
  level?: LogLevel
  sink?: LogSink
  now?: () => Date
}

const stderrSink: LogSink = (line) => {
  process.stderr.write(line + '\n')
}

export function createLogger(options: LoggerOptions): Logger {
  const threshold = LOG_LEVELS.indexOf(options.level ?? 'info')
  const sink = options.sink ?? stderrSink
  const now = options.now ?? (() => new Date())

  const emit = (level: LogLevel, msg: string, fields?: LogFields): void => {
    if (LOG_LEVELS.indexOf(level) < threshold) return
    const entry = {
      ts: now().toISOString(),
      level,
      scope: options.scope,
      msg,
      ...fields,
    }
    sink(JSON.stringify(entry))
  }

  return {
    debug: (msg, fields) => emit('debug', msg, fields),
    info: (msg, fields) => emit('info', msg, fields),
    warn: (msg, fields) => emit('warn', msg, fields),
    error: (msg, fields) => emit('error', msg, fields),
    child: (scope) => createLogger({ ...options, scope: `${options.scope}:${scope}` }),
  }
}
