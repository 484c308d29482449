/**
 * Structured logger.
 *
 * Emits one JSON line per entry with ts, level, msg and any extra fields.
 * Writes to stdout by default so any aggregator reading JSON lines can pick
 * it up.
 */

import { exportDefaults, type LogLevel } from '@roomscan/config'

export type LogFields = Record<string, string | number | boolean | null>

export interface Logger {
  readonly level: LogLevel
  debug(msg: string, fields?: LogFields): void
  info(msg: string, fields?: LogFields): void
  warn(msg: string, fields?: LogFields): void
  error(msg: string, fields?: LogFields): void
}

export interface LoggerOptions {
  level?: LogLevel
  /** Receives each serialized line, newline included. */
  sink?: (line: string) => void
  clock?: () => Date
}

type EntryLevel = Exclude<LogLevel, 'silent'>

const SEVERITY: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: Number.POSITIVE_INFINITY,
}

function stdoutSink(line: string): void {
  process.stdout.write(line)
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const level = options.level ?? exportDefaults.logLevel
  const sink = options.sink ?? stdoutSink
  const clock = options.clock ?? (() => new Date())

  const emit = (entryLevel: EntryLevel, msg: string, fields?: LogFields): void => {
    if (SEVERITY[entryLevel] < SEVERITY[level]) return
    const base = { ts: clock().toISOString(), level: entryLevel, msg }
    // fields may not override the entry's own keys, which stay first
    const entry = Object.assign({ ...base }, fields, base)
    sink(JSON.stringify(entry) + '\n')
  }

  return {
    level,
    debug: (msg, fields) => emit('debug', msg, fields),
    info: (msg, fields) => emit('info', msg, fields),
    warn: (msg, fields) => emit('warn', msg, fields),
    error: (msg, fields) => emit('error', msg, fields),
  }
}

/** Process-wide logger at the configured level. */
export const logger: Logger = createLogger()
