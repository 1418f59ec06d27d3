/**
 * Structured JSON-line logging.
 *
 * Emits one JSON object per line with `ts`, `level` and `msg`, plus any
 * extra fields. Entries below the configured level are dropped. Everything
 * goes to stderr so that stdout carries only program output.
 */

import type { InductionLogger } from '@binary-id3/decision-tree'
import { isLevelEnabled, type LogLevel } from '@binary-id3/config'

export type LineWriter = (line: string) => void

export type LogFields = Record<string, unknown>

export interface Logger {
  debug(msg: string, fields?: LogFields): void
  info(msg: string, fields?: LogFields): void
  warn(msg: string, fields?: LogFields): void
  error(msg: string, fields?: LogFields): void
}

export interface LoggerOptions {
  write?: LineWriter
  now?: () => Date
}

const stderrWriter: LineWriter = (line) => {
  process.stderr.write(line)
}

export function createLogger(threshold: LogLevel, options: LoggerOptions = {}): Logger {
  const write = options.write ?? stderrWriter
  const now = options.now ?? (() => new Date())

  const emit = (level: LogLevel, msg: string, fields: LogFields = {}): void => {
    if (!isLevelEnabled(level, threshold)) return
    write(JSON.stringify({ ts: now().toISOString(), level, msg, ...fields }) + '\n')
  }

  return {
    debug: (msg, fields) => emit('debug', msg, fields),
    info: (msg, fields) => emit('info', msg, fields),
    warn: (msg, fields) => emit('warn', msg, fields),
    error: (msg, fields) => emit('error', msg, fields),
  }
}

/** Forward induction events as `debug` entries named after the event type. */
export function inductionLogger<A>(logger: Logger): InductionLogger<A> {
  return (event) => {
    const { type, ...fields } = event
    logger.debug(type, fields)
  }
}
