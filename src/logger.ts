/**
 * Structured logger
 *
 * One JSON line per entry, written to stderr so report output on stdout
 * stays clean. A log file and a custom sink can be configured.
 */

import { appendFileSync } from "node:fs"

export type LogLevel = "debug" | "info" | "warn" | "error"

export type LogFields = Record<string, unknown>

export interface Logger {
  debug(msg: string, fields?: LogFields): void
  info(msg: string, fields?: LogFields): void
  warn(msg: string, fields?: LogFields): void
  error(msg: string, fields?: LogFields): void
}

export type LogSink = (line: string, level: LogLevel) => void

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
}

const stderrSink: LogSink = (line) => {
  process.stderr.write(line + "\n")
}

let minLevel: LogLevel = parseLogLevel(process.env.VH_LOG_LEVEL) ?? "info"
let sink: LogSink = stderrSink

export function parseLogLevel(raw: unknown): LogLevel | undefined {
  if (raw === "debug" || raw === "info" || raw === "warn" || raw === "error") return raw
  return undefined
}

export function configureLogging(opts: { level?: LogLevel; file?: string; sink?: LogSink }): void {
  if (opts.level) minLevel = opts.level
  if (opts.sink) {
    sink = opts.sink
  } else if (opts.file) {
    const file = opts.file
    sink = (line) => appendFileSync(file, line + "\n")
  }
}

export function resetLogging(): void {
  minLevel = parseLogLevel(process.env.VH_LOG_LEVEL) ?? "info"
  sink = stderrSink
}

export function createLogger(component: string): Logger {
  const emit = (level: LogLevel, msg: string, fields?: LogFields): void => {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[minLevel]) return
    const entry = {
      ts: new Date().toISOString(),
      level,
      component,
      msg,
      ...fields,
    }
    sink(JSON.stringify(entry, (_key, value) => (value instanceof Error ? value.message : value)), level)
  }

  return {
    debug: (msg, fields) => emit("debug", msg, fields),
    info: (msg, fields) => emit("info", msg, fields),
    warn: (msg, fields) => emit("warn", msg, fields),
    error: (msg, fields) => emit("error", msg, fields),
  }
}
