export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const
export type LogLevel = (typeof LOG_LEVELS)[number]

type LogSink = (line: string) => void

export interface Logger {
  debug: (message: string, extra?: Record<string, unknown>) => void
  info: (message: string, extra?: Record<string, unknown>) => void
  warn: (message: string, extra?: Record<string, unknown>) => void
  error: (message: string, extra?: Record<string, unknown>) => void
}

const defaultSink: LogSink = (line) => {
  process.stderr.write(`${line}\n`)
}

let configuredLevel: LogLevel | null = null
let sink: LogSink = defaultSink

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && LOG_LEVELS.some((level) => level === value)
}

function resolveLevel(): LogLevel {
  if (configuredLevel) return configuredLevel
  const env = process.env.SKILLBOOK_LOG_LEVEL?.trim().toLowerCase()
  return isLogLevel(env) ? env : "warn"
}

export function setLogLevel(level: LogLevel | null) {
  configuredLevel = level
}

// Tests swap the sink to capture output; null restores stderr.
export function setLogSink(next: LogSink | null) {
  sink = next ?? defaultSink
}

export function createLogger(service: string): Logger {
  const log = (level: LogLevel, message: string, extra?: Record<string, unknown>) => {
    if (LOG_LEVELS.indexOf(level) < LOG_LEVELS.indexOf(resolveLevel())) return
    sink(
      JSON.stringify({
        timestamp: new Date().toISOString(),
        level,
        service,
        message,
        ...extra,
      }),
    )
  }

  return {
    debug: (message, extra) => log("debug", message, extra),
    info: (message, extra) => log("info", message, extra),
    warn: (message, extra) => log("warn", message, extra),
    error: (message, extra) => log("error", message, extra),
  }
}
