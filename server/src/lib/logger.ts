export type LogLevel = "error" | "warn" | "info" | "debug"

export const LOG_LEVELS = ["error", "warn", "info", "debug"] as const satisfies readonly LogLevel[]

const levels: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
}

let currentLevel: LogLevel = "info"

export function setLogLevel(level: LogLevel) {
  currentLevel = level
}

function formatMessage(scope: string, message: string, meta?: Record<string, unknown>) {
  const line = `[${scope}] ${message}`
  if (!meta || Object.keys(meta).length === 0) return line
  return `${line} | ${JSON.stringify(meta)}`
}

export interface Logger {
  error(message: string, meta?: Record<string, unknown>): void
  warn(message: string, meta?: Record<string, unknown>): void
  info(message: string, meta?: Record<string, unknown>): void
  debug(message: string, meta?: Record<string, unknown>): void
}

export function createLogger(scope: string): Logger {
  return {
    error: (message, meta) => {
      console.error(formatMessage(scope, message, meta))
    },
    warn: (message, meta) => {
      if (levels[currentLevel] >= levels.warn) console.warn(formatMessage(scope, message, meta))
    },
    info: (message, meta) => {
      if (levels[currentLevel] >= levels.info) console.log(formatMessage(scope, message, meta))
    },
    debug: (message, meta) => {
      if (levels[currentLevel] >= levels.debug) console.debug(formatMessage(scope, message, meta))
    },
  }
}
