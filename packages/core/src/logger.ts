/**
 * Leveled logging for toolcache.
 *
 * Library code logs through a Logger created with createLogger(). The
 * default handler writes one JSON line per entry to stderr; the CLI
 * replaces it with a colored handler via setLogHandler().
 */

export enum LogLevel {
  Debug = 'debug',
  Info = 'info',
  Warn = 'warn',
  Error = 'error',
}

export interface LogEntry {
  level: LogLevel
  message: string
  context: Record<string, unknown>
  timestamp: string
}

export type LogHandler = (entry: LogEntry) => void

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void
  info(message: string, context?: Record<string, unknown>): void
  warn(message: string, context?: Record<string, unknown>): void
  error(message: string, context?: Record<string, unknown>): void
  child(context: Record<string, unknown>): Logger
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  [LogLevel.Debug]: 0,
  [LogLevel.Info]: 1,
  [LogLevel.Warn]: 2,
  [LogLevel.Error]: 3,
}

export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  switch (value?.toLowerCase()) {
    case 'debug':
      return LogLevel.Debug
    case 'info':
      return LogLevel.Info
    case 'warn':
    case 'warning':
      return LogLevel.Warn
    case 'error':
      return LogLevel.Error
    default:
      return undefined
  }
}

/** Library code stays quiet by default: only warnings and errors. */
const defaultLogHandler: LogHandler = (entry) => {
  const output = {
    level: entry.level,
    ts: entry.timestamp,
    msg: entry.message,
    ...entry.context,
  }
  process.stderr.write(`${JSON.stringify(output)}\n`)
}

let currentHandler: LogHandler = defaultLogHandler
let currentMinLevel: LogLevel = parseLogLevel(process.env['TOOLCACHE_LOG_LEVEL']) ?? LogLevel.Warn

/** Replace the log handler. Returns the previous one so tests can restore it. */
export function setLogHandler(handler: LogHandler): LogHandler {
  const previous = currentHandler
  currentHandler = handler
  return previous
}

/** Set the minimum log level. Returns the previous level. */
export function setLogLevel(level: LogLevel): LogLevel {
  const previous = currentMinLevel
  currentMinLevel = level
  return previous
}

function log(level: LogLevel, message: string, context: Record<string, unknown>): void {
  if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[currentMinLevel]) return
  currentHandler({
    level,
    message,
    context,
    timestamp: new Date().toISOString(),
  })
}

/** Create a logger whose entries carry `scope` plus any extra context. */
export function createLogger(scope: string, baseContext: Record<string, unknown> = {}): Logger {
  const base = { scope, ...baseContext }
  return {
    debug: (msg, ctx) => log(LogLevel.Debug, msg, { ...base, ...ctx }),
    info: (msg, ctx) => log(LogLevel.Info, msg, { ...base, ...ctx }),
    warn: (msg, ctx) => log(LogLevel.Warn, msg, { ...base, ...ctx }),
    error: (msg, ctx) => log(LogLevel.Error, msg, { ...base, ...ctx }),
    child: (childCtx) => createLogger(scope, { ...baseContext, ...childCtx }),
  }
}
