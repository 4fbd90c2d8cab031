export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const

export type LogLevel = (typeof LOG_LEVELS)[number]

export type LogFormat = 'text' | 'json'

export type LogFields = Record<string, unknown>

export type LogEntry = {
  level: LogLevel
  message: string
  scope?: string
  fields?: LogFields
  timestamp: string
}

export type LogSink = (entry: LogEntry) => void

export interface Logger {
  debug(message: string, fields?: LogFields): void
  info(message: string, fields?: LogFields): void
  warn(message: string, fields?: LogFields): void
  error(message: string, fields?: LogFields): void
  /** Returns a logger that prefixes every entry with `scope`. */
  child(scope: string): Logger
}

export type LoggerOptions = {
  level?: LogLevel
  format?: LogFormat
  scope?: string
  /** Receives every entry at or above `level`. Defaults to the console. */
  sink?: LogSink
}

const styles = {
  info: { label: 'INFO', ansi: '\x1b[32m' },
  warn: { label: 'WARN', ansi: '\x1b[33m' },
  error: { label: 'ERROR', ansi: '\x1b[31m' },
  debug: { label: 'DEBUG', ansi: '\x1b[34m' }
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
}

function formatText(entry: LogEntry): string {
  const style = styles[entry.level]
  const scope = entry.scope ? ` [${entry.scope}]` : ''
  let line = `${style.ansi}[${style.label}]\x1b[0m${scope} ${entry.message}`

  if (entry.fields) {
    const pairs = Object.entries(entry.fields).map(([key, value]) => `${key}=${stringify(value)}`)
    if (pairs.length > 0) {
      line += ` | ${pairs.join(' ')}`
    }
  }
  return line
}

function stringify(value: unknown): string {
  if (typeof value === 'string') return value
  if (value instanceof Error) return value.message
  try {
    return JSON.stringify(value) ?? String(value)
  } catch {
    return String(value)
  }
}

function formatJson(entry: LogEntry): string {
  const { fields, ...rest } = entry
  const normalized: LogFields = {}
  for (const [key, value] of Object.entries(fields ?? {})) {
    normalized[key] = value instanceof Error ? value.message : value
  }
  return JSON.stringify(fields ? { ...rest, fields: normalized } : rest)
}

function consoleSink(format: LogFormat): LogSink {
  const render = format === 'json' ? formatJson : formatText
  return (entry) => {
    const line = render(entry)
    switch (entry.level) {
      case 'debug':
        console.debug(line)
        break
      case 'info':
        console.info(line)
        break
      case 'warn':
        console.warn(line)
        break
      case 'error':
        console.error(line)
        break
    }
  }
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const threshold = LEVEL_ORDER[options.level ?? 'info']
  const sink = options.sink ?? consoleSink(options.format ?? 'text')

  const emit = (level: LogLevel, message: string, fields?: LogFields): void => {
    if (LEVEL_ORDER[level] < threshold) return
    sink({
      level,
      message,
      scope: options.scope,
      fields,
      timestamp: new Date().toISOString()
    })
  }

  return {
    debug: (message, fields) => emit('debug', message, fields),
    info: (message, fields) => emit('info', message, fields),
    warn: (message, fields) => emit('warn', message, fields),
    error: (message, fields) => emit('error', message, fields),
    child: (scope) =>
      createLogger({
        ...options,
        sink,
        scope: options.scope ? `${options.scope}:${scope}` : scope
      })
  }
}

/**
 * Logger that drops everything. Handy default for library callers that do not
 * care about diagnostics.
 */
export const silentLogger: Logger = createLogger({ sink: () => undefined })
