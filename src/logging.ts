/**
 * Structured Logging Module for tidewire
 *
 * Provides structured JSON logging with log levels, context propagation
 * and sensitive-field redaction. Every engine component takes a `logger`
 * option; entries are plain objects handed to pluggable handlers.
 */

// ============================================================================
// Types and Interfaces
// ============================================================================

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal'

export interface LogEntry {
  timestamp: string
  level: LogLevel
  message: string
  data?: Record<string, unknown>
  context?: LogContext
  service?: string
}

export interface LogContext {
  component?: string
  clientId?: string
  [key: string]: unknown
}

export type LogHandler = (entry: LogEntry) => void

export type LogFilter = (entry: LogEntry) => boolean

export interface LoggerOptions {
  level?: LogLevel
  handler?: LogHandler
  handlers?: LogHandler[]
  filter?: LogFilter
  timestamp?: () => string
  service?: string
}

export interface Logger {
  trace(message: string, data?: Record<string, unknown>): void
  debug(message: string, data?: Record<string, unknown>): void
  info(message: string, data?: Record<string, unknown>): void
  warn(message: string, data?: Record<string, unknown>): void
  error(message: string, data?: Record<string, unknown>): void
  fatal(message: string, data?: Record<string, unknown>): void
  setLevel(level: LogLevel): void
  isLevelEnabled(level: LogLevel): boolean
  withContext(context: LogContext): Logger
}

// ============================================================================
// Constants
// ============================================================================

const LOG_LEVEL_ORDER: Record<LogLevel, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
  fatal: 5,
}

const SENSITIVE_FIELDS = ['password', 'token', 'apikey', 'secret', 'authorization', 'cookie']

// ============================================================================
// Utility Functions
// ============================================================================

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function redactSensitiveData(data: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {}
  for (const [key, value] of Object.entries(data)) {
    const lowered = key.toLowerCase()
    if (SENSITIVE_FIELDS.some((field) => lowered.includes(field))) {
      result[key] = '[REDACTED]'
    } else if (isPlainObject(value)) {
      result[key] = redactSensitiveData(value)
    } else {
      result[key] = value
    }
  }
  return result
}

function serializeError(error: Error): Record<string, unknown> {
  const result: Record<string, unknown> = {
    message: error.message,
    name: error.name,
  }
  if (error.cause instanceof Error) {
    result.cause = serializeError(error.cause)
  } else if (error.cause !== undefined) {
    result.cause = error.cause
  }
  return result
}

function processData(data: Record<string, unknown>): Record<string, unknown> {
  const processed: Record<string, unknown> = {}
  for (const [key, value] of Object.entries(data)) {
    if (value instanceof Error) {
      processed[key] = serializeError(value)
    } else if (value && typeof value === 'object') {
      try {
        JSON.stringify(value)
        processed[key] = value
      } catch {
        processed[key] = '[Circular or non-serializable]'
      }
    } else {
      processed[key] = value
    }
  }
  return redactSensitiveData(processed)
}

function shouldLog(level: LogLevel, minLevel: LogLevel): boolean {
  return LOG_LEVEL_ORDER[level] >= LOG_LEVEL_ORDER[minLevel]
}

// ============================================================================
// Formatting
// ============================================================================

export function formatLogEntry(entry: LogEntry, options?: { pretty?: boolean }): string {
  if (options?.pretty) {
    return JSON.stringify(entry, null, 2)
  }
  return JSON.stringify(entry)
}

/**
 * Handler writing formatted entries to the matching console method.
 */
export function createConsoleHandler(): LogHandler {
  return (entry) => {
    const line = formatLogEntry(entry)
    switch (entry.level) {
      case 'fatal':
      case 'error':
        console.error(line)
        break
      case 'warn':
        console.warn(line)
        break
      default:
        console.log(line)
    }
  }
}

// ============================================================================
// Logger Implementation
// ============================================================================

class LoggerImpl implements Logger {
  private level: LogLevel
  private handlers: LogHandler[]
  private filter?: LogFilter
  private timestampFn: () => string
  private service?: string
  private context: LogContext

  constructor(options: LoggerOptions = {}, context: LogContext = {}) {
    this.level = options.level ?? 'info'
    this.handlers = options.handlers ?? (options.handler ? [options.handler] : [])
    this.filter = options.filter
    this.timestampFn = options.timestamp ?? (() => new Date().toISOString())
    this.service = options.service
    this.context = context
  }

  private log(level: LogLevel, message: string, data?: Record<string, unknown>): void {
    if (!shouldLog(level, this.level) || this.handlers.length === 0) {
      return
    }

    const entry: LogEntry = {
      timestamp: this.timestampFn(),
      level,
      message,
    }

    if (data) {
      entry.data = processData(data)
    }

    if (Object.keys(this.context).length > 0) {
      entry.context = { ...this.context }
    }

    if (this.service) {
      entry.service = this.service
    }

    if (this.filter && !this.filter(entry)) {
      return
    }

    for (const handler of this.handlers) {
      handler(entry)
    }
  }

  trace(message: string, data?: Record<string, unknown>): void {
    this.log('trace', message, data)
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.log('debug', message, data)
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log('info', message, data)
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.log('warn', message, data)
  }

  error(message: string, data?: Record<string, unknown>): void {
    this.log('error', message, data)
  }

  fatal(message: string, data?: Record<string, unknown>): void {
    this.log('fatal', message, data)
  }

  setLevel(level: LogLevel): void {
    this.level = level
  }

  isLevelEnabled(level: LogLevel): boolean {
    return shouldLog(level, this.level)
  }

  withContext(context: LogContext): Logger {
    return new LoggerImpl(
      {
        level: this.level,
        handlers: this.handlers,
        filter: this.filter,
        timestamp: this.timestampFn,
        service: this.service,
      },
      { ...this.context, ...context }
    )
  }
}

// ============================================================================
// Factory Functions
// ============================================================================

export function createLogger(options: LoggerOptions = {}): Logger {
  return new LoggerImpl(options)
}

/**
 * Logger used when a component is constructed without one: warnings and
 * errors go to the console, everything else is dropped.
 */
export function createDefaultLogger(): Logger {
  return new LoggerImpl({ level: 'warn', handler: createConsoleHandler(), service: 'tidewire' })
}

export function createNoopLogger(): Logger {
  return new LoggerImpl({ level: 'fatal', handlers: [] })
}
