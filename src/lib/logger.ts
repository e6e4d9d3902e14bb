export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

export type LogMeta = Record<string, unknown> | undefined

export type Logger = {
  debug: (message: string, meta?: LogMeta) => void
  info: (message: string, meta?: LogMeta) => void
  warn: (message: string, meta?: LogMeta) => void
  error: (message: string, meta?: LogMeta) => void
}

const levelOrder: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && value in levelOrder
}

let threshold: LogLevel = (() => {
  const raw = String(import.meta.env?.VITE_LOG_LEVEL ?? 'info').toLowerCase()
  return isLogLevel(raw) ? raw : 'info'
})()

export function setLogLevel(level: LogLevel) {
  threshold = level
}

export function getLogLevel(): LogLevel {
  return threshold
}

// Errors don't survive JSON.stringify on their own
const serializeValue = (val: unknown) => {
  if (val instanceof Error) {
    return { name: val.name, message: val.message, stack: val.stack }
  }
  return val
}

const safeStringify = (value: unknown) => {
  try {
    return JSON.stringify(value, (_key, val) => serializeValue(val))
  } catch {
    return undefined
  }
}

function emit(level: LogLevel, message: string, meta: LogMeta, tag: string | null) {
  if (levelOrder[level] < levelOrder[threshold]) return
  const payload = {
    level,
    message,
    tag,
    meta: meta ?? undefined,
    timestamp: new Date().toISOString(),
  }
  const line = safeStringify(payload) ?? message
  console[level](line)
}

export function getLogger(tag?: string | null): Logger {
  const t = tag ?? null
  return {
    debug: (message, meta) => emit('debug', message, meta, t),
    info: (message, meta) => emit('info', message, meta, t),
    warn: (message, meta) => emit('warn', message, meta, t),
    error: (message, meta) => emit('error', message, meta, t),
  }
}
