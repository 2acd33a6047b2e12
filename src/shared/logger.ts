export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

const styles = {
  info: { label: 'INFO', ansi: '\x1b[32m' },
  warn: { label: 'WARN', ansi: '\x1b[33m' },
  error: { label: 'ERROR', ansi: '\x1b[31m' },
  debug: { label: 'DEBUG', ansi: '\x1b[34m' }
}

const priority: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
}

export function isLogLevel(value: string | undefined): value is LogLevel {
  return value === 'debug' || value === 'info' || value === 'warn' || value === 'error'
}

const envLevel = process.env['LOG_LEVEL']?.toLowerCase()
let currentLevel: LogLevel = isLogLevel(envLevel) ? envLevel : 'info'

export function setLogLevel(level: LogLevel): void {
  currentLevel = level
}

function enabled(level: LogLevel): boolean {
  return priority[level] >= priority[currentLevel]
}

function format(level: LogLevel, message: unknown, args: unknown[]): unknown[] {
  const style = styles[level]
  return [`${style.ansi}[${style.label}]\x1b[0m`, message, ...args]
}

export const log = {
  info: (message: unknown, ...args: unknown[]) => {
    if (enabled('info')) console.info(...format('info', message, args))
  },
  warn: (message: unknown, ...args: unknown[]) => {
    if (enabled('warn')) console.warn(...format('warn', message, args))
  },
  error: (message: unknown, ...args: unknown[]) => {
    if (enabled('error')) console.error(...format('error', message, args))
  },
  debug: (message: unknown, ...args: unknown[]) => {
    if (enabled('debug')) console.debug(...format('debug', message, args))
  }
}
