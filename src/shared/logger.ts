export type LogLevel = 'info' | 'warn' | 'error' | 'debug'

const styles = {
  info: { label: 'INFO', ansi: '\x1b[32m' },
  warn: { label: 'WARN', ansi: '\x1b[33m' },
  error: { label: 'ERROR', ansi: '\x1b[31m' },
  debug: { label: 'DEBUG', ansi: '\x1b[34m' }
}

const severity: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
}

const levels: readonly LogLevel[] = ['debug', 'info', 'warn', 'error']

export function parseLevel(value: string | undefined): LogLevel | undefined {
  const normalized = value?.trim().toLowerCase()
  return levels.find((level) => level === normalized)
}

let threshold: LogLevel = parseLevel(process.env.REBASEKIT_LOG_LEVEL) ?? 'info'

export function setLogLevel(level: LogLevel): void {
  threshold = level
}

function enabled(level: LogLevel): boolean {
  return severity[level] >= severity[threshold]
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
