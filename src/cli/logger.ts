// Leveled logger for the command-line driver. The core never logs.
//
// Levels: silent < error < warn < info < debug

export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'debug'

export interface LogSink {
  out: (line: string) => void
  err: (line: string) => void
}

export interface LoggerOptions {
  level?: LogLevel
  sink?: LogSink
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  silent: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value)
}

export const consoleSink: LogSink = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
}

/**
 * `print` is program output and always goes to `out`. The leveled methods are
 * diagnostics and go to `err`, filtered by level.
 */
export class Logger {
  private readonly level: LogLevel
  private readonly sink: LogSink

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? 'info'
    this.sink = options.sink ?? consoleSink
  }

  enabled(level: LogLevel): boolean {
    return level !== 'silent' && LEVEL_ORDER[this.level] >= LEVEL_ORDER[level]
  }

  print(line: string): void {
    this.sink.out(line)
  }

  error(line: string): void {
    if (this.enabled('error')) this.sink.err(line)
  }

  debug(line: string): void {
    if (this.enabled('debug')) this.sink.err(`[debug] ${line}`)
  }
}

// KESTREL_LOG_LEVEL, falling back to info for unknown values.
export function levelFromEnv(env: NodeJS.ProcessEnv): LogLevel {
  const raw = env.KESTREL_LOG_LEVEL?.toLowerCase()
  return raw !== undefined && isLogLevel(raw) ? raw : 'info'
}
