/**
 * Logger
 *
 * Leveled logger writing to stderr. stdout is left alone because the
 * MCP stdio transport owns it.
 */

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent"

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
}

export const LOG_LEVELS = ["debug", "info", "warn", "error", "silent"] as const

/**
 * Destination for formatted log lines.
 */
export type LogSink = (line: string, detail?: unknown) => void

const stderrSink: LogSink = (line, detail) => {
  if (detail === undefined) {
    console.error(line)
  } else {
    console.error(line, detail)
  }
}

export interface LoggerOptions {
  /** Minimum level written (default: info) */
  level?: LogLevel
  /** Scope shown in every line */
  scope?: string
  /** Where lines go (default: console.error) */
  sink?: LogSink
}

export class Logger {
  private readonly level: LogLevel
  private readonly scope?: string
  private readonly sink: LogSink

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? "info"
    this.scope = options.scope
    this.sink = options.sink ?? stderrSink
  }

  /**
   * Logger sharing this one's level and sink under another scope.
   */
  child(scope: string): Logger {
    return new Logger({
      level: this.level,
      scope: this.scope ? `${this.scope}:${scope}` : scope,
      sink: this.sink,
    })
  }

  isEnabled(level: Exclude<LogLevel, "silent">): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level]
  }

  private write(level: Exclude<LogLevel, "silent">, message: string, detail?: unknown): void {
    if (!this.isEnabled(level)) return
    const scope = this.scope ? ` [${this.scope}]` : ""
    this.sink(`[${level.toUpperCase()}] ${new Date().toISOString()}${scope} - ${message}`, detail)
  }

  debug(message: string, detail?: unknown): void {
    this.write("debug", message, detail)
  }

  info(message: string, detail?: unknown): void {
    this.write("info", message, detail)
  }

  warn(message: string, detail?: unknown): void {
    this.write("warn", message, detail)
  }

  error(message: string, error?: unknown): void {
    this.write("error", message, error)
  }
}

/**
 * A logger that writes nothing.
 */
export const silentLogger = new Logger({ level: "silent" })
