import type { LoggingConfig } from './types'
import process from 'node:process'

/**
 * Log level type
 */
type LogLevel = 'debug' | 'info' | 'warn' | 'error'

/**
 * ANSI color codes for terminal output
 */
export const ANSI_COLORS = {
  reset: '\u001B[0m',
  bold: '\u001B[1m',
  dim: '\u001B[2m',
  red: '\u001B[31m',
  green: '\u001B[32m',
  yellow: '\u001B[33m',
  blue: '\u001B[34m',
  magenta: '\u001B[35m',
  cyan: '\u001B[36m',
} as const

export interface LogWriter {
  stdout: (text: string) => void
  stderr: (text: string) => void
}

const processWriter: LogWriter = {
  stdout: text => process.stdout.write(text),
  stderr: text => process.stderr.write(text),
}

/**
 * Logger class with scopes and optional colors
 */
export class Logger {
  private verbose: boolean
  private scopeName?: string
  private useColors: boolean
  private options: LoggingConfig
  private writer: LogWriter

  constructor(verbose = false, scopeName?: string, options: LoggingConfig = {}, writer: LogWriter = processWriter) {
    this.verbose = verbose
    this.scopeName = scopeName
    this.options = options
    this.writer = writer
    this.useColors = writer === processWriter && Boolean(process.stdout.isTTY) && !process.env.NO_COLOR
  }

  /**
   * Enable or disable verbose logging
   */
  setVerbose(verbose: boolean): void {
    this.verbose = verbose
  }

  isVerbose(): boolean {
    return this.verbose
  }

  /**
   * Create a new logger instance with a scope
   */
  withScope(scope: string): Logger {
    const name = this.scopeName ? `${this.scopeName}:${scope}` : scope
    return new Logger(this.verbose, name, this.options, this.writer)
  }

  private format(level: LogLevel, message: string, args: unknown[]): string {
    let formatted = ''

    if (this.options.timestamps)
      formatted += `${this.colorize(new Date().toISOString(), 'dim')} `

    formatted += `${this.getLevelString(level)} `

    if (this.scopeName)
      formatted += `${this.colorize(`[${this.scopeName}]`, 'dim')} `

    formatted += message
    return `${formatted}${args.length ? ` ${args.map(String).join(' ')}` : ''}\n`
  }

  private getLevelString(level: LogLevel): string {
    const prefixes = {
      debug: this.options.prefixes?.debug ?? 'DEBUG',
      info: this.options.prefixes?.info ?? 'INFO',
      warn: this.options.prefixes?.warn ?? 'WARN',
      error: this.options.prefixes?.error ?? 'ERROR',
    }

    const levelStr = prefixes[level]

    if (!this.useColors)
      return `[${levelStr}]`

    const colors = {
      debug: ANSI_COLORS.cyan,
      info: ANSI_COLORS.blue,
      warn: ANSI_COLORS.yellow,
      error: ANSI_COLORS.red,
    }

    return `${colors[level]}[${levelStr}]${ANSI_COLORS.reset}`
  }

  private colorize(text: string, style: keyof typeof ANSI_COLORS): string {
    if (!this.useColors)
      return text
    return `${ANSI_COLORS[style]}${text}${ANSI_COLORS.reset}`
  }

  debug(message: string, ...args: unknown[]): void {
    if (!this.verbose)
      return
    this.writer.stdout(this.format('debug', message, args))
  }

  info(message: string, ...args: unknown[]): void {
    this.writer.stdout(this.format('info', message, args))
  }

  warn(message: string, ...args: unknown[]): void {
    this.writer.stderr(this.format('warn', message, args))
  }

  error(message: string, ...args: unknown[]): void {
    this.writer.stderr(this.format('error', message, args))
  }
}

/**
 * Discards everything. Used by tests and embedders that render output themselves.
 */
export function silentLogger(): Logger {
  return new Logger(false, undefined, {}, { stdout: () => {}, stderr: () => {} })
}
