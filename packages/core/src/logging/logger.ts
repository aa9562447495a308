/**
 * Structured logging for the analysis engine.
 *
 * Sessions and the dispatcher accept an optional `Logger` and default to
 * `SilentLogger`; use `ConsoleLogger` in hosts that want output.
 *
 * @packageDocumentation
 */

/**
 * Minimum severity a logger emits.
 * @public
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent'

/**
 * Every level, lowest first.
 * @public
 */
export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const satisfies readonly LogLevel[]

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
}

/**
 * Logging sink.
 * @public
 */
export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void
  info(message: string, context?: Record<string, unknown>): void
  warn(message: string, context?: Record<string, unknown>): void
  error(message: string, context?: Record<string, unknown>): void
}

/**
 * Where console output goes; swapped out in tests.
 * @public
 */
export interface LogWriter {
  stdout(line: string): void
  stderr(line: string): void
}

const processWriter: LogWriter = {
  stdout: (line) => process.stdout.write(line + '\n'),
  stderr: (line) => process.stderr.write(line + '\n'),
}

/**
 * Writes `HH:MM:SS.mmm [prefix] [LEVEL] message {context}` lines;
 * errors go to stderr.
 * @public
 */
export class ConsoleLogger implements Logger {
  private readonly minLevel: number
  private readonly prefix: string
  private readonly writer: LogWriter

  constructor(level: LogLevel = 'info', prefix = 'uvl-analysis', writer: LogWriter = processWriter) {
    this.minLevel = LEVEL_ORDER[level]
    this.prefix = prefix
    this.writer = writer
  }

  debug(message: string, context?: Record<string, unknown>): void {
    if (this.minLevel > LEVEL_ORDER.debug) return
    this.write('DEBUG', message, context)
  }

  info(message: string, context?: Record<string, unknown>): void {
    if (this.minLevel > LEVEL_ORDER.info) return
    this.write('INFO ', message, context)
  }

  warn(message: string, context?: Record<string, unknown>): void {
    if (this.minLevel > LEVEL_ORDER.warn) return
    this.write('WARN ', message, context)
  }

  error(message: string, context?: Record<string, unknown>): void {
    if (this.minLevel > LEVEL_ORDER.error) return
    this.write('ERROR', message, context, true)
  }

  private write(label: string, message: string, context?: Record<string, unknown>, stderr = false): void {
    const ts = new Date().toISOString().slice(11, 23) // HH:MM:SS.mmm
    const ctx = context !== undefined ? '  ' + JSON.stringify(context, bigintReplacer) : ''
    const line = `${ts} [${this.prefix}] [${label}] ${message}${ctx}`
    if (stderr) {
      this.writer.stderr(line)
    } else {
      this.writer.stdout(line)
    }
  }
}

/**
 * Discards everything.
 * @public
 */
export class SilentLogger implements Logger {
  debug(): void {}
  info(): void {}
  warn(): void {}
  error(): void {}
}

/**
 * Shared silent logger.
 * @public
 */
export const silentLogger: Logger = new SilentLogger()

function bigintReplacer(_key: string, value: unknown): unknown {
  return typeof value === 'bigint' ? value.toString() : value
}
