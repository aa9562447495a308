/**
 * Logging.
 * @packageDocumentation
 */

export {
  ConsoleLogger,
  SilentLogger,
  silentLogger,
  LOG_LEVELS,
  type Logger,
  type LogLevel,
  type LogWriter,
} from './logger'
