/**
 * conduit - Logging Module
 */

export type { ILogger, LogLevel, ConsoleLoggerOptions } from './logger';
export {
  consoleLogger,
  silentLogger,
  createConsoleLogger,
  isLogLevel,
} from './logger';
