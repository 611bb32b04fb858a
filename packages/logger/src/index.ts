// @avrodeck/logger - structured logging with JSON-lines file persistence

export { createLogger } from './logger.js';
export type {
  Environment,
  EnvironmentConfig,
  LogEntry,
  Logger,
  LoggerConfig,
  LogLevel,
} from './types.js';
