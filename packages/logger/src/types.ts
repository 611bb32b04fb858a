export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export type Environment = 'test' | 'development' | 'production';

export interface EnvironmentConfig {
  minLevel: LogLevel;
  includeStackTraces: boolean;
  bufferSize: number;
}

export interface LogEntry {
  id: string;
  level: LogLevel;
  event_type: string;
  metadata: Record<string, unknown>;
  timestamp: number;
}

export interface Logger {
  /**
   * Create a child logger with additional metadata merged in.
   * Child loggers inherit all parent metadata and share the parent's sink.
   */
  child(metadata: Record<string, unknown>): Logger;

  /**
   * Log at debug level (mirrored only, never written to the log file)
   */
  debug(event_type: string, metadata?: Record<string, unknown>): void;

  info(event_type: string, metadata?: Record<string, unknown>): void;

  warn(event_type: string, metadata?: Record<string, unknown>): void;

  error(event_type: string, metadata?: Record<string, unknown>): void;

  /**
   * Log at fatal level (flushes immediately)
   */
  fatal(event_type: string, metadata?: Record<string, unknown>): void;

  /**
   * Append buffered entries to the log file
   */
  flush(): Promise<void>;
}

export interface LoggerConfig {
  /** JSON-lines file that receives buffered entries */
  filePath?: string;
  bufferSize?: number;
  /** Skip the file sink entirely */
  consoleOnly?: boolean;
  /** Do not mirror entries to stderr (the terminal UI owns the screen) */
  silent?: boolean;
  environment?: Environment;
}
