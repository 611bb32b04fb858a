/** Structured logger with optional JSON-lines file persistence */

import { appendFile, mkdir } from 'node:fs/promises';
import * as path from 'node:path';
import { ulid } from 'ulid';
import type {
  Environment,
  EnvironmentConfig,
  LogEntry,
  Logger,
  LoggerConfig,
  LogLevel,
} from './types.js';

/** Environment-specific configurations */
const ENVIRONMENT_CONFIGS: Record<Environment, EnvironmentConfig> = {
  test: {
    minLevel: 'debug', // Log everything in tests
    includeStackTraces: true,
    bufferSize: 1000,
  },
  development: {
    minLevel: 'info',
    includeStackTraces: true,
    bufferSize: 50,
  },
  production: {
    minLevel: 'warn', // Only warnings and errors
    includeStackTraces: false,
    bufferSize: 50,
  },
};

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  fatal: 4,
};

/** Buffer shared between a logger and all of its children */
interface Sink {
  filePath?: string;
  buffer: LogEntry[];
  pending: Promise<void>;
}

class LoggerImpl implements Logger {
  protected metadata: Record<string, unknown>;
  private sink: Sink;
  private bufferSize: number;
  private consoleOnly: boolean;
  private silent: boolean;
  private environment: Environment;
  private envConfig: EnvironmentConfig;

  constructor(
    config: LoggerConfig,
    parentMetadata: Record<string, unknown> = {},
    sink?: Sink,
  ) {
    this.metadata = parentMetadata;
    this.consoleOnly = config.consoleOnly ?? false;
    this.silent = config.silent ?? false;
    this.environment = config.environment ?? 'development';
    this.envConfig = ENVIRONMENT_CONFIGS[this.environment];
    this.bufferSize = config.bufferSize ?? this.envConfig.bufferSize;
    this.sink = sink ?? { filePath: config.filePath, buffer: [], pending: Promise.resolve() };

    // Validate: if not console-only, a file is required
    if (!this.consoleOnly && !this.sink.filePath) {
      throw new Error('LoggerConfig.filePath is required when consoleOnly is false');
    }
  }

  child(metadata: Record<string, unknown>): Logger {
    return new LoggerImpl(
      {
        bufferSize: this.bufferSize,
        consoleOnly: this.consoleOnly,
        silent: this.silent,
        environment: this.environment,
      },
      { ...this.metadata, ...metadata },
      this.sink,
    );
  }

  debug(event_type: string, metadata?: Record<string, unknown>): void {
    this.log('debug', event_type, metadata);
  }

  info(event_type: string, metadata?: Record<string, unknown>): void {
    this.log('info', event_type, metadata);
  }

  warn(event_type: string, metadata?: Record<string, unknown>): void {
    this.log('warn', event_type, metadata);
  }

  error(event_type: string, metadata?: Record<string, unknown>): void {
    this.log('error', event_type, metadata);
  }

  fatal(event_type: string, metadata?: Record<string, unknown>): void {
    this.log('fatal', event_type, metadata);
    // Fatal logs flush immediately (don't wait for batch)
    this.flush().catch((err) => {
      console.error('Failed to flush fatal log:', err);
    });
  }

  private log(level: LogLevel, event_type: string, metadata?: Record<string, unknown>): void {
    if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[this.envConfig.minLevel]) {
      return;
    }

    const merged = { ...this.metadata, ...metadata };
    if (!this.envConfig.includeStackTraces) {
      delete merged.stack;
    }

    const entry: LogEntry = {
      id: this.generateId(),
      level,
      event_type,
      metadata: merged,
      timestamp: Date.now(),
    };

    if (!this.silent) {
      this.logToConsole(entry);
    }

    // Debug entries are never persisted
    if (!this.consoleOnly && level !== 'debug') {
      this.sink.buffer.push(entry);

      if (this.sink.buffer.length >= this.bufferSize) {
        this.flush().catch((err) => {
          console.error('Failed to auto-flush logs:', err);
        });
      }
    }
  }

  async flush(): Promise<void> {
    const { filePath } = this.sink;
    if (this.consoleOnly || !filePath || this.sink.buffer.length === 0) {
      return this.sink.pending;
    }

    const toFlush = [...this.sink.buffer];
    this.sink.buffer = [];

    // Appends are chained so entries land in the order they were logged
    this.sink.pending = this.sink.pending.then(async () => {
      try {
        await mkdir(path.dirname(filePath), { recursive: true });
        await appendFile(filePath, toFlush.map((entry) => `${JSON.stringify(entry)}\n`).join(''));
      } catch (err) {
        // On failure, report but don't re-throw
        console.error('Failed to flush logs to file:', err, {
          entries: toFlush.length,
        });
      }
    });

    return this.sink.pending;
  }

  protected logToConsole(entry: LogEntry): void {
    console.error(
      JSON.stringify({
        level: entry.level,
        event_type: entry.event_type,
        metadata: entry.metadata,
        timestamp: new Date(entry.timestamp).toISOString(),
      }),
    );
  }

  protected generateId(): string {
    return `log_${ulid()}`;
  }
}

export function createLogger(config: LoggerConfig): Logger {
  return new LoggerImpl(config);
}
