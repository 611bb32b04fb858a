/**
 * Error types for the CLI's collaborators
 */

/** Invalid, unreadable or missing configuration */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/** Non-2xx response or transport failure talking to the schema registry */
export class RegistryError extends Error {
  /** HTTP status, absent for transport failures */
  readonly status?: number;

  constructor(message: string, status?: number) {
    super(status === undefined ? message : `registry returned ${status}: ${message}`);
    this.name = 'RegistryError';
    this.status = status;
  }
}

/** A broker operation did not finish within its time limit */
export class BrokerTimeoutError extends Error {
  constructor(operation: string, timeoutMs: number) {
    super(`${operation} timed out after ${timeoutMs}ms`);
    this.name = 'BrokerTimeoutError';
  }
}

/** Thrown by broker gateways when the profile has no Kafka settings */
export class KafkaNotConfiguredError extends Error {
  constructor() {
    super('Kafka not configured');
    this.name = 'KafkaNotConfiguredError';
  }
}

/** The external editor could not be started or exited with an error */
export class EditorError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'EditorError';
  }
}

/**
 * True when a Node.js system error carries the given code (ENOENT, EEXIST...).
 */
export function hasErrorCode(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code;
}
