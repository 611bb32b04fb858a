import type { Logger } from '@avrodeck/logger';
import { Kafka, logLevel, type LogEntry, type SASLOptions } from 'kafkajs';
import type { KafkaConfig } from '../config.js';
import { BrokerTimeoutError } from '../errors.js';

const CLIENT_ID = 'avrodeck';
const CONNECTION_TIMEOUT_MS = 10_000;

/**
 * Build a kafkajs client for the profile. SASL_SSL always enables TLS and
 * adds PLAIN credentials when both are present.
 */
export function createKafka(config: KafkaConfig, logger: Logger): Kafka {
  const sasl: SASLOptions | undefined =
    config.securityProtocol === 'SASL_SSL' && config.saslUsername && config.saslPassword
      ? { mechanism: 'plain', username: config.saslUsername, password: config.saslPassword }
      : undefined;

  return new Kafka({
    clientId: CLIENT_ID,
    brokers: config.brokers,
    connectionTimeout: CONNECTION_TIMEOUT_MS,
    ssl: config.securityProtocol === 'SASL_SSL',
    sasl,
    logLevel: logLevel.WARN,
    logCreator: () => (entry) => forward(logger, entry),
  });
}

// The terminal UI owns stdout, so client diagnostics go to the log file.
function forward(logger: Logger, entry: LogEntry): void {
  const metadata = { namespace: entry.namespace, message: entry.log.message };
  if (entry.level === logLevel.ERROR || entry.level === logLevel.WARN) {
    logger.warn('kafka_client', metadata);
  } else {
    logger.debug('kafka_client', metadata);
  }
}

/**
 * Reject with BrokerTimeoutError when the operation outlives timeoutMs.
 */
export async function withTimeout<T>(operation: Promise<T>, timeoutMs: number, name: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new BrokerTimeoutError(name, timeoutMs)), timeoutMs);
  });

  try {
    return await Promise.race([operation, timeout]);
  } finally {
    clearTimeout(timer);
  }
}
