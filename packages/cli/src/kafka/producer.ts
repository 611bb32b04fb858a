import type { ProducerGateway, PublishRequest } from '@avrodeck/engine';
import type { Kafka, Producer } from 'kafkajs';
import { withTimeout } from './connection.js';

/**
 * Publishes enveloped values, waiting for all in-sync replicas. The
 * connection is opened on first use and reused afterwards.
 */
export class KafkaProducer implements ProducerGateway {
  private connection: Promise<Producer> | null = null;

  constructor(private readonly kafka: Kafka) {}

  async publish(request: PublishRequest): Promise<void> {
    const send = async () => {
      const producer = await this.connect();
      await producer.send({
        topic: request.topic,
        acks: -1,
        messages: [{ key: request.key || null, value: request.value }],
      });
    };
    await withTimeout(send(), request.timeoutMs, `publish to ${request.topic}`);
  }

  async disconnect(): Promise<void> {
    const connection = this.connection;
    this.connection = null;
    if (connection) {
      await (await connection).disconnect();
    }
  }

  private connect(): Promise<Producer> {
    if (!this.connection) {
      const producer = this.kafka.producer({ allowAutoTopicCreation: false });
      const connecting = producer.connect().then(() => producer);
      // A failed connect is retried on the next publish
      connecting.catch(() => {
        if (this.connection === connecting) this.connection = null;
      });
      this.connection = connecting;
    }
    return this.connection;
  }
}
