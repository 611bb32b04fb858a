import type { ConsumerGateway, ConsumerHandle, RawMessage } from '@avrodeck/engine';
import type { Consumer, Kafka, KafkaMessage } from 'kafkajs';
import { ulid } from 'ulid';

/** Buffered messages above which the partition fetchers are paused */
const BUFFER_HIGH_WATER = 100;

type Session = {
  topic: string;
  consumer: Consumer;
  buffer: RawMessage[];
  paused: boolean;
  failure: Error | null;
  /** Called whenever the buffer grows or the consumer crashes */
  notify: (() => void) | null;
};

/**
 * Reads topics from the beginning under a throwaway consumer group, one
 * group per open handle. Messages arrive in the background and wait in a
 * buffer until the next fetch takes them.
 */
export class KafkaConsumerGateway implements ConsumerGateway {
  private readonly sessions = new Map<string, Session>();

  constructor(private readonly kafka: Kafka) {}

  async open(topic: string): Promise<ConsumerHandle> {
    const id = ulid();
    const consumer = this.kafka.consumer({ groupId: `avrodeck-${id.toLowerCase()}` });
    const session: Session = { topic, consumer, buffer: [], paused: false, failure: null, notify: null };

    consumer.on(consumer.events.CRASH, (event) => {
      session.failure = event.payload.error;
      session.notify?.();
    });

    try {
      await consumer.connect();
      await consumer.subscribe({ topics: [topic], fromBeginning: true });
      await consumer.run({
        eachMessage: async ({ partition, message }) => {
          session.buffer.push(toRawMessage(partition, message));
          if (!session.paused && session.buffer.length >= BUFFER_HIGH_WATER) {
            consumer.pause([{ topic }]);
            session.paused = true;
          }
          session.notify?.();
        },
      });
    } catch (error) {
      await consumer.disconnect();
      throw error;
    }

    this.sessions.set(id, session);
    return { id, topic };
  }

  async fetch(handle: ConsumerHandle, maxCount: number, timeoutMs: number): Promise<RawMessage[]> {
    const session = this.sessions.get(handle.id);
    if (!session) {
      throw new Error(`consumer for ${handle.topic} is closed`);
    }

    await waitForMessages(session, maxCount, timeoutMs);

    if (session.buffer.length === 0 && session.failure) {
      throw session.failure;
    }

    const messages = session.buffer.splice(0, maxCount);
    if (session.paused && session.buffer.length < BUFFER_HIGH_WATER) {
      session.consumer.resume([{ topic: session.topic }]);
      session.paused = false;
    }
    return messages;
  }

  async close(handle: ConsumerHandle): Promise<void> {
    const session = this.sessions.get(handle.id);
    if (!session) return;
    this.sessions.delete(handle.id);
    await session.consumer.disconnect();
  }

  async closeAll(): Promise<void> {
    const handles = [...this.sessions.entries()].map(([id, session]) => ({ id, topic: session.topic }));
    await Promise.all(handles.map((handle) => this.close(handle)));
  }
}

function waitForMessages(session: Session, count: number, timeoutMs: number): Promise<void> {
  if (session.buffer.length >= count || session.failure) {
    return Promise.resolve();
  }

  return new Promise((resolve) => {
    const done = () => {
      clearTimeout(timer);
      session.notify = null;
      resolve();
    };
    const timer = setTimeout(done, timeoutMs);
    session.notify = () => {
      if (session.buffer.length >= count || session.failure) done();
    };
  });
}

function toRawMessage(partition: number, message: KafkaMessage): RawMessage {
  return {
    key: message.key ?? null,
    value: message.value ?? null,
    partition,
    offset: message.offset,
    timestamp: message.timestamp,
  };
}
