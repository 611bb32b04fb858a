/**
 * Unit tests for Consuming: consumer lifecycle, fetches and stale results.
 */

import { describe, expect, it } from 'vitest';
import { update } from '../src/engine.js';
import type { ConsumedMessage } from '../src/types.js';
import { HANDLE, consumingSession, feed, modeOf, press, viewingSession } from './fixtures.js';

function createMessage(offset: number): ConsumedMessage {
  return {
    key: null,
    value: `{"id": ${offset}}`,
    partition: 0,
    offset: String(offset),
    timestamp: '1767225600000',
    schemaId: 42,
  };
}

function fetchingSession() {
  return press(consumingSession(), 'f').session;
}

describe('entering Consuming', () => {
  it('opens a consumer tagged with a new request id', () => {
    const { session, commands } = press(viewingSession(), 'c');
    const mode = modeOf(session, 'consuming');

    expect(commands).toEqual([{ type: 'OPEN_CONSUMER', requestId: 1, topic: 'orders' }]);
    expect(mode.requestId).toBe(1);
    expect(mode.handle).toBeNull();
    expect(session.requestCounter).toBe(1);
  });

  it('does not fetch before the consumer is open', () => {
    expect(press(viewingSession(), 'c', 'f', 'enter').commands).toEqual([
      { type: 'OPEN_CONSUMER', requestId: 1, topic: 'orders' },
    ]);
  });

  it('returns to Viewing when the consumer cannot be opened', () => {
    const opening = press(viewingSession(), 'c').session;

    const { session, commands } = feed(opening, {
      type: 'CONSUMER_OPENED',
      requestId: 1,
      result: { ok: false, error: 'Kafka not configured' },
    });

    expect(commands).toEqual([]);
    expect(session.mode.kind).toBe('viewing');
    expect(session.status).toEqual({ level: 'error', text: 'Cannot open consumer: Kafka not configured' });
  });
});

describe('fetching', () => {
  it('fetches a batch of ten with a five second timeout', () => {
    const { session, commands } = press(consumingSession(), 'f');

    expect(modeOf(session, 'consuming').fetching).toBe(true);
    expect(commands).toEqual([
      {
        type: 'FETCH_MESSAGES',
        requestId: 1,
        handle: HANDLE,
        maxCount: 10,
        timeoutMs: 5000,
        context: modeOf(session, 'consuming').context,
      },
    ]);
    expect(session.status).toEqual({ level: 'info', text: 'Fetching from orders (timeout 5s)...' });
  });

  it('allows one outstanding fetch', () => {
    expect(press(fetchingSession(), 'enter', 'f').commands).toEqual([]);
  });

  it('replaces the buffer with the fetched messages', () => {
    const messages = [createMessage(1), createMessage(2), createMessage(3)];

    const { session } = feed(fetchingSession(), {
      type: 'MESSAGES_FETCHED',
      requestId: 1,
      result: { kind: 'messages', messages },
    });
    const mode = modeOf(session, 'consuming');

    expect(mode.messages).toEqual(messages);
    expect(mode.fetching).toBe(false);
    expect(session.status).toEqual({ level: 'success', text: 'Fetched 3 messages from orders' });
  });

  it('empties the buffer when nothing arrived', () => {
    let session = feed(fetchingSession(), {
      type: 'MESSAGES_FETCHED',
      requestId: 1,
      result: { kind: 'messages', messages: [createMessage(1)] },
    }).session;
    session = press(session, 'f').session;

    session = feed(session, { type: 'MESSAGES_FETCHED', requestId: 1, result: { kind: 'empty' } }).session;

    expect(modeOf(session, 'consuming').messages).toEqual([]);
    expect(session.status).toEqual({ level: 'info', text: 'No messages available on orders' });
  });

  it('keeps the buffer when a fetch fails', () => {
    let session = feed(fetchingSession(), {
      type: 'MESSAGES_FETCHED',
      requestId: 1,
      result: { kind: 'messages', messages: [createMessage(1)] },
    }).session;
    session = press(session, 'f').session;

    session = feed(session, { type: 'MESSAGES_FETCHED', requestId: 1, result: { kind: 'error', error: 'timeout' } })
      .session;

    expect(modeOf(session, 'consuming').messages).toHaveLength(1);
    expect(modeOf(session, 'consuming').fetching).toBe(false);
    expect(session.status).toEqual({ level: 'error', text: 'Fetch failed: timeout' });
  });
});

describe('navigating messages', () => {
  const loaded = () =>
    feed(fetchingSession(), {
      type: 'MESSAGES_FETCHED',
      requestId: 1,
      result: { kind: 'messages', messages: [createMessage(1), createMessage(2), createMessage(3)] },
    }).session;

  it('moves between messages with j and k', () => {
    expect(modeOf(press(loaded(), 'j', 'j', 'j', 'j').session, 'consuming').index).toBe(2);
    expect(modeOf(press(loaded(), 'j', 'k', 'up').session, 'consuming').index).toBe(0);
  });

  it('copies the current message value', () => {
    expect(press(loaded(), 'down', 'y').commands).toEqual([{ type: 'COPY', label: 'message', text: '{"id": 2}' }]);
  });

  it('ignores quit and search keys', () => {
    const session = loaded();

    expect(press(session, 'q', '/', 'e').session).toBe(session);
  });
});

describe('leaving Consuming', () => {
  it('closes the consumer on escape', () => {
    const { session, commands } = press(consumingSession(), 'escape');

    expect(session.mode.kind).toBe('viewing');
    expect(commands).toEqual([{ type: 'CLOSE_CONSUMER', handle: HANDLE }]);
  });

  it('closes a consumer that opens after leaving', () => {
    const left = press(viewingSession(), 'c', 'escape');
    expect(left.commands).toEqual([{ type: 'OPEN_CONSUMER', requestId: 1, topic: 'orders' }]);

    const transition = update(left.session, {
      type: 'CONSUMER_OPENED',
      requestId: 1,
      result: { ok: true, value: HANDLE },
    });

    expect(transition.session).toBe(left.session);
    expect(transition.commands).toEqual([{ type: 'CLOSE_CONSUMER', handle: HANDLE }]);
    expect(transition.discarded).toBe('consumer request 1 is stale');
  });

  it('discards fetch results from an earlier Consuming session', () => {
    let session = press(fetchingSession(), 'escape', 'c').session;
    expect(modeOf(session, 'consuming').requestId).toBe(2);

    session = feed(session, {
      type: 'CONSUMER_OPENED',
      requestId: 2,
      result: { ok: true, value: { id: 'consumer-2', topic: 'orders' } },
    }).session;
    const transition = update(session, {
      type: 'MESSAGES_FETCHED',
      requestId: 1,
      result: { kind: 'messages', messages: [createMessage(1)] },
    });

    expect(transition.session).toBe(session);
    expect(modeOf(transition.session, 'consuming').messages).toEqual([]);
  });
});
