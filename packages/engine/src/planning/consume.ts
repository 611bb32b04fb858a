/**
 * Consume Planning
 *
 * Consuming owns one consumer handle. Every request carries the request id
 * of the Consuming session that issued it; results for any other id are
 * stale, and a stale open is answered by closing the handle it produced.
 */

import type {
  ConsumeResult,
  ConsumerHandle,
  ConsumingMode,
  EngineOptions,
  Key,
  Outcome,
  SchemaContext,
  Session,
  Transition,
} from '../types.js';
import { clamp, discard, matches, stay, toMode, withStatus } from './shared.js';

export function enterConsuming(session: Session, context: SchemaContext): Transition {
  const requestId = session.requestCounter + 1;
  const mode: ConsumingMode = {
    kind: 'consuming',
    context,
    requestId,
    handle: null,
    fetching: false,
    messages: [],
    index: 0,
  };
  const next = withStatus({ ...session, requestCounter: requestId }, 'info', `Opening consumer on ${context.topic}...`);
  return toMode(next, mode, [{ type: 'OPEN_CONSUMER', requestId, topic: context.topic }]);
}

export function handleConsumingKey(
  session: Session,
  mode: ConsumingMode,
  key: Key,
  options: EngineOptions,
): Transition {
  if (matches(key, 'escape')) {
    return toMode(
      withStatus(session, 'info', mode.context.subject),
      { kind: 'viewing', context: mode.context },
      mode.handle === null ? [] : [{ type: 'CLOSE_CONSUMER', handle: mode.handle }],
    );
  }

  if (matches(key, 'fetch')) {
    if (mode.handle === null || mode.fetching) return stay(session);
    const seconds = options.consumeTimeoutMs / 1000;
    return toMode(
      withStatus(session, 'info', `Fetching from ${mode.context.topic} (timeout ${seconds}s)...`),
      { ...mode, fetching: true },
      [
        {
          type: 'FETCH_MESSAGES',
          requestId: mode.requestId,
          handle: mode.handle,
          maxCount: options.consumeBatchSize,
          timeoutMs: options.consumeTimeoutMs,
          context: mode.context,
        },
      ],
    );
  }

  const last = Math.max(mode.messages.length - 1, 0);
  if (matches(key, 'down')) return toMode(session, { ...mode, index: clamp(mode.index + 1, 0, last) });
  if (matches(key, 'up')) return toMode(session, { ...mode, index: clamp(mode.index - 1, 0, last) });

  if (matches(key, 'copy')) {
    const message = mode.messages[mode.index];
    if (message === undefined) return stay(withStatus(session, 'error', 'No message to copy'));
    return { session, commands: [{ type: 'COPY', label: 'message', text: message.value }] };
  }

  return stay(session);
}

export function handleConsumerOpened(
  session: Session,
  requestId: number,
  result: Outcome<ConsumerHandle>,
): Transition {
  const { mode } = session;
  if (mode.kind !== 'consuming' || mode.requestId !== requestId || mode.handle !== null) {
    const reason = `consumer request ${requestId} is stale`;
    return result.ok
      ? { session, commands: [{ type: 'CLOSE_CONSUMER', handle: result.value }], discarded: reason }
      : discard(session, reason);
  }

  if (!result.ok) {
    return toMode(withStatus(session, 'error', `Cannot open consumer: ${result.error}`), {
      kind: 'viewing',
      context: mode.context,
    });
  }

  return toMode(
    withStatus(session, 'info', `Consumer ready on ${mode.context.topic}, press enter to fetch`),
    { ...mode, handle: result.value },
  );
}

export function handleMessagesFetched(session: Session, requestId: number, result: ConsumeResult): Transition {
  const { mode } = session;
  if (mode.kind !== 'consuming' || mode.requestId !== requestId || !mode.fetching) {
    return discard(session, `fetch for consumer request ${requestId} is stale`);
  }

  switch (result.kind) {
    case 'messages':
      return toMode(
        withStatus(session, 'success', `Fetched ${result.messages.length} messages from ${mode.context.topic}`),
        { ...mode, fetching: false, messages: result.messages, index: 0 },
      );
    case 'empty':
      return toMode(
        withStatus(session, 'info', `No messages available on ${mode.context.topic}`),
        { ...mode, fetching: false, messages: [], index: 0 },
      );
    case 'error':
      return toMode(withStatus(session, 'error', `Fetch failed: ${result.error}`), { ...mode, fetching: false });
  }
}
