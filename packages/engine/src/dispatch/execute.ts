/**
 * Command Dispatch - Execute
 *
 * Runs one command through the gateways and converts the result into the
 * outcome event the engine expects. Failures never escape: they become
 * `{ ok: false }` outcomes and a warn log line.
 */

import type { Logger } from '@avrodeck/logger';
import { errorDetails, errorMessage } from '../errors.js';
import type { Gateways } from '../gateways.js';
import type { Command, EngineEvent, Outcome } from '../types.js';
import { decodeMessages } from './decode.js';

export type ExecuteContext = {
  gateways: Gateways;
  logger: Logger;
};

type RunnableCommand = Exclude<Command, { type: 'QUIT' }>;

/**
 * Execute a command. Resolves with the outcome event, or undefined for
 * fire-and-forget commands. Never rejects.
 */
export async function executeCommand(command: RunnableCommand, ctx: ExecuteContext): Promise<EngineEvent | undefined> {
  const { gateways } = ctx;

  switch (command.type) {
    case 'LOAD_SUBJECTS':
      return {
        type: 'SUBJECTS_LOADED',
        result: await attempt(ctx, command, () => gateways.registry.listSubjects()),
      };

    case 'LOAD_SCHEMA':
      return {
        type: 'SCHEMA_LOADED',
        subject: command.subject,
        result: await attempt(ctx, command, () => gateways.registry.getLatestSchema(command.subject)),
      };

    case 'PUBLISH': {
      const { topic, key, value, timeoutMs } = command;
      return {
        type: 'PUBLISHED',
        subject: command.subject,
        schemaId: command.schemaId,
        result: await attempt(ctx, command, async () => {
          await gateways.producer.publish({ topic, key, value, timeoutMs });
          return { topic };
        }),
      };
    }

    case 'OPEN_CONSUMER':
      return {
        type: 'CONSUMER_OPENED',
        requestId: command.requestId,
        result: await attempt(ctx, command, () => gateways.consumer.open(command.topic)),
      };

    case 'FETCH_MESSAGES': {
      const { handle, maxCount, timeoutMs, context } = command;
      const result = await attempt(ctx, command, async () => {
        const raw = await gateways.consumer.fetch(handle, maxCount, timeoutMs);
        return decodeMessages(raw, context, gateways.registry);
      });
      return {
        type: 'MESSAGES_FETCHED',
        requestId: command.requestId,
        result: !result.ok
          ? { kind: 'error', error: result.error }
          : result.value.length === 0
            ? { kind: 'empty' }
            : { kind: 'messages', messages: result.value },
      };
    }

    case 'CLOSE_CONSUMER':
      await attempt(ctx, command, () => gateways.consumer.close(command.handle));
      return undefined;

    case 'SAVE_DRAFT': {
      const { topic, schemaId, payload, name } = command;
      return {
        type: 'DRAFT_SAVED',
        result: await attempt(ctx, command, () => gateways.drafts.save({ topic, schemaId, payload, name })),
      };
    }

    case 'LIST_DRAFTS':
      return {
        type: 'DRAFTS_LISTED',
        result: await attempt(ctx, command, () => gateways.drafts.list(command.topic)),
      };

    case 'LOAD_DRAFT':
      return {
        type: 'DRAFT_LOADED',
        result: await attempt(ctx, command, () => gateways.drafts.load(command.path)),
      };

    case 'OPEN_EDITOR':
      return {
        type: 'EDITOR_CLOSED',
        result: await attempt(ctx, command, () => gateways.editor.open(command.text)),
      };

    case 'COPY':
      return {
        type: 'COPIED',
        label: command.label,
        result: await attempt(ctx, command, async () => {
          await gateways.clipboard.write(command.text);
          return null;
        }),
      };
  }
}

async function attempt<T>(ctx: ExecuteContext, command: RunnableCommand, run: () => Promise<T>): Promise<Outcome<T>> {
  try {
    return { ok: true, value: await run() };
  } catch (error) {
    ctx.logger.warn('command_failed', { command: command.type, ...errorDetails(error) });
    return { ok: false, error: errorMessage(error) };
  }
}
