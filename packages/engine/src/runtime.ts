/**
 * Runtime
 *
 * Owns the session and the event queue. Events are processed one at a time
 * through `update`; the resulting commands run concurrently and report back
 * only by queueing their outcome events.
 */

import type { Logger } from '@avrodeck/logger';
import { executeCommand } from './dispatch/execute.js';
import { DEFAULT_ENGINE_OPTIONS, initialize, update } from './engine.js';
import { errorDetails } from './errors.js';
import type { Gateways } from './gateways.js';
import type { Command, EngineEvent, EngineOptions, Session } from './types.js';

export type RuntimeOptions = {
  gateways: Gateways;
  logger: Logger;
  engine?: EngineOptions;
  /** Called after every processed event with the new session */
  onChange?: (session: Session) => void;
};

export class Runtime {
  private readonly gateways: Gateways;
  private readonly logger: Logger;
  private readonly engine: EngineOptions;
  private readonly onChange?: (session: Session) => void;

  private session: Session;
  private readonly queue: EngineEvent[] = [];
  private draining = false;
  private started = false;
  private stopped = false;
  private readonly inflight = new Set<Promise<void>>();
  private readonly quit = deferred();

  constructor(options: RuntimeOptions) {
    this.gateways = options.gateways;
    this.logger = options.logger;
    this.engine = options.engine ?? DEFAULT_ENGINE_OPTIONS;
    this.onChange = options.onChange;
    this.session = initialize().session;
  }

  get state(): Session {
    return this.session;
  }

  /** Resolves when a quit command has been processed */
  get finished(): Promise<void> {
    return this.quit.promise;
  }

  get isStopped(): boolean {
    return this.stopped;
  }

  /**
   * Publish the initial session and start its commands.
   */
  async start(): Promise<void> {
    if (this.started) return;
    this.started = true;

    const { session, commands } = initialize();
    this.session = session;
    this.logger.info('runtime_started', { mode: session.mode.kind });
    this.notify();
    this.runAll(commands);
  }

  /**
   * Queue an event. Events queued while another is being processed wait
   * their turn.
   */
  dispatch(event: EngineEvent): void {
    if (this.stopped) return;
    this.queue.push(event);
    if (this.draining) return;

    this.draining = true;
    try {
      let next = this.queue.shift();
      while (next !== undefined && !this.stopped) {
        this.process(next);
        next = this.queue.shift();
      }
    } finally {
      this.draining = false;
    }
  }

  /**
   * Wait until no command is in flight and the queue is empty.
   */
  async idle(): Promise<void> {
    while (this.inflight.size > 0) {
      await Promise.all(this.inflight);
    }
  }

  /**
   * Stop accepting events and release the consumer the session holds.
   */
  async stop(): Promise<void> {
    if (!this.stopped) this.halt();

    const { mode } = this.session;
    if (mode.kind === 'consuming' && mode.handle !== null) {
      this.run({ type: 'CLOSE_CONSUMER', handle: mode.handle });
    }
    await this.idle();
    this.logger.info('runtime_stopped', { mode: mode.kind });
  }

  private process(event: EngineEvent): void {
    const transition = update(this.session, event, this.engine);
    if (transition.discarded !== undefined) {
      this.logger.debug('event_discarded', { event: event.type, reason: transition.discarded });
    }

    const previous = this.session.mode.kind;
    this.session = transition.session;
    if (previous !== this.session.mode.kind) {
      this.logger.debug('mode_changed', { from: previous, to: this.session.mode.kind, event: event.type });
    }

    this.notify();
    this.runAll(transition.commands);
  }

  private runAll(commands: Command[]): void {
    for (const command of commands) {
      this.run(command);
    }
  }

  private run(command: Command): void {
    if (command.type === 'QUIT') {
      this.logger.info('quit_requested', { mode: this.session.mode.kind });
      this.halt();
      return;
    }

    this.logger.debug('command_started', { command: command.type });
    const task: Promise<void> = executeCommand(command, { gateways: this.gateways, logger: this.logger })
      .then((event) => {
        if (event !== undefined) this.dispatch(event);
      })
      .catch((error: unknown) => {
        this.logger.error('event_processing_failed', { command: command.type, ...errorDetails(error) });
      })
      .finally(() => {
        this.inflight.delete(task);
      });
    this.inflight.add(task);
  }

  private halt(): void {
    this.stopped = true;
    this.queue.length = 0;
    this.quit.resolve();
  }

  private notify(): void {
    this.onChange?.(this.session);
  }
}

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((done) => {
    resolve = done;
  });
  return { promise, resolve };
}
