/**
 * Request dispatcher for the mtr-packet process
 *
 * Many callers share one channel. Each request gets a token that is unique
 * for the session; the single reader task routes every reply back to the
 * request carrying the same token, in whatever order replies arrive.
 */

import {
  checkSupportCommand,
  type Command,
  createLogger,
  decodeReply,
  encodeCommand,
  errorMessage,
  isFeatureSupported,
  type Logger,
  ProcessError,
  type Reply,
  REQUIRED_FEATURE,
  StateError,
  type WireSyntax
} from '@probewire/core';
import type { ChannelFactory } from '@probewire/transport';
import {
  type ActiveSession,
  assertTransition,
  createActiveSession,
  type SessionState,
  type SessionStateKind
} from './session-state.js';

export type DispatcherOptions = {
  channelFactory: ChannelFactory;
  syntax?: WireSyntax;
  logger?: Logger;
};

export type SubmitOptions = {
  /** Abandon the request; a reply arriving later is discarded */
  signal?: AbortSignal;
};

export class Dispatcher {
  private state: SessionState = { kind: 'closed' };
  private readonly channelFactory: ChannelFactory;
  private readonly syntax: WireSyntax;
  private readonly logger: Logger;

  constructor(options: DispatcherOptions) {
    this.channelFactory = options.channelFactory;
    this.syntax = options.syntax ?? 'assign';
    this.logger = options.logger ?? createLogger({ prefix: '[probewire]' }).child('dispatcher');
  }

  get stateKind(): SessionStateKind {
    return this.state.kind;
  }

  get pendingCount(): number {
    return this.state.kind === 'closed' ? 0 : this.state.session.pending.size;
  }

  /**
   * Launch the process and verify it can send probes
   */
  async open(): Promise<void> {
    if (this.state.kind !== 'closed') {
      throw new StateError(`Cannot open a session that is ${this.state.kind}`);
    }

    const session = createActiveSession(this.channelFactory());
    this.transition({ kind: 'opening', session });
    await this.establish(session);
  }

  /**
   * Send a command and wait for the reply carrying its token
   */
  async submit(command: Command, options: SubmitOptions = {}): Promise<Reply> {
    const { state } = this;
    if (state.kind !== 'open') {
      throw new StateError(`Cannot submit while the session is ${state.kind}`);
    }
    return this.request(state.session, command, options.signal);
  }

  /**
   * Stop the process and fail anything still waiting
   */
  async close(): Promise<void> {
    const { state } = this;
    if (state.kind === 'closed') return;
    await this.shutdown(state.session);
  }

  private async establish(session: ActiveSession): Promise<void> {
    const isCurrent = () => this.state.kind === 'opening' && this.state.session === session;

    try {
      await session.channel.start();
    } catch (error) {
      if (isCurrent()) this.transition({ kind: 'closed' });
      throw error instanceof ProcessError
        ? error
        : new ProcessError(`Failed to start probe process: ${errorMessage(error)}`, {
            cause: error
          });
    }

    if (!isCurrent()) {
      // close() ran while the process was launching
      await session.channel.stop();
      throw new ProcessError('Session closed while opening');
    }

    session.reader = this.readLoop(session);

    let supported: boolean;
    try {
      const reply = await this.request(session, checkSupportCommand(REQUIRED_FEATURE));
      supported = isFeatureSupported(reply);
    } catch (error) {
      await this.shutdown(session);
      throw error instanceof ProcessError
        ? error
        : new ProcessError(`Capability check failed: ${errorMessage(error)}`, { cause: error });
    }

    if (!supported) {
      await this.shutdown(session);
      throw new ProcessError(`Probe process does not support ${REQUIRED_FEATURE}`);
    }
    if (!isCurrent()) {
      throw new ProcessError('Session closed while opening');
    }

    this.transition({ kind: 'open', session });
    this.logger.info('Session open');
  }

  private request(
    session: ActiveSession,
    command: Command,
    signal?: AbortSignal
  ): Promise<Reply> {
    if (signal?.aborted) {
      return Promise.reject(signal.reason);
    }

    const token = session.nextToken;
    const line = encodeCommand(token, command, this.syntax);
    session.nextToken += 1;

    // Registration completes before any await, so the reader can never
    // observe a half-registered request.
    const reply = new Promise<Reply>((resolve, reject) => {
      const onAbort = () => {
        if (session.pending.delete(token)) {
          this.logger.debug({ token }, 'Request abandoned');
          reject(signal?.reason);
        }
      };

      session.pending.set(token, {
        token,
        resolve: (value) => {
          signal?.removeEventListener('abort', onAbort);
          resolve(value);
        },
        reject: (error) => {
          signal?.removeEventListener('abort', onAbort);
          reject(error);
        }
      });
      signal?.addEventListener('abort', onAbort, { once: true });
    });

    void this.write(session, token, line);

    return reply;
  }

  private async write(session: ActiveSession, token: number, line: string): Promise<void> {
    try {
      await session.writeLock.runExclusive(async () => {
        // Skip requests abandoned while queued for the lock
        if (!session.pending.has(token)) return;
        await session.channel.writeLine(line);
      });
    } catch (error) {
      this.fault(
        session,
        error instanceof ProcessError
          ? error
          : new ProcessError(`Write to probe process failed: ${errorMessage(error)}`, {
              cause: error
            })
      );
    }
  }

  private async readLoop(session: ActiveSession): Promise<void> {
    for (;;) {
      let line: string | null;
      try {
        line = await session.channel.readLine();
      } catch (error) {
        this.fault(
          session,
          new ProcessError(`Reading from probe process failed: ${errorMessage(error)}`, {
            cause: error
          })
        );
        return;
      }

      if (line === null) {
        this.fault(session, new ProcessError('Probe process exited unexpectedly'));
        return;
      }
      if (!line.trim()) continue;

      let reply: Reply;
      try {
        reply = decodeReply(line, this.syntax);
      } catch (error) {
        // Framing cannot be recovered mid-stream
        this.fault(
          session,
          new ProcessError(`Malformed reply from probe process: ${errorMessage(error)}`, {
            cause: error
          })
        );
        return;
      }

      this.route(session, reply);
    }
  }

  private route(session: ActiveSession, reply: Reply): void {
    const pending = session.pending.get(reply.token);
    if (!pending) {
      this.logger.debug({ token: reply.token }, 'Discarding reply for unknown token');
      return;
    }
    session.pending.delete(reply.token);
    pending.resolve(reply);
  }

  private fault(session: ActiveSession, error: ProcessError): void {
    const { state } = this;
    if (state.kind === 'closed' || state.kind === 'faulted') return;
    if (state.session !== session) return;

    this.logger.error(`Session faulted: ${error.message}`);
    this.transition({ kind: 'faulted', session, error });
    this.rejectAll(session, error);
  }

  private async shutdown(session: ActiveSession): Promise<void> {
    const { state } = this;
    if (state.kind === 'closed' || state.session !== session) return;

    this.transition({ kind: 'closed' });
    this.rejectAll(session, new StateError('Session closed before a reply arrived'));

    try {
      await session.channel.stop();
    } catch (error) {
      this.logger.warn(`Failed to stop probe process: ${errorMessage(error)}`);
    }
    await session.reader;
    this.logger.info('Session closed');
  }

  private rejectAll(session: ActiveSession, error: unknown): void {
    const pending = [...session.pending.values()];
    session.pending.clear();
    for (const request of pending) {
      request.reject(error);
    }
  }

  private transition(next: SessionState): void {
    assertTransition(this.state.kind, next.kind);
    this.state = next;
  }
}
