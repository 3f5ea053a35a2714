/**
 * In-process stand-in for the mtr-packet subprocess
 *
 * Commands written to the channel are decoded with the real codec and
 * answered through a scripted handler. Replies can be held back and then
 * released in any order, and the "process" can be made to exit at will.
 */

import {
  type ArgumentValue,
  decodeReply,
  encodeCommand,
  ProcessError,
  REPLY_KEYWORD,
  VERB,
  type WireSyntax
} from '@probewire/core';
import type { Channel, ChannelExit } from '@probewire/transport';

/**
 * A command as the fake process received it
 */
export type ReceivedCommand = {
  token: number;
  verb: string;
  fields: ReadonlyMap<string, string>;
  line: string;
};

export type FakeReply = {
  keyword: string;
  fields?: Record<string, ArgumentValue>;
};

/**
 * Decide the answer to a command; undefined leaves it unanswered
 */
export type FakeHandler = (command: ReceivedCommand) => FakeReply | undefined;

export type FakeMtrPacketOptions = {
  syntax?: WireSyntax;
  /** Answers `send-probe` and any verb other than `check-support` */
  handler?: FakeHandler;
  /** Features reported as supported; defaults to `send-probe` */
  features?: readonly string[];
  /** Make `start()` fail with this error */
  startError?: Error;
  /** Make every write fail */
  failWrites?: boolean;
};

export type ReleaseOrder = (lines: readonly string[]) => readonly string[];

export class FakeMtrPacket implements Channel {
  readonly exited: Promise<ChannelExit>;
  readonly received: ReceivedCommand[] = [];

  /** Queue replies instead of emitting them until `releaseHeld()` */
  holdReplies = false;

  private readonly syntax: WireSyntax;
  private readonly handler: FakeHandler;
  private readonly features: ReadonlySet<string>;
  private readonly options: FakeMtrPacketOptions;
  private readonly lines: string[] = [];
  private readonly readers: Array<(line: string | null) => void> = [];
  private readonly held: string[] = [];
  private started = false;
  private exitStatus?: ChannelExit;
  private markExited: (exit: ChannelExit) => void = () => {};

  constructor(options: FakeMtrPacketOptions = {}) {
    this.options = options;
    this.syntax = options.syntax ?? 'assign';
    this.handler = options.handler ?? (() => undefined);
    this.features = new Set(options.features ?? [VERB.sendProbe]);
    this.exited = new Promise<ChannelExit>((resolve) => {
      this.markExited = resolve;
    });
  }

  get running(): boolean {
    return this.started && this.exitStatus === undefined;
  }

  /** Number of replies waiting for `releaseHeld()` */
  get heldCount(): number {
    return this.held.length;
  }

  /** Commands other than the capability check */
  get probes(): ReceivedCommand[] {
    return this.received.filter((command) => command.verb !== VERB.checkSupport);
  }

  async start(): Promise<void> {
    if (this.options.startError) {
      this.finish({ code: null, signal: null });
      throw new ProcessError(`Failed to launch mtr-packet: ${this.options.startError.message}`, {
        cause: this.options.startError
      });
    }
    if (this.started) {
      throw new ProcessError('Channel already started');
    }
    this.started = true;
  }

  async writeLine(text: string): Promise<void> {
    if (!this.running) {
      throw new ProcessError('Probe process is not accepting input');
    }
    if (this.options.failWrites) {
      throw new ProcessError('Write to probe process failed: write EPIPE');
    }

    const parsed = decodeReply(text, this.syntax);
    const command: ReceivedCommand = {
      token: parsed.token,
      verb: parsed.keyword,
      fields: parsed.fields,
      line: text
    };
    this.received.push(command);

    const answer = this.answer(command);
    if (answer) {
      this.reply(command.token, answer);
    }
  }

  readLine(): Promise<string | null> {
    const line = this.lines.shift();
    if (line !== undefined) return Promise.resolve(line);
    if (this.exitStatus) return Promise.resolve(null);

    return new Promise((resolve) => {
      this.readers.push(resolve);
    });
  }

  async stop(): Promise<void> {
    this.finish({ code: null, signal: 'SIGTERM' });
    await this.exited;
  }

  /**
   * Answer a token, honouring `holdReplies`
   */
  reply(token: number, answer: FakeReply): void {
    const args = Object.entries(answer.fields ?? {});
    const line = encodeCommand(token, { verb: answer.keyword, args }, this.syntax);
    if (this.holdReplies) {
      this.held.push(line);
    } else {
      this.emitLine(line);
    }
  }

  /**
   * Emit held replies, in arrival order unless reordered
   */
  releaseHeld(order: ReleaseOrder = (lines) => lines): void {
    const lines = order(this.held.splice(0));
    for (const line of lines) {
      this.emitLine(line);
    }
  }

  /**
   * Put a raw line on the output as if the process printed it
   */
  emitLine(line: string): void {
    if (this.exitStatus) return;
    const reader = this.readers.shift();
    if (reader) {
      reader(line);
    } else {
      this.lines.push(line);
    }
  }

  /**
   * Simulate the process dying
   */
  exit(code: number | null = 1, signal: NodeJS.Signals | null = null): void {
    this.finish({ code, signal });
  }

  private answer(command: ReceivedCommand): FakeReply | undefined {
    if (command.verb !== VERB.checkSupport) {
      return this.handler(command);
    }
    const feature = command.fields.get('feature') ?? '';
    return {
      keyword: REPLY_KEYWORD.featureSupport,
      fields: { support: this.features.has(feature) ? 'ok' : 'no' }
    };
  }

  private finish(exit: ChannelExit): void {
    if (this.exitStatus) return;
    this.exitStatus = exit;
    this.markExited(exit);
    for (const reader of this.readers.splice(0)) {
      reader(null);
    }
  }
}

/**
 * Reorder lines with a seeded Fisher-Yates shuffle
 */
export function seededShuffle(seed: number): ReleaseOrder {
  return (lines) => {
    const shuffled = [...lines];
    let state = seed >>> 0 || 1;
    const next = () => {
      // xorshift32
      state ^= state << 13;
      state ^= state >>> 17;
      state ^= state << 5;
      return (state >>> 0) / 0x100000000;
    };
    for (let i = shuffled.length - 1; i > 0; i--) {
      const j = Math.floor(next() * (i + 1));
      const a = shuffled[i];
      const b = shuffled[j];
      if (a === undefined || b === undefined) continue;
      shuffled[i] = b;
      shuffled[j] = a;
    }
    return shuffled;
  };
}
