/**
 * Process-based line channel for Node.js (stdio)
 */

import { type ChildProcess, spawn } from 'node:child_process';
import {
  buildCommandLine,
  createLogger,
  errorMessage,
  type Logger,
  ProcessError
} from '@probewire/core';
import { createLineBuffer } from './line-buffer.js';
import type { Channel, ChannelExit, ProcessChannelOptions } from './types.js';

const NEVER_RAN: ChannelExit = { code: null, signal: null };

/** How long output may trail the exit of the process itself */
export const EXIT_OUTPUT_GRACE_MS = 100;

/**
 * Line channel over the stdin/stdout pipes of a child process.
 *
 * Lines are queued as they arrive and handed to `readLine()` callers in
 * order. Output ends when stdout closes, the process fails, or shortly after
 * the process exits; lines already complete at that point are still
 * delivered before `null`.
 */
export class ProcessChannel implements Channel {
  readonly exited: Promise<ChannelExit>;

  private child?: ChildProcess;
  private readonly options: ProcessChannelOptions;
  private readonly logger: Logger;
  private readonly stdoutBuffer = createLineBuffer();
  private readonly stderrBuffer = createLineBuffer();
  private readonly lines: string[] = [];
  private readonly readers: Array<(line: string | null) => void> = [];
  private outputEnded = false;
  private exitStatus?: ChannelExit;
  private exitGraceTimer?: NodeJS.Timeout;
  private markExited: (exit: ChannelExit) => void = () => {};

  constructor(options: ProcessChannelOptions) {
    this.options = options;
    this.logger = options.logger ?? createLogger({ prefix: '[probewire]' }).child('channel');
    this.exited = new Promise<ChannelExit>((resolve) => {
      this.markExited = resolve;
    });
  }

  get running(): boolean {
    return this.child !== undefined && this.exitStatus === undefined;
  }

  async start(): Promise<void> {
    if (this.child) {
      throw new ProcessError('Channel already started');
    }

    const { command, args } = buildCommandLine(
      this.options.executable,
      this.options.commandPrefix
    );
    this.logger.debug({ command, args }, 'Launching probe process');

    const child = spawn(command, args, {
      env: { ...process.env, ...this.options.env },
      stdio: ['pipe', 'pipe', 'pipe']
    });
    this.child = child;

    child.stdout?.on('data', (chunk: Buffer) => {
      for (const line of this.stdoutBuffer.push(chunk)) {
        this.logger.trace({ line }, 'Received line');
        this.deliver(line);
      }
    });
    child.stdout?.on('end', () => this.endOutput());

    child.stderr?.on('data', (chunk: Buffer) => {
      for (const line of this.stderrBuffer.push(chunk)) {
        if (line.trim()) this.logger.warn(`stderr: ${line}`);
      }
    });

    // Write failures are reported through the write callback
    child.stdin?.on('error', (error) => {
      this.logger.debug(`stdin: ${error.message}`);
    });

    child.on('error', (error) => {
      this.logger.error(`Probe process error: ${error.message}`);
      this.recordExit(this.exitStatus ?? NEVER_RAN);
      this.endOutput();
    });

    child.on('exit', (code, signal) => {
      this.logger.info({ code, signal }, 'Probe process exited');
      this.recordExit({ code, signal });
      // A descendant can hold stdout open after the process itself is gone
      this.exitGraceTimer = setTimeout(() => this.endOutput(), EXIT_OUTPUT_GRACE_MS);
      this.exitGraceTimer.unref();
    });

    child.on('close', () => this.endOutput());

    try {
      await new Promise<void>((resolve, reject) => {
        const onSpawn = () => {
          child.off('error', onError);
          resolve();
        };
        const onError = (error: Error) => {
          child.off('spawn', onSpawn);
          reject(error);
        };
        child.once('spawn', onSpawn);
        child.once('error', onError);
      });
    } catch (error) {
      throw new ProcessError(`Failed to launch ${command}: ${errorMessage(error)}`, {
        cause: error
      });
    }

    this.logger.info({ pid: child.pid }, 'Probe process started');
  }

  async writeLine(text: string): Promise<void> {
    const stdin = this.child?.stdin;
    if (!stdin || !stdin.writable || this.exitStatus) {
      throw new ProcessError('Probe process is not accepting input');
    }

    this.logger.trace({ line: text }, 'Sending line');

    return new Promise((resolve, reject) => {
      stdin.write(`${text}\n`, (error) => {
        if (error) {
          reject(
            new ProcessError(`Write to probe process failed: ${error.message}`, { cause: error })
          );
        } else {
          resolve();
        }
      });
    });
  }

  readLine(): Promise<string | null> {
    const line = this.lines.shift();
    if (line !== undefined) return Promise.resolve(line);
    if (this.outputEnded) return Promise.resolve(null);

    return new Promise((resolve) => {
      this.readers.push(resolve);
    });
  }

  async stop(): Promise<void> {
    const child = this.child;
    if (!child) return;

    child.stdin?.end();
    if (this.exitStatus === undefined) {
      child.kill('SIGTERM');
    }
    await this.exited;
  }

  private deliver(line: string): void {
    const reader = this.readers.shift();
    if (reader) {
      reader(line);
    } else {
      this.lines.push(line);
    }
  }

  private recordExit(exit: ChannelExit): void {
    if (this.exitStatus) return;
    this.exitStatus = exit;
    this.markExited(exit);
  }

  private endOutput(): void {
    if (this.outputEnded) return;
    this.outputEnded = true;
    clearTimeout(this.exitGraceTimer);

    const tail = this.stdoutBuffer.drain();
    if (tail) {
      this.logger.debug({ tail }, 'Discarding unterminated output');
    }
    for (const reader of this.readers.splice(0)) {
      reader(null);
    }
  }
}
