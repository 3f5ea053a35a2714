/**
 * Channel types shared by the process channel and its test doubles
 */

import type { Logger } from '@probewire/core';

/**
 * How the process ended. Both fields are null when it never launched.
 */
export type ChannelExit = {
  code: number | null;
  signal: NodeJS.Signals | null;
};

/**
 * Duplex line channel to the probe process
 */
export type Channel = {
  /**
   * Launch the process and wire its pipes
   */
  start(): Promise<void>;

  /**
   * Write one line; the terminator is appended
   */
  writeLine(text: string): Promise<void>;

  /**
   * Next complete line, or null once output has ended
   */
  readLine(): Promise<string | null>;

  /**
   * Settles when the process has exited or failed to launch
   */
  readonly exited: Promise<ChannelExit>;

  /**
   * Terminate the process and release its pipes
   */
  stop(): Promise<void>;
};

export type ChannelFactory = () => Channel;

/**
 * Process channel options (Node.js)
 */
export type ProcessChannelOptions = {
  executable: string;
  commandPrefix?: readonly string[];
  env?: Record<string, string>;
  logger?: Logger;
};
