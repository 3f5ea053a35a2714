/**
 * Session lifecycle for the dispatcher
 *
 * closed → opening → open → faulted → closed
 *
 * `opening` may also end in `faulted` or `closed`, and `open` in `closed`.
 * A session stays `opening` until the capability check has passed.
 */

import { type ProcessError, type Reply, StateError } from '@probewire/core';
import type { Channel } from '@probewire/transport';
import { createMutex, type Mutex } from './mutex.js';

/**
 * Completion slot for one outstanding request
 */
export type PendingRequest = {
  token: number;
  resolve: (reply: Reply) => void;
  reject: (error: unknown) => void;
};

/**
 * Everything owned by one open session
 */
export type ActiveSession = {
  channel: Channel;
  pending: Map<number, PendingRequest>;
  nextToken: number;
  writeLock: Mutex;
  reader: Promise<void>;
};

export type SessionState =
  | { kind: 'closed' }
  | { kind: 'opening'; session: ActiveSession }
  | { kind: 'open'; session: ActiveSession }
  | { kind: 'faulted'; session: ActiveSession; error: ProcessError };

export type SessionStateKind = SessionState['kind'];

const VALID_TRANSITIONS: Record<SessionStateKind, readonly SessionStateKind[]> = {
  closed: ['opening'],
  opening: ['open', 'faulted', 'closed'],
  open: ['faulted', 'closed'],
  faulted: ['closed']
};

export function canTransition(from: SessionStateKind, to: SessionStateKind): boolean {
  return VALID_TRANSITIONS[from].includes(to);
}

export function assertTransition(from: SessionStateKind, to: SessionStateKind): void {
  if (!canTransition(from, to)) {
    throw new StateError(`Invalid session transition: ${from} -> ${to}`);
  }
}

export function createActiveSession(channel: Channel): ActiveSession {
  return {
    channel,
    pending: new Map(),
    nextToken: 1,
    writeLock: createMutex(),
    reader: Promise.resolve()
  };
}
