/**
 * @probewire/runtime - Request dispatching and hostname resolution
 */

export { Dispatcher, type DispatcherOptions, type SubmitOptions } from './dispatcher.js';
export { createMutex, type Mutex } from './mutex.js';
export {
  literalIpVersion,
  type LookupFn,
  ResolutionCache,
  systemLookup
} from './resolution-cache.js';
export {
  type ActiveSession,
  assertTransition,
  canTransition,
  type PendingRequest,
  type SessionState,
  type SessionStateKind
} from './session-state.js';
