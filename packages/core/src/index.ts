/**
 * @probewire/core - Shared types, errors and wire codec for probewire
 *
 * This package has no side effects. Dependency direction:
 * core → transport → runtime → client
 */

export * from './constants.js';
export * from './errors.js';
export * from './logger.js';
export * from './schemas.js';
export * from './config.js';
export * from './types/index.js';
export { decodeReply, encodeCommand, quoteValue, tokenizeLine, type Atom } from './wire/codec.js';
export { checkSupportCommand, isFeatureSupported } from './wire/commands.js';
