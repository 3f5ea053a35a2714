/**
 * @probewire/transport - Line channel to the mtr-packet subprocess
 */

export type { Channel, ChannelExit, ChannelFactory, ProcessChannelOptions } from './types.js';
export { createLineBuffer, type LineBuffer } from './line-buffer.js';
export { ProcessChannel } from './process-channel.js';
