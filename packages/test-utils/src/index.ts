export {
  FakeMtrPacket,
  type FakeHandler,
  type FakeMtrPacketOptions,
  type FakeReply,
  type ReceivedCommand,
  type ReleaseOrder,
  seededShuffle
} from './fake-mtr-packet.js';
export { delay, waitFor } from './wait-for.js';
export type { WaitForOptions } from './types.js';
