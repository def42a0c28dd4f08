export { createMsgpackCodec } from './msgpack-codec.js';
export type { MsgpackCodecOptions } from './msgpack-codec.js';
