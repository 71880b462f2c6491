export { ConfigUpdateSocketServer } from './config-update-socket.js';
export type { ConfigUpdateSocketOptions } from './config-update-socket.js';
export { acceptKey, decodeFrame, encodeFrame, encodeText, Opcode } from './frames.js';
export type { DecodedFrame } from './frames.js';
