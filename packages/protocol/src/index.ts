export { FrameCodec } from './frame-codec.js';
export type {
  SerializationFormat,
  NamespacedMessage,
  SplitResult,
  FrameCodecOptions,
} from './frame-codec.js';
export {
  HEADER_SIZE,
  FLAG_COMPRESSED,
  FLAG_FORMAT_MASK,
  FLAG_FORMAT_MSGPACK,
  FLAG_FORMAT_JSON,
  MAX_MESSAGE_SIZE,
} from './frame-codec.js';

export { toEnvelope, encodePlatoonMessage, parsePlatoonMessage } from './platoon-messages.js';
