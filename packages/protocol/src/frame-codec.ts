/**
 * FrameCodec - wire format shared by the relay and every peer.
 *
 * Length-prefixed framing with MessagePack (default) or JSON payloads.
 *
 * Wire Format:
 * ┌────────────────┬───────┬─────────────────────────────────┐
 * │ Length (4 bytes│ Flags │        Payload (N bytes)        │
 * │  big-endian)   │(1 byte│       (MessagePack or JSON)     │
 * └────────────────┴───────┴─────────────────────────────────┘
 *
 * Flags byte:
 *   bit 0: compressed (never set here; such frames are rejected)
 *   bit 1-2: serialization format
 *            00 = MessagePack (default)
 *            01 = JSON (debug mode)
 *            1x = reserved
 *   bit 3-7: reserved
 *
 * The relay only ever looks at the length prefix: it splits the byte
 * stream into whole frames and forwards them untouched.
 */

import { encode, decode } from '@msgpack/msgpack';
import { ProtocolError } from '@convoy/types';

// ═══════════════════════════════════════════════════════════════════════════
// CONSTANTS
// ═══════════════════════════════════════════════════════════════════════════

/** Header size: 4 bytes length + 1 byte flags */
export const HEADER_SIZE = 5;

export const FLAG_COMPRESSED = 0x01;
export const FLAG_FORMAT_MASK = 0x06;
export const FLAG_FORMAT_MSGPACK = 0x00;
export const FLAG_FORMAT_JSON = 0x02;

/** Maximum payload size (1 MB). Vehicle states are a few hundred bytes. */
export const MAX_MESSAGE_SIZE = 1024 * 1024;

// ═══════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════

export type SerializationFormat = 'msgpack' | 'json';

export interface NamespacedMessage<T = unknown> {
  namespace: string;
  type: string;
  payload?: T;
  timestamp?: number;
}

export interface SplitResult {
  /** Complete frames, header included, in stream order */
  frames: Buffer[];
  /** Bytes of a trailing partial frame */
  remaining: Buffer;
}

export interface FrameCodecOptions {
  defaultFormat?: SerializationFormat;
}

// ═══════════════════════════════════════════════════════════════════════════
// FRAME CODEC CLASS
// ═══════════════════════════════════════════════════════════════════════════

export class FrameCodec {
  private readonly defaultFormat: SerializationFormat;

  constructor(options?: FrameCodecOptions) {
    this.defaultFormat = options?.defaultFormat ?? 'msgpack';
  }

  get format(): SerializationFormat {
    return this.defaultFormat;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // ENCODING
  // ─────────────────────────────────────────────────────────────────────────

  encode<T>(message: NamespacedMessage<T>, format?: SerializationFormat): Buffer {
    const useFormat = format ?? this.defaultFormat;
    const payload =
      useFormat === 'msgpack'
        ? Buffer.from(encode(message, { ignoreUndefined: true }))
        : Buffer.from(JSON.stringify(message), 'utf-8');

    if (payload.length > MAX_MESSAGE_SIZE) {
      throw new ProtocolError(`Message too large: ${payload.length} bytes (max: ${MAX_MESSAGE_SIZE})`);
    }

    const frame = Buffer.alloc(HEADER_SIZE + payload.length);
    frame.writeUInt32BE(payload.length, 0);
    frame.writeUInt8(useFormat === 'msgpack' ? FLAG_FORMAT_MSGPACK : FLAG_FORMAT_JSON, 4);
    payload.copy(frame, HEADER_SIZE);
    return frame;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // FRAMING
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Length of the frame at the start of `buffer`, or null if the header
   * has not fully arrived yet.
   */
  frameLength(buffer: Buffer): number | null {
    if (buffer.length < HEADER_SIZE) {
      return null;
    }
    const payloadLength = buffer.readUInt32BE(0);
    if (payloadLength > MAX_MESSAGE_SIZE) {
      throw new ProtocolError(`Message too large: ${payloadLength} bytes (max: ${MAX_MESSAGE_SIZE})`);
    }
    return HEADER_SIZE + payloadLength;
  }

  /**
   * Cut a byte stream into whole frames without decoding them.
   * Throws ProtocolError if a header announces an oversized frame, after
   * which the stream cannot be resynchronized.
   */
  splitFrames(buffer: Buffer): SplitResult {
    const frames: Buffer[] = [];
    let offset = 0;

    while (offset < buffer.length) {
      const length = this.frameLength(buffer.subarray(offset));
      if (length === null || offset + length > buffer.length) {
        break;
      }
      frames.push(buffer.subarray(offset, offset + length));
      offset += length;
    }

    return { frames, remaining: buffer.subarray(offset) };
  }

  // ─────────────────────────────────────────────────────────────────────────
  // DECODING
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Decode one complete frame as produced by splitFrames().
   */
  decodeFrame(frame: Buffer): NamespacedMessage {
    const flags = frame.readUInt8(4);
    const payload = frame.subarray(HEADER_SIZE);
    const format = flags & FLAG_FORMAT_MASK;
    let parsed: unknown;

    if ((flags & FLAG_COMPRESSED) === FLAG_COMPRESSED) {
      throw new ProtocolError('Compressed frames are not supported');
    }

    if (format === FLAG_FORMAT_MSGPACK) {
      parsed = this.parse(() => decode(payload));
    } else if (format === FLAG_FORMAT_JSON) {
      parsed = this.parse(() => JSON.parse(payload.toString('utf-8')));
    } else {
      throw new ProtocolError(`Unknown format flag: ${format}`);
    }

    if (!isNamespacedMessage(parsed)) {
      throw new ProtocolError('Invalid message format: missing namespace or type');
    }
    return parsed;
  }

  private parse(read: () => unknown): unknown {
    try {
      return read();
    } catch (err) {
      throw new ProtocolError('Undecodable frame payload', { cause: err });
    }
  }
}

function isNamespacedMessage(value: unknown): value is NamespacedMessage {
  return (
    typeof value === 'object' &&
    value !== null &&
    'namespace' in value &&
    typeof value.namespace === 'string' &&
    'type' in value &&
    typeof value.type === 'string'
  );
}
