import {
  PLATOON_NAMESPACE,
  PlatoonMessageSchema,
  ProtocolError,
  type PlatoonMessage,
} from '@convoy/types';
import type { FrameCodec, NamespacedMessage } from './frame-codec.js';

/**
 * Wrap a platoon message in the namespaced envelope that goes on the wire.
 */
export function toEnvelope(
  message: PlatoonMessage,
  timestamp: number = Date.now()
): NamespacedMessage<PlatoonMessage['payload']> {
  return {
    namespace: PLATOON_NAMESPACE,
    type: message.type,
    payload: message.payload,
    timestamp,
  };
}

export function encodePlatoonMessage(
  codec: FrameCodec,
  message: PlatoonMessage,
  timestamp?: number
): Buffer {
  return codec.encode(toEnvelope(message, timestamp));
}

/**
 * Validate an envelope as a platoon message.
 *
 * Returns null for envelopes in other namespaces so peers can share a
 * relay with unrelated traffic. Throws ProtocolError when a platoon
 * envelope has an unknown type or a payload that does not match it.
 */
export function parsePlatoonMessage(envelope: NamespacedMessage): PlatoonMessage | null {
  if (envelope.namespace !== PLATOON_NAMESPACE) {
    return null;
  }

  const result = PlatoonMessageSchema.safeParse({
    type: envelope.type,
    payload: envelope.payload,
  });
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
    throw new ProtocolError(`Malformed ${envelope.type} message${where}`, { cause: result.error });
  }
  return result.data;
}
