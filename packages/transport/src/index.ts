export { PeerClient, DEFAULT_RECONNECT_POLICY, reconnectDelay } from './peer-client.js';
export type {
  IPeerClient,
  PeerClientEvents,
  PeerClientOptions,
  PeerClientStatus,
  ReconnectPolicy,
} from './peer-client.js';
export { InboundStream } from './inbound-stream.js';
