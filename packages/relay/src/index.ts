export { MessageRelay } from './message-relay.js';
export type { RelayOptions, RelayPeer, RelayEvents, PeerDropReason } from './message-relay.js';
