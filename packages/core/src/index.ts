// ═══════════════════════════════════════════════════════════════════════════
// convoy — Unified entry point for broadcast-relay vehicle platooning
// ═══════════════════════════════════════════════════════════════════════════

// Vehicle session (primary API)
export { VehicleSession } from '@convoy/platoon';
export type { VehicleSessionOptions, VehicleSessionEvents, SessionCommand, SessionStatus, TickReport } from '@convoy/platoon';
export { PlatoonProtocolEngine, PlatoonMembership } from '@convoy/platoon';
export type { ProtocolEngineOptions, ProtocolEngineEvents } from '@convoy/platoon';
export { GapController, DEFAULT_CONTROLLER_PARAMS } from '@convoy/platoon';
export type { ControlMode, ControlInput, ControlOutput } from '@convoy/platoon';
export { DRIVE_PROFILES, DRIVE_PROFILE_NAMES, parseOperatorCommand, OPERATOR_USAGE } from '@convoy/platoon';
export type { DriveProfileName, OperatorCommand } from '@convoy/platoon';

// Relay and client
export { MessageRelay } from '@convoy/relay';
export type { RelayOptions, RelayPeer, RelayEvents, PeerDropReason } from '@convoy/relay';
export { PeerClient, DEFAULT_RECONNECT_POLICY } from '@convoy/transport';
export type { IPeerClient, PeerClientOptions, PeerClientEvents, PeerClientStatus, ReconnectPolicy } from '@convoy/transport';

// Simulation stand-in
export { SimWorld, SimVehicle, SpawnError, BLUEPRINTS } from '@convoy/sim';
export type { BlueprintName, VehicleBlueprint } from '@convoy/sim';

// Types & utilities
export {
  createLogger,
  TypedEventEmitter,
  ConvoyConfigSchema,
  ConnectionError,
  DisconnectedError,
  StaleDataError,
  VehicleHandleError,
  ProtocolError,
  parseRelayAddress,
  formatRelayAddress,
  describeRole,
} from '@convoy/types';
export type {
  Logger,
  PeerId,
  VehicleState,
  VehicleHandle,
  VehicleKinematics,
  ControlCommand,
  ControllerParams,
  ConvoyConfig,
  PlatoonMessage,
  PlatoonRole,
  PredecessorTrack,
  RelayAddress,
} from '@convoy/types';

// Protocol
export { FrameCodec, MAX_MESSAGE_SIZE } from '@convoy/protocol';
export type { SerializationFormat } from '@convoy/protocol';
