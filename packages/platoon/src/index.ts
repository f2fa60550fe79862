export { PlatoonMembership } from './membership.js';
export {
  PlatoonProtocolEngine,
  type ProtocolEngineOptions,
  type ProtocolEngineEvents,
} from './protocol-engine.js';
export {
  GapController,
  DEFAULT_CONTROLLER_PARAMS,
  clamp,
  wrapAngle,
  longitudinalSpeed,
  planarDistance,
  type ControlMode,
  type ControlInput,
  type ControlOutput,
} from './gap-controller.js';
export {
  DRIVE_PROFILES,
  DRIVE_PROFILE_NAMES,
  getDriveProfile,
  isDriveProfileName,
  type DriveProfileName,
  type ProfileStep,
} from './drive-profiles.js';
export {
  parseOperatorCommand,
  OPERATOR_USAGE,
  type OperatorCommand,
  type ParsedOperatorCommand,
} from './operator-commands.js';
export {
  VehicleSession,
  type VehicleSessionOptions,
  type VehicleSessionEvents,
  type SessionCommand,
  type SessionStatus,
  type TickReport,
} from './vehicle-session.js';
