import { z } from 'zod';
import { DRIVE_PROFILE_NAMES, isDriveProfileName, type DriveProfileName } from './drive-profiles.js';

// ═══════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════

export type OperatorCommand =
  | { kind: 'join' }
  | { kind: 'leave' }
  | { kind: 'set-gap'; meters: number }
  | { kind: 'set-speed'; metersPerSecond: number }
  | { kind: 'profile'; name: DriveProfileName }
  | { kind: 'mute'; ms: number }
  | { kind: 'status' }
  | { kind: 'help' };

export type ParsedOperatorCommand =
  | { ok: true; command: OperatorCommand }
  | { ok: false; error: string };

export const OPERATOR_USAGE = [
  'join                 join the platoon at the tail',
  'leave                leave the platoon and exit',
  'set-gap <meters>     change the target gap to the predecessor',
  'set-speed <m/s>      change the cruise speed (used while leading)',
  `profile <name>       run a lead-vehicle profile (${DRIVE_PROFILE_NAMES.join(', ')})`,
  'mute <seconds>       stop broadcasting state for a while',
  'status               show role, membership and controller mode',
  'help                 show this list',
].join('\n');

// ═══════════════════════════════════════════════════════════════════════════
// PARSING
// ═══════════════════════════════════════════════════════════════════════════

const Meters = z.coerce.number().finite().positive();
const MetersPerSecond = z.coerce.number().finite().nonnegative();
const Seconds = z.coerce.number().finite().positive();

/**
 * Parse one line typed at the vehicle prompt.
 */
export function parseOperatorCommand(line: string): ParsedOperatorCommand {
  const [verb = '', ...args] = line.trim().split(/\s+/);
  const arg = args[0];

  switch (verb.toLowerCase()) {
    case 'join':
      return { ok: true, command: { kind: 'join' } };
    case 'leave':
    case 'quit':
    case 'exit':
      return { ok: true, command: { kind: 'leave' } };
    case 'status':
      return { ok: true, command: { kind: 'status' } };
    case 'help':
    case '?':
      return { ok: true, command: { kind: 'help' } };

    case 'set-gap': {
      const meters = parseNumber(Meters, arg);
      return meters === null
        ? { ok: false, error: 'Usage: set-gap <meters> (a positive number)' }
        : { ok: true, command: { kind: 'set-gap', meters } };
    }

    case 'set-speed': {
      const metersPerSecond = parseNumber(MetersPerSecond, arg);
      return metersPerSecond === null
        ? { ok: false, error: 'Usage: set-speed <m/s> (zero or more)' }
        : { ok: true, command: { kind: 'set-speed', metersPerSecond } };
    }

    case 'mute': {
      const seconds = parseNumber(Seconds, arg);
      return seconds === null
        ? { ok: false, error: 'Usage: mute <seconds> (a positive number)' }
        : { ok: true, command: { kind: 'mute', ms: Math.round(seconds * 1000) } };
    }

    case 'profile': {
      if (arg === undefined || !isDriveProfileName(arg)) {
        return { ok: false, error: `Usage: profile <${DRIVE_PROFILE_NAMES.join('|')}>` };
      }
      return { ok: true, command: { kind: 'profile', name: arg } };
    }

    case '':
      return { ok: false, error: 'Type a command, or "help" for the list' };

    default:
      return { ok: false, error: `Unknown command "${verb}". Type "help" for the list` };
  }
}

function parseNumber(schema: z.ZodNumber, text: string | undefined): number | null {
  if (text === undefined || text === '') return null;
  const result = schema.safeParse(text);
  return result.success ? result.data : null;
}
