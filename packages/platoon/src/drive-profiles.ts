/**
 * Scripted lead-vehicle manoeuvres for exercising followers.
 * Steps are applied by the session tick once `afterMs` has elapsed.
 */

export interface ProfileStep {
  afterMs: number;
  targetSpeed: number;
  /** Suppress STATE broadcasts for this long, starting at this step */
  muteMs?: number;
}

export const DRIVE_PROFILES = {
  'cruise-soft-stop': [
    { afterMs: 0, targetSpeed: 14 },
    { afterMs: 10_000, targetSpeed: 10 },
    { afterMs: 16_000, targetSpeed: 6 },
    { afterMs: 18_000, targetSpeed: 3 },
    { afterMs: 20_000, targetSpeed: 0 },
  ],
  'cruise-hard-stop': [
    { afterMs: 0, targetSpeed: 14 },
    { afterMs: 10_000, targetSpeed: 10 },
    { afterMs: 16_000, targetSpeed: 0 },
  ],
  'slow-ramp': [
    { afterMs: 0, targetSpeed: 1 },
    { afterMs: 1_000, targetSpeed: 2 },
    { afterMs: 2_000, targetSpeed: 3 },
    { afterMs: 3_000, targetSpeed: 4 },
    { afterMs: 4_000, targetSpeed: 5 },
    { afterMs: 10_000, targetSpeed: 0 },
  ],
  'stop-and-go': [
    { afterMs: 0, targetSpeed: 10 },
    { afterMs: 6_000, targetSpeed: 0 },
    { afterMs: 7_500, targetSpeed: 10 },
    { afterMs: 10_500, targetSpeed: 0 },
    { afterMs: 12_000, targetSpeed: 10 },
    { afterMs: 15_000, targetSpeed: 0 },
  ],
  'silent-stop': [
    { afterMs: 0, targetSpeed: 12 },
    { afterMs: 10_000, targetSpeed: 0, muteMs: 1_000 },
  ],
} satisfies Record<string, readonly ProfileStep[]>;

export type DriveProfileName = keyof typeof DRIVE_PROFILES;

export const DRIVE_PROFILE_NAMES = Object.keys(DRIVE_PROFILES).filter(isDriveProfileName);

export function isDriveProfileName(name: string): name is DriveProfileName {
  return Object.prototype.hasOwnProperty.call(DRIVE_PROFILES, name);
}

export function getDriveProfile(name: DriveProfileName): readonly ProfileStep[] {
  return DRIVE_PROFILES[name];
}
