import { describe, it, expect } from 'vitest';
import { DRIVE_PROFILES, DRIVE_PROFILE_NAMES, OPERATOR_USAGE, parseOperatorCommand } from '../index.js';

describe('@convoy/platoon', () => {
  describe('parseOperatorCommand', () => {
    it('parses the membership commands', () => {
      expect(parseOperatorCommand('join')).toEqual({ ok: true, command: { kind: 'join' } });
      expect(parseOperatorCommand('  LEAVE  ')).toEqual({ ok: true, command: { kind: 'leave' } });
      expect(parseOperatorCommand('quit')).toEqual({ ok: true, command: { kind: 'leave' } });
    });

    it('parses numeric arguments', () => {
      expect(parseOperatorCommand('set-gap 12.5')).toEqual({ ok: true, command: { kind: 'set-gap', meters: 12.5 } });
      expect(parseOperatorCommand('set-speed 0')).toEqual({
        ok: true,
        command: { kind: 'set-speed', metersPerSecond: 0 },
      });
      expect(parseOperatorCommand('mute 2.5')).toEqual({ ok: true, command: { kind: 'mute', ms: 2500 } });
    });

    it('rejects bad numbers with a usage hint', () => {
      expect(parseOperatorCommand('set-gap')).toEqual({ ok: false, error: 'Usage: set-gap <meters> (a positive number)' });
      expect(parseOperatorCommand('set-gap -3')).toEqual({
        ok: false,
        error: 'Usage: set-gap <meters> (a positive number)',
      });
      expect(parseOperatorCommand('set-gap ten')).toEqual({
        ok: false,
        error: 'Usage: set-gap <meters> (a positive number)',
      });
      expect(parseOperatorCommand('set-speed -1')).toEqual({ ok: false, error: 'Usage: set-speed <m/s> (zero or more)' });
      expect(parseOperatorCommand('mute 0')).toEqual({ ok: false, error: 'Usage: mute <seconds> (a positive number)' });
    });

    it('accepts known profiles only', () => {
      expect(parseOperatorCommand('profile stop-and-go')).toEqual({
        ok: true,
        command: { kind: 'profile', name: 'stop-and-go' },
      });
      expect(parseOperatorCommand('profile warp-speed')).toEqual({
        ok: false,
        error: 'Usage: profile <cruise-soft-stop|cruise-hard-stop|slow-ramp|stop-and-go|silent-stop>',
      });
    });

    it('points at help for anything else', () => {
      expect(parseOperatorCommand('')).toEqual({ ok: false, error: 'Type a command, or "help" for the list' });
      expect(parseOperatorCommand('fly')).toEqual({ ok: false, error: 'Unknown command "fly". Type "help" for the list' });
      expect(parseOperatorCommand('?')).toEqual({ ok: true, command: { kind: 'help' } });
      expect(parseOperatorCommand('status')).toEqual({ ok: true, command: { kind: 'status' } });
    });

    it('lists every command in the usage text', () => {
      for (const verb of ['join', 'leave', 'set-gap', 'set-speed', 'profile', 'mute', 'status', 'help']) {
        expect(OPERATOR_USAGE).toContain(verb);
      }
    });
  });

  describe('drive profiles', () => {
    it('starts every profile immediately and keeps steps in time order', () => {
      expect(DRIVE_PROFILE_NAMES).toEqual([
        'cruise-soft-stop',
        'cruise-hard-stop',
        'slow-ramp',
        'stop-and-go',
        'silent-stop',
      ]);

      for (const name of DRIVE_PROFILE_NAMES) {
        const steps = DRIVE_PROFILES[name];
        expect(steps[0].afterMs).toBe(0);
        for (let i = 1; i < steps.length; i++) {
          expect(steps[i].afterMs).toBeGreaterThan(steps[i - 1].afterMs);
        }
        expect(steps[steps.length - 1].targetSpeed).toBe(0);
      }
    });
  });
});
