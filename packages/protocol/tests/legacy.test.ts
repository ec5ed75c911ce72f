import { describe, expect, it } from 'vitest';
import {
  encodeLegacyFrame,
  encodeLegacyMessage,
  MalformedMessageError,
  parseLegacyCommand,
  UnknownMessageTypeError,
} from '../src/index.js';

describe('legacy protocol', () => {
  describe('encodeLegacyMessage', () => {
    it('should encode every server message form', () => {
      expect(encodeLegacyMessage({ kind: 'player', player: 2 })).toBe('PLAYER|2');
      expect(encodeLegacyMessage({ kind: 'wait' })).toBe('WAIT|');
      expect(encodeLegacyMessage({ kind: 'your_placement' })).toBe('YOURPLACEMENT|');
      expect(encodeLegacyMessage({ kind: 'start', turn: 1 })).toBe('START|1');
      expect(
        encodeLegacyMessage({ kind: 'shot', player: 1, row: 3, col: 4, result: 'hit' })
      ).toBe('SHOT|1|3|4|hit');
      expect(encodeLegacyMessage({ kind: 'pong' })).toBe('PONG|');
      expect(encodeLegacyMessage({ kind: 'quit', player: 1 })).toBe('QUIT|1');
    });

    it('should keep pipes out of error reasons', () => {
      expect(encodeLegacyMessage({ kind: 'error', reason: 'a|b' })).toBe('ERROR|a/b');
    });

    it('should terminate frames with a newline', () => {
      expect(encodeLegacyFrame({ kind: 'wait' })).toBe('WAIT|\n');
    });
  });

  describe('parseLegacyCommand', () => {
    it('should parse FIRE with inline coordinates', () => {
      expect(parseLegacyCommand('FIRE 3 4|')).toEqual({
        ok: true,
        message: { kind: 'fire', row: 3, col: 4 },
      });
    });

    it('should parse FIRE with piped coordinates', () => {
      expect(parseLegacyCommand('FIRE|7|0')).toEqual({
        ok: true,
        message: { kind: 'fire', row: 7, col: 0 },
      });
    });

    it('should parse SHIPS, PING and QUIT', () => {
      expect(parseLegacyCommand('SHIPS')).toEqual({ ok: true, message: { kind: 'ships' } });
      expect(parseLegacyCommand('PING|')).toEqual({ ok: true, message: { kind: 'ping' } });
      expect(parseLegacyCommand('QUIT|2')).toEqual({
        ok: true,
        message: { kind: 'quit', player: 2 },
      });
      expect(parseLegacyCommand('QUIT|')).toEqual({
        ok: true,
        message: { kind: 'quit', player: null },
      });
    });

    it('should reject FIRE without numeric coordinates', () => {
      const result = parseLegacyCommand('FIRE a b|');

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(MalformedMessageError);
      }
    });

    it('should report unknown verbs', () => {
      const result = parseLegacyCommand('DANCE|');

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(UnknownMessageTypeError);
        expect(result.error.message).toBe('Unknown message type: DANCE');
      }
    });
  });
});
