import { describe, expect, it } from 'vitest';
import { SessionState } from '../src/game/SessionState.js';

function inGameplay(): SessionState {
  return SessionState.create().markSetupComplete(1).markSetupComplete(2).startGameplay();
}

describe('SessionState', () => {
  describe('create', () => {
    it('should start in setup with nobody ready', () => {
      const state = SessionState.create();

      expect(state.phase).toBe('setup');
      expect(state.setupComplete).toEqual([false, false]);
      expect(state.currentTurn).toBe(1);
      expect(state.pendingShot).toBeNull();
      expect(state.winner).toBeNull();
    });
  });

  describe('markSetupComplete', () => {
    it('should mark one slot without touching the other', () => {
      const state = SessionState.create().markSetupComplete(2);

      expect(state.setupComplete).toEqual([false, true]);
      expect(state.isReady(2)).toBe(true);
      expect(state.isReady(1)).toBe(false);
      expect(state.areBothReady()).toBe(false);
    });

    it('should not mutate the original state', () => {
      const state = SessionState.create();
      state.markSetupComplete(1);

      expect(state.setupComplete).toEqual([false, false]);
    });

    it('should return the same instance when already ready', () => {
      const state = SessionState.create().markSetupComplete(1);

      expect(state.markSetupComplete(1)).toBe(state);
    });

    it('should be ignored outside setup', () => {
      const state = inGameplay();

      expect(state.markSetupComplete(1)).toBe(state);
    });
  });

  describe('startGameplay', () => {
    it('should refuse to start with one slot ready', () => {
      const state = SessionState.create().markSetupComplete(1);

      expect(state.startGameplay()).toBe(state);
      expect(state.startGameplay().phase).toBe('setup');
    });

    it('should enter gameplay with player 1 to move', () => {
      const state = inGameplay();

      expect(state.phase).toBe('gameplay');
      expect(state.currentTurn).toBe(1);
      expect(state.setupComplete).toEqual([true, true]);
    });
  });

  describe('shots', () => {
    it('should record the pending shot', () => {
      const state = inGameplay().registerShot(1, { row: 3, col: 4 });

      expect(state.pendingShot).toEqual({ shooter: 1, row: 3, col: 4 });
      expect(state.currentTurn).toBe(1);
    });

    it('should pass the turn on a miss', () => {
      const state = inGameplay().registerShot(1, { row: 0, col: 0 }).resolveShot('miss');

      expect(state.currentTurn).toBe(2);
      expect(state.pendingShot).toBeNull();
    });

    it.each(['hit', 'sunk'] as const)('should keep the turn on a %s', (result) => {
      const state = inGameplay().registerShot(1, { row: 0, col: 0 }).resolveShot(result);

      expect(state.currentTurn).toBe(1);
      expect(state.pendingShot).toBeNull();
    });
  });

  describe('endGame', () => {
    it('should enter the terminal phase with the winner', () => {
      const state = inGameplay().endGame(2);

      expect(state.phase).toBe('game_over');
      expect(state.isOver).toBe(true);
      expect(state.winner).toBe(2);
    });

    it('should keep the first winner', () => {
      const state = inGameplay().endGame(2);

      expect(state.endGame(1)).toBe(state);
      expect(state.endGame(1).winner).toBe(2);
    });
  });
});
