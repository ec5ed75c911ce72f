import { createMockHandle } from '@broadside/testing';
import { beforeEach, describe, expect, it } from 'vitest';
import { InvalidNameError, NameTakenError } from '../src/errors.js';
import { MatchmakingQueue } from '../src/game/MatchmakingQueue.js';
import { PlayerRegistry } from '../src/game/PlayerRegistry.js';
import { SessionRegistry } from '../src/game/SessionRegistry.js';

describe('matchmaking', () => {
  let sessions: SessionRegistry;
  let queue: MatchmakingQueue;
  let players: PlayerRegistry;

  beforeEach(() => {
    sessions = new SessionRegistry();
    queue = new MatchmakingQueue(sessions);
    players = new PlayerRegistry(queue, { maxNameLength: 8 });
  });

  describe('PlayerRegistry.register', () => {
    it('should register distinct names', () => {
      const alice = players.register('Alice', createMockHandle());
      const bob = players.register('Bob', createMockHandle());

      expect(players.lookup('Alice')).toBe(alice);
      expect(players.lookup('Bob')).toBe(bob);
      expect(players.size).toBe(2);
    });

    it('should reject a duplicate name and keep the first player', () => {
      const first = players.register('Alice', createMockHandle());

      expect(() => players.register('Alice', createMockHandle())).toThrow(NameTakenError);
      expect(players.lookup('Alice')).toBe(first);
      expect(players.size).toBe(1);
    });

    it('should treat names as case-sensitive', () => {
      players.register('Alice', createMockHandle());

      expect(() => players.register('alice', createMockHandle())).not.toThrow();
    });

    it('should reject blank names', () => {
      expect(() => players.register('   ', createMockHandle())).toThrow(
        'Invalid name: name must not be empty'
      );
    });

    it('should reject names over the configured length', () => {
      expect(() => players.register('Alexandra', createMockHandle())).toThrow(InvalidNameError);
    });
  });

  describe('MatchmakingQueue.enqueueOrPair', () => {
    it('should queue the first player and pair the second with it', () => {
      const alice = players.register('Alice', createMockHandle());
      const bob = players.register('Bob', createMockHandle());

      expect(queue.enqueueOrPair(alice)).toEqual({ kind: 'queued' });
      expect(queue.waitingNames()).toEqual(['Alice']);

      const result = queue.enqueueOrPair(bob);
      if (result.kind !== 'paired') throw new Error('expected a pairing');

      expect(result.session.id).toBe(1);
      expect(result.session.playerAt(1)).toBe(alice);
      expect(result.session.playerAt(2)).toBe(bob);
      expect(queue.size).toBe(0);
      expect(sessions.get(1)).toBe(result.session);
    });

    it('should pair in arrival order', () => {
      const [a, b, c, d] = ['A', 'B', 'C', 'D'].map((n) => players.register(n, createMockHandle()));
      if (!a || !b || !c || !d) throw new Error('registration failed');

      queue.enqueueOrPair(a);
      const first = queue.enqueueOrPair(b);
      queue.enqueueOrPair(c);
      const second = queue.enqueueOrPair(d);

      expect(first.kind === 'paired' && first.session.snapshot().players).toEqual(['A', 'B']);
      expect(second.kind === 'paired' && second.session.snapshot().players).toEqual(['C', 'D']);
      expect(sessions.list().map((s) => s.id)).toEqual([1, 2]);
    });

    it('should refuse a player that is already queued', () => {
      const alice = players.register('Alice', createMockHandle());
      queue.enqueueOrPair(alice);

      expect(() => queue.enqueueOrPair(alice)).toThrow('already waiting for an opponent');
    });

    it('should refuse a player in an unfinished session', () => {
      const alice = players.register('Alice', createMockHandle());
      const bob = players.register('Bob', createMockHandle());
      queue.enqueueOrPair(alice);
      const result = queue.enqueueOrPair(bob);
      if (result.kind === 'paired') result.session.start();

      expect(() => queue.enqueueOrPair(alice)).toThrow('already in a session');
    });
  });

  describe('PlayerRegistry.unregister', () => {
    it('should remove a queued player so nobody is paired with it', () => {
      const alice = players.register('Alice', createMockHandle());
      queue.enqueueOrPair(alice);

      players.unregister(alice);
      const bob = players.register('Bob', createMockHandle());

      expect(queue.enqueueOrPair(bob)).toEqual({ kind: 'queued' });
      expect(queue.waitingNames()).toEqual(['Bob']);
      expect(players.lookup('Alice')).toBeUndefined();
      expect(players.list()).toEqual([bob]);
    });

    it('should end the session and notify the survivor', () => {
      const aliceHandle = createMockHandle();
      const bobHandle = createMockHandle();
      const alice = players.register('Alice', aliceHandle);
      const bob = players.register('Bob', bobHandle);
      queue.enqueueOrPair(alice);
      const result = queue.enqueueOrPair(bob);
      if (result.kind === 'paired') result.session.start();
      bobHandle.clearSent();

      players.unregister(alice);

      expect(bobHandle.sent).toEqual([{ type: 'opponent_disconnected' }]);
      expect(sessions.size).toBe(0);
      expect(bob.inActiveSession).toBe(false);
    });

    it('should ignore a stale player object with a reused name', () => {
      const stale = players.register('Alice', createMockHandle());
      players.unregister(stale);
      const current = players.register('Alice', createMockHandle());

      players.unregister(stale);

      expect(players.lookup('Alice')).toBe(current);
    });

    it('should free the name for reuse', () => {
      const alice = players.register('Alice', createMockHandle());
      players.unregister(alice);

      expect(() => players.register('Alice', createMockHandle())).not.toThrow();
    });
  });
});
