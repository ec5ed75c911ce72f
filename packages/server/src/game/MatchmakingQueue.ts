/**
 * @fileoverview FIFO matchmaking queue that pairs two players.
 *
 * The first waiting player becomes slot 1, the arriving player slot 2.
 * Popping the head and creating the session happen in one synchronous step,
 * so no other connection can claim the same opponent in between.
 */

import { logger } from '../utils/logger.js';
import type { GameSession } from './GameSession.js';
import type { SessionRegistry } from './SessionRegistry.js';
import type { Player } from './types.js';

/**
 * Outcome of offering a player to the queue.
 */
export type MatchmakingResult =
  | { readonly kind: 'paired'; readonly session: GameSession }
  | { readonly kind: 'queued' };

export class MatchmakingQueue {
  // Map iteration follows insertion order, which gives FIFO with O(1) removal by identity
  private readonly waiting = new Map<Player, number>();

  constructor(private readonly sessions: SessionRegistry) {}

  /**
   * Pair the player with the longest-waiting opponent, or queue them.
   * @throws {Error} if the player is already queued or holds an unfinished session
   */
  enqueueOrPair(player: Player): MatchmakingResult {
    if (this.waiting.has(player)) {
      throw new Error(`Player "${player.name}" is already waiting for an opponent`);
    }
    if (player.inActiveSession) {
      throw new Error(`Player "${player.name}" is already in a session`);
    }

    const opponent = this.head();
    if (opponent === undefined) {
      this.waiting.set(player, Date.now());
      logger.info('Player queued', { player: player.name, queueSize: this.waiting.size });
      return { kind: 'queued' };
    }

    this.waiting.delete(opponent);
    const session = this.sessions.create(opponent, player);
    logger.info('Players paired', {
      sessionId: session.id,
      player1: opponent.name,
      player2: player.name,
    });
    return { kind: 'paired', session };
  }

  /**
   * Remove a waiting player.
   * @returns true if the player was queued
   */
  remove(player: Player): boolean {
    const removed = this.waiting.delete(player);
    if (removed) {
      logger.info('Player left queue', { player: player.name, queueSize: this.waiting.size });
    }
    return removed;
  }

  has(player: Player): boolean {
    return this.waiting.has(player);
  }

  /** Names of waiting players, longest-waiting first */
  waitingNames(): string[] {
    return [...this.waiting.keys()].map((p) => p.name);
  }

  get size(): number {
    return this.waiting.size;
  }

  private head(): Player | undefined {
    for (const player of this.waiting.keys()) {
      return player;
    }
    return undefined;
  }
}
