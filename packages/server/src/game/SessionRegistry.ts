/**
 * @fileoverview In-memory registry of live game sessions.
 */

import type { SessionId } from '@broadside/protocol';
import { SessionNotFoundError } from '../errors.js';
import { logger } from '../utils/logger.js';
import { GameSession } from './GameSession.js';
import type { Player } from './types.js';

/**
 * Maps session ids to live sessions.
 *
 * Ids grow monotonically for the lifetime of the process and are never reused.
 * A session leaves the registry as soon as it reaches game over.
 */
export class SessionRegistry {
  private readonly sessions = new Map<SessionId, GameSession>();
  private nextSessionId = 1;

  /**
   * Create and register a session. `playerA` takes slot 1.
   * The session is not started; the caller announces it with `start()`.
   */
  create(playerA: Player, playerB: Player): GameSession {
    const session = new GameSession(this.nextSessionId, playerA, playerB);
    this.nextSessionId++;

    this.sessions.set(session.id, session);
    session.onEnd((ended, reason) => {
      this.remove(ended.id);
      logger.info('Session removed', { sessionId: ended.id, reason });
    });

    return session;
  }

  /**
   * Get a session by id, or undefined if it is not live.
   */
  get(id: SessionId): GameSession | undefined {
    return this.sessions.get(id);
  }

  /**
   * Get a session by id.
   * @throws {SessionNotFoundError} if the session is not live
   */
  require(id: SessionId): GameSession {
    const session = this.sessions.get(id);
    if (!session) {
      throw new SessionNotFoundError(id);
    }
    return session;
  }

  remove(id: SessionId): boolean {
    return this.sessions.delete(id);
  }

  list(): GameSession[] {
    return [...this.sessions.values()];
  }

  get size(): number {
    return this.sessions.size;
  }
}
