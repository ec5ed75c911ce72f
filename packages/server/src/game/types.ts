/**
 * @fileoverview Server-side game types.
 * Re-exports protocol types and defines the server's view of a player.
 */

import type { ConnectionHandle, PlayerName, ServerMessage } from '@broadside/protocol';
import type { GameSession } from './GameSession.js';

// ============ Re-export Protocol Types ============

export type {
  Cell,
  GameOverReason,
  GamePhase,
  PlayerName,
  PlayerNumber,
  SessionId,
  ShipPlacement,
  ShotResult,
} from '@broadside/protocol';

// ============ Player ============

/**
 * A connected player who completed the handshake.
 *
 * A player is either waiting in the matchmaking queue, attached to a session,
 * or idle after a finished game; never queued and in a live session at once.
 */
export class Player {
  /** Session the player is or was last attached to */
  session: GameSession | null = null;

  constructor(
    readonly name: PlayerName,
    readonly handle: ConnectionHandle
  ) {}

  /** Whether the player is attached to a session that has not finished */
  get inActiveSession(): boolean {
    return this.session !== null && !this.session.isOver;
  }

  send(message: ServerMessage): void {
    this.handle.send(message);
  }
}
