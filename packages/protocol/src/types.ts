/**
 * @fileoverview Core game types shared between the server, the bot and tests.
 */

/**
 * Unique display name chosen by a player during the handshake.
 */
export type PlayerName = string;

/**
 * Slot of a player inside a session.
 * - Player 1: the player who waited in the queue, fires first
 * - Player 2: the player whose arrival completed the pairing
 */
export type PlayerNumber = 1 | 2;

/**
 * Process-unique session identifier, allocated from 1 upwards.
 */
export type SessionId = number;

/**
 * Lifecycle phase of a game session.
 */
export type GamePhase = 'setup' | 'gameplay' | 'game_over';

/**
 * Outcome of a shot, as reported by the targeted player's own board.
 */
export type ShotResult = 'hit' | 'miss' | 'sunk';

/**
 * Why a session ended.
 */
export type GameOverReason = 'fleet_destroyed' | 'opponent_disconnected' | 'shutdown';

/**
 * A grid coordinate.
 */
export interface Cell {
  readonly row: number;
  readonly col: number;
}

/**
 * Orientation of a placed ship.
 */
export type Orientation = 'horizontal' | 'vertical';

/**
 * Ship placement in the form the bundled bot reports it. The server does not
 * rely on this shape and relays whatever a client sends.
 */
export interface ShipPlacement {
  readonly name: string;
  readonly row: number;
  readonly col: number;
  readonly length: number;
  readonly orientation: Orientation;
}

/**
 * Returns the other slot of a two-player session.
 */
export function otherPlayer(player: PlayerNumber): PlayerNumber {
  return player === 1 ? 2 : 1;
}
