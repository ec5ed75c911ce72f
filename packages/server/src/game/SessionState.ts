/**
 * @fileoverview Immutable session state - all mutations return a new SessionState instance.
 *
 * Holds only the turn-arbitration facts of a session: phase, setup flags,
 * turn owner and the shot awaiting its result. Board contents never reach
 * the server.
 */

import {
  type Cell,
  type GamePhase,
  otherPlayer,
  type PlayerNumber,
  type ShotResult,
} from '@broadside/protocol';

/**
 * A relayed shot whose result has not been reported yet.
 */
export interface PendingShot extends Cell {
  readonly shooter: PlayerNumber;
}

/**
 * Immutable session state container.
 */
export class SessionState {
  private constructor(
    private readonly _phase: GamePhase,
    private readonly _setupComplete: readonly [boolean, boolean],
    private readonly _currentTurn: PlayerNumber,
    private readonly _pendingShot: PendingShot | null,
    private readonly _winner: PlayerNumber | null
  ) {}

  // ============ Static Constructors ============

  /**
   * Create the initial state of a freshly paired session.
   */
  static create(): SessionState {
    return new SessionState('setup', [false, false], 1, null, null);
  }

  // ============ Getters ============

  get phase(): GamePhase {
    return this._phase;
  }

  get setupComplete(): readonly [boolean, boolean] {
    return this._setupComplete;
  }

  /** Slot allowed to fire; meaningful during gameplay only */
  get currentTurn(): PlayerNumber {
    return this._currentTurn;
  }

  get pendingShot(): PendingShot | null {
    return this._pendingShot;
  }

  get winner(): PlayerNumber | null {
    return this._winner;
  }

  get isOver(): boolean {
    return this._phase === 'game_over';
  }

  isReady(player: PlayerNumber): boolean {
    return this._setupComplete[player - 1] === true;
  }

  areBothReady(): boolean {
    return this._setupComplete[0] && this._setupComplete[1];
  }

  // ============ Transitions ============

  /**
   * Mark a slot's fleet as placed. Idempotent.
   */
  markSetupComplete(player: PlayerNumber): SessionState {
    if (this._phase !== 'setup' || this.isReady(player)) {
      return this;
    }
    const flags: [boolean, boolean] =
      player === 1 ? [true, this._setupComplete[1]] : [this._setupComplete[0], true];
    return new SessionState(this._phase, flags, this._currentTurn, null, null);
  }

  /**
   * Enter gameplay with player 1 to move. No-op unless in setup with both slots ready.
   */
  startGameplay(): SessionState {
    if (this._phase !== 'setup' || !this.areBothReady()) {
      return this;
    }
    return new SessionState('gameplay', this._setupComplete, 1, null, null);
  }

  /**
   * Record a relayed shot as pending.
   */
  registerShot(shooter: PlayerNumber, cell: Cell): SessionState {
    return new SessionState(
      this._phase,
      this._setupComplete,
      this._currentTurn,
      { shooter, row: cell.row, col: cell.col },
      null
    );
  }

  /**
   * Clear the pending shot and apply the turn rule: a miss hands the turn
   * over, a hit or sink lets the shooter fire again.
   */
  resolveShot(result: ShotResult): SessionState {
    const nextTurn = result === 'miss' ? otherPlayer(this._currentTurn) : this._currentTurn;
    return new SessionState(this._phase, this._setupComplete, nextTurn, null, null);
  }

  /**
   * Enter the terminal phase.
   */
  endGame(winner: PlayerNumber | null): SessionState {
    if (this._phase === 'game_over') {
      return this;
    }
    return new SessionState('game_over', this._setupComplete, this._currentTurn, null, winner);
  }
}
