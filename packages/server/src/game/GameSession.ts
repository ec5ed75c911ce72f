/**
 * @fileoverview A single two-player game: owns both players, the session
 * state and the routing of every relayed message.
 *
 * All methods run to completion without awaiting, so on Node's event loop a
 * session's state is only ever touched by one message at a time.
 */

import {
  type GameOverReason,
  otherPlayer,
  type PlayerNumber,
  type ServerMessage,
  type SessionId,
} from '@broadside/protocol';
import {
  handleSessionMessage,
  type MessageResponse,
  type SessionMessage,
} from '../protocol/handlers.js';
import { logger } from '../utils/logger.js';
import { SessionState } from './SessionState.js';
import type { Player } from './types.js';

/**
 * Called once when a session reaches game over.
 */
export type SessionEndListener = (session: GameSession, reason: GameOverReason) => void;

/**
 * Read-only summary of a session for status reporting and tests.
 */
export interface SessionSnapshot {
  readonly id: SessionId;
  readonly players: readonly [string, string];
  readonly phase: SessionState['phase'];
  readonly setupComplete: readonly [boolean, boolean];
  readonly currentTurn: PlayerNumber;
  readonly winner: PlayerNumber | null;
}

export class GameSession {
  private state: SessionState = SessionState.create();
  private readonly endListeners: SessionEndListener[] = [];

  constructor(
    readonly id: SessionId,
    private readonly slotA: Player,
    private readonly slotB: Player
  ) {
    if (slotA === slotB || slotA.name === slotB.name) {
      throw new Error(`Session ${id} cannot pair player "${slotA.name}" with itself`);
    }
  }

  // ============ Lifecycle ============

  /**
   * Attach both players and announce the pairing.
   */
  start(): void {
    this.slotA.session = this;
    this.slotB.session = this;

    this.slotA.send({
      type: 'session_start',
      session_id: this.id,
      player_num: 1,
      opponent: this.slotB.name,
    });
    this.slotB.send({
      type: 'session_start',
      session_id: this.id,
      player_num: 2,
      opponent: this.slotA.name,
    });

    logger.info('Session started', {
      sessionId: this.id,
      player1: this.slotA.name,
      player2: this.slotB.name,
    });
  }

  /**
   * Register a listener for the transition to game over.
   */
  onEnd(listener: SessionEndListener): void {
    this.endListeners.push(listener);
  }

  // ============ Message Handling ============

  /**
   * Apply a message from one of the two players and deliver the responses.
   */
  handleMessage(sender: Player, message: SessionMessage): void {
    const slot = this.slotOf(sender);
    if (slot === null) {
      logger.warn('Message from player outside session', {
        sessionId: this.id,
        player: sender.name,
        type: message.type,
      });
      return;
    }

    const previousPhase = this.state.phase;
    const result = handleSessionMessage(
      message,
      { sender: slot, senderName: sender.name },
      this.state
    );

    if (result.rejection) {
      logger.info('Message rejected', {
        sessionId: this.id,
        player: sender.name,
        type: message.type,
        error: result.rejection,
      });
    }

    this.state = result.newState;
    this.deliver(slot, result.responses);

    if (previousPhase !== this.state.phase) {
      logger.info('Session phase changed', {
        sessionId: this.id,
        from: previousPhase,
        to: this.state.phase,
      });
      if (this.state.isOver) {
        this.notifyEnd('fleet_destroyed');
      }
    }
  }

  /**
   * The given player left. The survivor is told exactly once and the session ends.
   */
  handleDisconnect(player: Player): void {
    const slot = this.slotOf(player);
    if (slot === null || this.state.isOver) {
      return;
    }

    const survivorSlot = otherPlayer(slot);
    const survivor = this.playerAt(survivorSlot);
    this.state = this.state.endGame(survivorSlot);
    survivor.send({ type: 'opponent_disconnected' });

    logger.info('Session ended by disconnect', {
      sessionId: this.id,
      departed: player.name,
      survivor: survivor.name,
    });

    this.notifyEnd('opponent_disconnected');
  }

  /**
   * End the session without relaying anything, e.g. on server shutdown.
   */
  terminate(reason: GameOverReason): void {
    if (this.state.isOver) {
      return;
    }
    this.state = this.state.endGame(null);
    logger.info('Session terminated', { sessionId: this.id, reason });
    this.notifyEnd(reason);
  }

  // ============ Routing ============

  private deliver(senderSlot: PlayerNumber, responses: MessageResponse[]): void {
    const sender = this.playerAt(senderSlot);
    const opponent = this.playerAt(otherPlayer(senderSlot));

    for (const response of responses) {
      switch (response.target) {
        case 'sender':
          this.sendTo(sender, response.message);
          break;
        case 'opponent':
          this.sendTo(opponent, response.message);
          break;
        case 'all':
          this.broadcast(response.message);
          break;
      }
    }
  }

  private broadcast(message: ServerMessage): void {
    this.sendTo(this.slotA, message);
    this.sendTo(this.slotB, message);
  }

  // A player who has moved on to another session no longer hears this one
  private sendTo(player: Player, message: ServerMessage): void {
    if (player.session === this) {
      player.send(message);
    }
  }

  private notifyEnd(reason: GameOverReason): void {
    for (const listener of this.endListeners.splice(0)) {
      listener(this, reason);
    }
  }

  // ============ Queries ============

  slotOf(player: Player): PlayerNumber | null {
    if (player === this.slotA) return 1;
    if (player === this.slotB) return 2;
    return null;
  }

  playerAt(slot: PlayerNumber): Player {
    return slot === 1 ? this.slotA : this.slotB;
  }

  get phase(): SessionState['phase'] {
    return this.state.phase;
  }

  get currentTurn(): PlayerNumber {
    return this.state.currentTurn;
  }

  get isOver(): boolean {
    return this.state.isOver;
  }

  getState(): SessionState {
    return this.state;
  }

  snapshot(): SessionSnapshot {
    return {
      id: this.id,
      players: [this.slotA.name, this.slotB.name],
      phase: this.state.phase,
      setupComplete: this.state.setupComplete,
      currentTurn: this.state.currentTurn,
      winner: this.state.winner,
    };
  }
}
