/**
 * @fileoverview Protocol reactions of an automated player.
 *
 * Transport-free: every server message goes in, the client messages to send
 * in reply come out, in order.
 */

import type { Cell, ClientMessage, PlayerNumber, ServerMessage } from '@broadside/protocol';
import { logger } from '@broadside/server/logger';
import { FleetBoard } from './FleetBoard.js';
import { ObservedBoard } from './ObservedBoard.js';
import type { ShotStrategy } from './strategies.js';

export interface BotPlayerConfig {
  /** Display name sent in the handshake */
  name: string;
  strategy: ShotStrategy;
  /** Ask for a new match after each game */
  requeue: boolean;
  /** Source of randomness in [0, 1) for fleet placement */
  rng: () => number;
}

type BotPhase = 'connecting' | 'waiting' | 'setup' | 'gameplay' | 'finished';

export class BotPlayer {
  private phase: BotPhase = 'connecting';
  private playerNum: PlayerNumber | null = null;
  private fleet: FleetBoard | null = null;
  private observed: ObservedBoard = new ObservedBoard();
  private pendingShot: Cell | null = null;
  private wins = 0;
  private losses = 0;

  constructor(private readonly config: BotPlayerConfig) {}

  /**
   * The handshake record that opens the connection.
   */
  hello(): ClientMessage {
    return { type: 'name', name: this.config.name };
  }

  get currentPhase(): BotPhase {
    return this.phase;
  }

  get slot(): PlayerNumber | null {
    return this.playerNum;
  }

  get board(): FleetBoard | null {
    return this.fleet;
  }

  get view(): ObservedBoard {
    return this.observed;
  }

  get record(): { wins: number; losses: number } {
    return { wins: this.wins, losses: this.losses };
  }

  /**
   * React to one server message.
   * @returns messages to send, in order
   */
  handle(message: ServerMessage): ClientMessage[] {
    switch (message.type) {
      case 'waiting_for_opponent':
        this.phase = 'waiting';
        return [];

      case 'session_start':
        return this.onSessionStart(message.player_num, message.opponent);

      case 'gameplay_start':
        this.phase = 'gameplay';
        return message.current_player === this.playerNum ? this.fire() : [];

      case 'turn_change':
        return message.current_player === this.playerNum ? this.fire() : [];

      case 'receive_shot':
        return this.onReceiveShot(message.row, message.col, message.player);

      case 'shot_result':
        return this.onShotResult(message);

      case 'game_over':
        return this.onGameOver(message.winner);

      case 'opponent_disconnected':
        logger.info('Bot opponent disconnected', { bot: this.config.name });
        if (this.phase !== 'finished') this.wins++;
        return this.finish();

      case 'ping':
        return [{ type: 'pong' }];

      case 'error':
        logger.warn('Bot received error', { bot: this.config.name, message: message.message });
        return [];

      case 'setup_update':
      case 'opponent_ship_placement':
      case 'chat':
        return [];
    }
  }

  // ============ Reactions ============

  private onSessionStart(playerNum: PlayerNumber, opponent: string): ClientMessage[] {
    this.phase = 'setup';
    this.playerNum = playerNum;
    this.fleet = FleetBoard.random(this.config.rng);
    this.observed = new ObservedBoard();
    this.pendingShot = null;

    logger.info('Bot paired', { bot: this.config.name, playerNum, opponent });

    const placements = this.fleet.placements.map((ship): ClientMessage => ({
      type: 'ship_placement',
      player_num: playerNum,
      ship: { ...ship },
    }));
    return [...placements, { type: 'setup_complete', player_num: playerNum }];
  }

  private onReceiveShot(row: number, col: number, shooter: PlayerNumber): ClientMessage[] {
    if (!this.fleet || this.phase !== 'gameplay') {
      return [];
    }
    const result = this.fleet.receiveShot(row, col);
    const replies: ClientMessage[] = [{ type: 'shot_result', player: shooter, row, col, result }];

    if (this.fleet.allSunk()) {
      replies.push({ type: 'game_over', winner: shooter });
    }
    return replies;
  }

  private onShotResult(message: Extract<ServerMessage, { type: 'shot_result' }>): ClientMessage[] {
    if (message.player !== this.playerNum) {
      return [];
    }
    this.observed.mark(message.row, message.col, message.result);
    this.pendingShot = null;

    // A hit or sink keeps the turn
    return message.result === 'miss' || this.phase !== 'gameplay' ? [] : this.fire();
  }

  private onGameOver(winner: PlayerNumber): ClientMessage[] {
    if (this.phase === 'finished') {
      return [];
    }
    const won = winner === this.playerNum;
    if (won) {
      this.wins++;
    } else {
      this.losses++;
    }
    logger.info('Bot game finished', { bot: this.config.name, winner, won });
    return this.finish();
  }

  private finish(): ClientMessage[] {
    this.phase = 'finished';
    this.pendingShot = null;
    return this.config.requeue ? [{ type: 'find_match' }] : [];
  }

  private fire(): ClientMessage[] {
    if (this.playerNum === null || this.pendingShot !== null || this.phase !== 'gameplay') {
      return [];
    }
    const legal = this.observed.legalCells();
    if (legal.length === 0) {
      return [];
    }

    const cell = this.config.strategy.chooseShot(this.observed, legal);
    this.pendingShot = cell;
    return [{ type: 'shot', player_num: this.playerNum, row: cell.row, col: cell.col }];
  }
}
