/**
 * @fileoverview Fixed two-seat room for clients of the pipe-delimited protocol.
 *
 * There is no matchmaking and no board relay: the first two connections sit
 * down, place ships locally and fire at each other while the room decides
 * each shot's outcome.
 */

import {
  type Channel,
  type DecodeResult,
  encodeLegacyFrame,
  type LegacyCommand,
  type LegacyMessage,
  otherPlayer,
  type PlayerNumber,
  parseLegacyCommand,
  UnknownMessageTypeError,
} from '@broadside/protocol';
import type { FrameCodec } from '../connection/LineConnection.js';
import { logger } from '../utils/logger.js';

export type LegacyHandle = Channel<DecodeResult<LegacyCommand>, LegacyMessage>;

export const LEGACY_LINE_CODEC: FrameCodec<DecodeResult<LegacyCommand>, LegacyMessage> = {
  decode: parseLegacyCommand,
  encode: encodeLegacyFrame,
};

export interface LegacyRoomOptions {
  /** Source of randomness in [0, 1) for shot outcomes */
  random?: () => number;
  /** Probability that a shot hits */
  hitChance?: number;
}

export class LegacyRoom {
  private readonly seats: [LegacyHandle | null, LegacyHandle | null] = [null, null];
  private ready: [boolean, boolean] = [false, false];
  private started = false;
  private turn: PlayerNumber = 1;
  private readonly random: () => number;
  private readonly hitChance: number;

  constructor(options: LegacyRoomOptions = {}) {
    this.random = options.random ?? Math.random;
    this.hitChance = options.hitChance ?? 0.5;
  }

  /**
   * Seat the connection and serve it until it quits or disconnects.
   */
  async handleConnection(handle: LegacyHandle): Promise<void> {
    const slot = this.freeSeat();
    if (slot === null) {
      logger.info('Legacy room full', { connectionId: handle.id });
      handle.send({ kind: 'error', reason: 'Room full' });
      handle.close();
      return;
    }

    this.seat(slot, handle);
    try {
      await this.readLoop(slot, handle);
    } catch (error) {
      logger.error('Legacy connection failed', { connectionId: handle.id, error });
    } finally {
      this.leave(slot, handle);
    }
  }

  /**
   * Close both seats, e.g. on server shutdown.
   */
  closeAll(): void {
    for (const seat of this.seats) {
      seat?.close();
    }
  }

  get occupied(): number {
    return this.seats.filter((s) => s !== null).length;
  }

  get isStarted(): boolean {
    return this.started;
  }

  get currentTurn(): PlayerNumber {
    return this.turn;
  }

  // ============ Seating ============

  private freeSeat(): PlayerNumber | null {
    if (this.seats[0] === null) return 1;
    if (this.seats[1] === null) return 2;
    return null;
  }

  private handleAt(slot: PlayerNumber): LegacyHandle | null {
    return this.seats[slot - 1] ?? null;
  }

  private seat(slot: PlayerNumber, handle: LegacyHandle): void {
    this.seats[slot - 1] = handle;
    handle.send({ kind: 'player', player: slot });
    logger.info('Legacy player seated', { connectionId: handle.id, slot });

    if (this.handleAt(otherPlayer(slot)) === null) {
      handle.send({ kind: 'wait' });
    } else {
      this.broadcast({ kind: 'your_placement' });
    }
  }

  private leave(slot: PlayerNumber, handle: LegacyHandle): void {
    handle.close();
    if (this.handleAt(slot) !== handle) {
      return;
    }
    this.seats[slot - 1] = null;
    logger.info('Legacy player left', { connectionId: handle.id, slot });

    const other = this.handleAt(otherPlayer(slot));
    if (other) {
      other.send({ kind: 'quit', player: slot });
      other.close();
      this.seats[otherPlayer(slot) - 1] = null;
    }
    this.reset();
  }

  private reset(): void {
    this.ready = [false, false];
    this.started = false;
    this.turn = 1;
  }

  // ============ Commands ============

  private async readLoop(slot: PlayerNumber, handle: LegacyHandle): Promise<void> {
    for (;;) {
      const frame = await handle.receive();
      if (frame === null) {
        return;
      }
      if (!frame.ok) {
        const reason =
          frame.error instanceof UnknownMessageTypeError
            ? `Unknown command ${frame.error.messageType}`
            : frame.error.message;
        handle.send({ kind: 'error', reason });
        continue;
      }

      const command = frame.message;
      switch (command.kind) {
        case 'ships':
          this.markReady(slot, handle);
          break;
        case 'fire':
          this.fire(slot, handle, command.row, command.col);
          break;
        case 'ping':
          handle.send({ kind: 'pong' });
          break;
        case 'quit':
          return;
      }
    }
  }

  private markReady(slot: PlayerNumber, handle: LegacyHandle): void {
    if (this.occupied < 2) {
      handle.send({ kind: 'error', reason: 'Waiting for opponent' });
      return;
    }
    this.ready[slot - 1] = true;

    if (!this.started && this.ready[0] && this.ready[1]) {
      this.started = true;
      this.turn = 1;
      logger.info('Legacy game started');
      this.broadcast({ kind: 'start', turn: this.turn });
    }
  }

  private fire(slot: PlayerNumber, handle: LegacyHandle, row: number, col: number): void {
    if (!this.started) {
      handle.send({ kind: 'error', reason: 'Game not started' });
      return;
    }
    if (slot !== this.turn) {
      handle.send({ kind: 'error', reason: 'Not your turn' });
      return;
    }

    // Boards stay on the clients, so the outcome is a stand-in
    const result = this.random() < this.hitChance ? 'hit' : 'miss';
    this.broadcast({ kind: 'shot', player: slot, row, col, result });

    if (result === 'miss') {
      this.turn = otherPlayer(slot);
      this.broadcast({ kind: 'start', turn: this.turn });
    }
  }

  private broadcast(message: LegacyMessage): void {
    for (const seat of this.seats) {
      seat?.send(message);
    }
  }
}
