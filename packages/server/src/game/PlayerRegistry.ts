/**
 * @fileoverview Process-wide registry of connected players keyed by display name.
 */

import type { ConnectionHandle, PlayerName } from '@broadside/protocol';
import { InvalidNameError, NameTakenError } from '../errors.js';
import { logger } from '../utils/logger.js';
import type { MatchmakingQueue } from './MatchmakingQueue.js';
import { Player } from './types.js';

export interface PlayerRegistryConfig {
  /** Longest accepted display name */
  readonly maxNameLength: number;
}

const DEFAULT_CONFIG: PlayerRegistryConfig = {
  maxNameLength: 32,
};

/**
 * Maps unique, case-sensitive display names to connected players.
 *
 * `register` is a single check-and-insert and `unregister` removes the player
 * from the registry, the queue and their session in one synchronous step.
 */
export class PlayerRegistry {
  private readonly players = new Map<PlayerName, Player>();
  private readonly config: PlayerRegistryConfig;

  constructor(
    private readonly queue: MatchmakingQueue,
    config: Partial<PlayerRegistryConfig> = {}
  ) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  /**
   * Register a player under a unique name.
   * @throws {InvalidNameError} if the name is blank or too long
   * @throws {NameTakenError} if the name is in use
   */
  register(name: string, handle: ConnectionHandle): Player {
    if (name.trim().length === 0) {
      throw new InvalidNameError('name must not be empty');
    }
    if (name.length > this.config.maxNameLength) {
      throw new InvalidNameError(`name must be at most ${this.config.maxNameLength} characters`);
    }
    if (this.players.has(name)) {
      throw new NameTakenError(name);
    }

    const player = new Player(name, handle);
    this.players.set(name, player);
    logger.info('Player registered', { player: name, connectionId: handle.id });
    return player;
  }

  lookup(name: PlayerName): Player | undefined {
    return this.players.get(name);
  }

  /**
   * Remove a player everywhere. Safe to call more than once.
   */
  unregister(player: Player): void {
    if (this.players.get(player.name) !== player) {
      return;
    }

    this.players.delete(player.name);
    this.queue.remove(player);
    player.session?.handleDisconnect(player);

    logger.info('Player unregistered', { player: player.name });
  }

  list(): Player[] {
    return [...this.players.values()];
  }

  get size(): number {
    return this.players.size;
  }
}
