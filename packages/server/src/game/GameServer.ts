/**
 * @fileoverview Server orchestrator: runs one task per connection from
 * handshake to disconnect and owns the registries, the matchmaking queue and
 * the heartbeat monitor.
 */

import {
  type ClientMessage,
  type ConnectionHandle,
  UnknownMessageTypeError,
} from '@broadside/protocol';
import { SessionNotFoundError } from '../errors.js';
import { isSessionMessage } from '../protocol/handlers.js';
import { HeartbeatMonitor, type Monitored } from '../utils/HeartbeatMonitor.js';
import { logger } from '../utils/logger.js';
import type { SessionSnapshot } from './GameSession.js';
import { MatchmakingQueue } from './MatchmakingQueue.js';
import { PlayerRegistry } from './PlayerRegistry.js';
import { SessionRegistry } from './SessionRegistry.js';
import type { Player } from './types.js';

/**
 * A connection handle the heartbeat monitor can supervise.
 */
export type ServerHandle = ConnectionHandle &
  Monitored & {
    readonly closeReason: Error | undefined;
  };

export interface GameServerConfig {
  /** Longest accepted display name */
  maxNameLength: number;
  heartbeat: {
    intervalMs: number;
    timeoutMs: number;
  };
}

const DEFAULT_CONFIG: GameServerConfig = {
  maxNameLength: 32,
  heartbeat: { intervalMs: 15_000, timeoutMs: 45_000 },
};

/**
 * Point-in-time view of the server for the status API.
 */
export interface ServerSnapshot {
  readonly connections: number;
  readonly players: number;
  readonly queued: string[];
  readonly sessions: SessionSnapshot[];
}

export const INVALID_FORMAT_MESSAGE = 'Invalid message format';
export const EXPECTED_NAME_MESSAGE = 'Expected a name message';

export class GameServer {
  readonly sessions: SessionRegistry;
  readonly queue: MatchmakingQueue;
  readonly players: PlayerRegistry;
  readonly heartbeat: HeartbeatMonitor;
  private readonly handles = new Set<ServerHandle>();
  private shuttingDown = false;

  constructor(config: Partial<GameServerConfig> = {}) {
    const resolved = { ...DEFAULT_CONFIG, ...config };
    this.sessions = new SessionRegistry();
    this.queue = new MatchmakingQueue(this.sessions);
    this.players = new PlayerRegistry(this.queue, { maxNameLength: resolved.maxNameLength });
    this.heartbeat = new HeartbeatMonitor(resolved.heartbeat);
  }

  // ============ Connection Lifecycle ============

  /**
   * Serve one connection until it ends. Never rejects.
   */
  async handleConnection(handle: ServerHandle): Promise<void> {
    if (this.shuttingDown) {
      handle.close();
      return;
    }

    this.handles.add(handle);
    this.heartbeat.watch(handle);
    logger.info('Connection opened', { connectionId: handle.id, remoteAddress: handle.remoteAddress });

    let player: Player | null = null;
    try {
      player = await this.handshake(handle);
      if (player) {
        this.matchmake(player);
        await this.readLoop(player);
      }
    } catch (error) {
      logger.error('Connection task failed', { connectionId: handle.id, error });
    } finally {
      if (player) {
        this.players.unregister(player);
      }
      this.heartbeat.unwatch(handle);
      this.handles.delete(handle);
      handle.close();
      logger.info('Connection closed', {
        connectionId: handle.id,
        player: player?.name,
        reason: handle.closeReason?.message,
      });
    }
  }

  /**
   * Read the `name` record and register the player, or reply with an error.
   * @returns the registered player, or null if the connection must close
   */
  private async handshake(handle: ServerHandle): Promise<Player | null> {
    const frame = await handle.receive();
    if (frame === null) {
      logger.info('Connection ended before handshake', { connectionId: handle.id });
      return null;
    }
    if (!frame.ok || frame.message.type !== 'name') {
      const reason = frame.ok ? `unexpected ${frame.message.type}` : frame.error.message;
      logger.warn('Handshake rejected', { connectionId: handle.id, reason });
      handle.send({ type: 'error', message: EXPECTED_NAME_MESSAGE });
      return null;
    }

    try {
      return this.players.register(frame.message.name, handle);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.warn('Handshake rejected', { connectionId: handle.id, reason: message });
      handle.send({ type: 'error', message });
      return null;
    }
  }

  /**
   * Queue the player, or pair them and announce the new session.
   */
  private matchmake(player: Player): void {
    const result = this.queue.enqueueOrPair(player);
    if (result.kind === 'queued') {
      player.send({ type: 'waiting_for_opponent' });
    } else {
      result.session.start();
    }
  }

  private async readLoop(player: Player): Promise<void> {
    const { handle } = player;
    for (;;) {
      const frame = await handle.receive();
      if (frame === null) {
        return;
      }

      if (!frame.ok) {
        if (frame.error instanceof UnknownMessageTypeError) {
          logger.warn('Ignoring unknown message type', { player: player.name, error: frame.error });
        } else {
          logger.warn('Malformed frame', { player: player.name, error: frame.error });
          player.send({ type: 'error', message: INVALID_FORMAT_MESSAGE });
        }
        continue;
      }

      this.dispatch(player, frame.message);
    }
  }

  // ============ Dispatch ============

  private dispatch(player: Player, message: ClientMessage): void {
    if (isSessionMessage(message)) {
      const session = player.session;
      if (session === null) {
        logger.warn('Message without active session', {
          player: player.name,
          type: message.type,
          error: new SessionNotFoundError(null),
        });
        return;
      }
      // A finished session still relays chat and drops everything else
      session.handleMessage(player, message);
      return;
    }

    switch (message.type) {
      case 'name':
        logger.warn('Ignoring repeated name message', { player: player.name });
        break;
      case 'find_match':
        this.requeue(player);
        break;
      case 'pong':
        // Activity already recorded by the handle
        break;
    }
  }

  private requeue(player: Player): void {
    if (this.queue.has(player) || player.inActiveSession) {
      logger.info('Ignoring find_match while busy', { player: player.name });
      return;
    }
    player.session = null;
    this.matchmake(player);
  }

  // ============ Status & Shutdown ============

  snapshot(): ServerSnapshot {
    return {
      connections: this.handles.size,
      players: this.players.size,
      queued: this.queue.waitingNames(),
      sessions: this.sessions.list().map((s) => s.snapshot()),
    };
  }

  start(): void {
    this.heartbeat.start();
  }

  /**
   * End every session, close every connection and stop the heartbeat monitor.
   */
  shutdown(): void {
    if (this.shuttingDown) {
      return;
    }
    this.shuttingDown = true;
    logger.info('Game server shutting down', {
      sessions: this.sessions.size,
      connections: this.handles.size,
    });

    for (const session of this.sessions.list()) {
      session.terminate('shutdown');
    }
    for (const handle of [...this.handles]) {
      handle.close();
    }
    this.heartbeat.stop();
  }
}
