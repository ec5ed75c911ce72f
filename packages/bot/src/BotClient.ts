/**
 * @fileoverview Bot client that connects to the game server over WebSocket
 * and plays automatically through a BotPlayer.
 */

import type { EventEmitter } from 'node:events';
import { type ClientMessage, decodeServerFrame } from '@broadside/protocol';
import { logger } from '@broadside/server/logger';
import { type RawData, WebSocket } from 'ws';
import { BotPlayer } from './BotPlayer.js';
import { createStrategy, type ShotStrategy, type StrategyName } from './strategies.js';

/**
 * Configuration for the bot client.
 */
export interface BotConfig {
  name: string;
  strategy: StrategyName | ShotStrategy;
  /** Pause before each batch of replies (ms) */
  actionDelayMs: number;
  /** Ask for a new match after each game */
  requeue: boolean;
  rng: () => number;
}

export const DEFAULT_ACTION_DELAY_MS = 500;

const DEFAULT_CONFIG: BotConfig = {
  name: 'bot',
  strategy: 'hunt',
  actionDelayMs: DEFAULT_ACTION_DELAY_MS,
  requeue: false,
  rng: Math.random,
};

/**
 * Read an action delay setting. Unset, unparsable or negative values fall
 * back to the default; 0 means reply immediately.
 */
export function parseActionDelay(raw: string | undefined): number {
  if (raw === undefined || raw.trim() === '') {
    return DEFAULT_ACTION_DELAY_MS;
  }
  const value = Number(raw);
  return Number.isFinite(value) && value >= 0 ? value : DEFAULT_ACTION_DELAY_MS;
}

/**
 * The part of a ws.WebSocket the client relies on.
 */
export interface BotSocket extends EventEmitter {
  readonly readyState: number;
  send(data: string): void;
  close(): void;
}

export type SocketFactory = (url: string) => BotSocket;

/**
 * Automated game client that plays Broadside.
 */
export class BotClient {
  private ws: BotSocket | null = null;
  private readonly player: BotPlayer;
  private readonly config: BotConfig;
  private readonly timers = new Set<ReturnType<typeof setTimeout>>();

  constructor(
    config: Partial<BotConfig> = {},
    private readonly createSocket: SocketFactory = (url) => new WebSocket(url)
  ) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    const strategy =
      typeof this.config.strategy === 'string'
        ? createStrategy(this.config.strategy, this.config.rng)
        : this.config.strategy;
    this.player = new BotPlayer({
      name: this.config.name,
      strategy,
      requeue: this.config.requeue,
      rng: this.config.rng,
    });
  }

  get state(): BotPlayer {
    return this.player;
  }

  /**
   * Connect to the game server.
   * @param url - WebSocket URL (e.g., ws://localhost:4001)
   */
  connect(url: string): void {
    logger.info('Bot connecting', { url, bot: this.config.name });

    const ws = this.createSocket(url);
    this.ws = ws;

    ws.on('open', () => {
      logger.info('Bot connected to server', { bot: this.config.name });
      this.send(this.player.hello());
    });

    ws.on('message', (data: RawData) => {
      for (const line of rawDataToString(data).split('\n')) {
        if (line.trim().length === 0) continue;
        const frame = decodeServerFrame(line);
        if (!frame.ok) {
          logger.error('Failed to parse server message', { error: frame.error });
          continue;
        }
        this.respond(this.player.handle(frame.message));
      }
    });

    ws.on('close', () => {
      logger.info('Bot disconnected', { bot: this.config.name, ...this.player.record });
      this.cleanup();
    });

    ws.on('error', (error: Error) => {
      logger.error('Bot WebSocket error', { error: error.message });
    });
  }

  /**
   * Disconnect from the server.
   */
  disconnect(): void {
    this.cleanup();
    if (this.ws) {
      this.ws.close();
      this.ws = null;
    }
  }

  private respond(messages: ClientMessage[]): void {
    if (messages.length === 0) {
      return;
    }
    if (this.config.actionDelayMs <= 0) {
      for (const message of messages) this.send(message);
      return;
    }

    const timer = setTimeout(() => {
      this.timers.delete(timer);
      for (const message of messages) this.send(message);
    }, this.config.actionDelayMs);
    this.timers.add(timer);
  }

  private send(message: ClientMessage): void {
    if (this.ws && this.ws.readyState === WebSocket.OPEN) {
      this.ws.send(JSON.stringify(message));
    }
  }

  private cleanup(): void {
    for (const timer of this.timers) {
      clearTimeout(timer);
    }
    this.timers.clear();
  }
}

function rawDataToString(data: RawData): string {
  if (Buffer.isBuffer(data)) {
    return data.toString('utf8');
  }
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString('utf8');
  }
  return Buffer.from(data).toString('utf8');
}

export { BotPlayer } from './BotPlayer.js';
export { BOARD_SIZE, CLASSIC_FLEET, FleetBoard } from './FleetBoard.js';
export { ObservedBoard } from './ObservedBoard.js';
export {
  createStrategy,
  HuntTargetStrategy,
  isStrategyName,
  RandomShotStrategy,
  type ShotStrategy,
  type StrategyName,
} from './strategies.js';
