import { ConnectionLostError } from '../errors.js';
import { logger } from './logger.js';

/**
 * What the monitor needs from a connection handle.
 */
export interface Monitored {
  readonly id: string;
  readonly isOpen: boolean;
  /** Last time anything arrived from the peer (ms since epoch) */
  readonly lastActivityAt: number;
  probe(): void;
  close(reason?: Error): void;
}

export interface HeartbeatMonitorConfig {
  /** Interval in milliseconds between checks */
  intervalMs: number;
  /** Silence in milliseconds after which a connection is dropped */
  timeoutMs: number;
}

/**
 * Periodically probes every registered connection and closes the ones that
 * stayed silent for longer than the timeout.
 *
 * Closing a handle wakes its pending receive with end-of-stream, so the
 * regular disconnect path does the rest.
 */
export class HeartbeatMonitor {
  private readonly connections = new Set<Monitored>();
  private checkInterval: ReturnType<typeof setInterval> | null = null;

  constructor(private readonly config: HeartbeatMonitorConfig) {}

  start(): void {
    if (this.checkInterval) {
      return;
    }
    this.checkInterval = setInterval(() => this.check(), this.config.intervalMs);
    logger.info('Heartbeat monitor started', {
      intervalMs: this.config.intervalMs,
      timeoutMs: this.config.timeoutMs,
    });
  }

  stop(): void {
    if (this.checkInterval) {
      clearInterval(this.checkInterval);
      this.checkInterval = null;
      logger.info('Heartbeat monitor stopped');
    }
  }

  get isRunning(): boolean {
    return this.checkInterval !== null;
  }

  watch(connection: Monitored): void {
    this.connections.add(connection);
  }

  unwatch(connection: Monitored): void {
    this.connections.delete(connection);
  }

  get size(): number {
    return this.connections.size;
  }

  /**
   * Run one check immediately.
   */
  check(): void {
    const now = Date.now();

    for (const connection of [...this.connections]) {
      if (!connection.isOpen) {
        this.connections.delete(connection);
        continue;
      }

      const silentFor = now - connection.lastActivityAt;
      if (silentFor >= this.config.timeoutMs) {
        logger.info('Heartbeat timeout', { connectionId: connection.id, silentFor });
        this.connections.delete(connection);
        connection.close(new ConnectionLostError('heartbeat timeout'));
      } else {
        connection.probe();
      }
    }
  }
}
