/**
 * @fileoverview Transport-independent half of a connection handle.
 *
 * Owns the inbound frame queue, the receivers waiting on it, liveness
 * tracking and close-once semantics. Transports feed frames in with
 * `deliverFrame` and implement `transmit`, `probe` and `teardown`.
 */

import { randomUUID } from 'node:crypto';
import type { Channel } from '@broadside/protocol';

export abstract class BaseConnection<TInbound, TOutbound> implements Channel<TInbound, TOutbound> {
  readonly id: string;
  private readonly inbox: TInbound[] = [];
  private readonly waiters: ((frame: TInbound | null) => void)[] = [];
  private readonly closeListeners: ((reason: Error | undefined) => void)[] = [];
  private ended = false;
  private closed = false;
  private _closeReason: Error | undefined;
  private _lastActivityAt = Date.now();

  protected constructor(
    idPrefix: string,
    readonly remoteAddress: string
  ) {
    this.id = `${idPrefix}-${randomUUID().slice(0, 8)}`;
  }

  // ============ Channel ============

  get isOpen(): boolean {
    return !this.closed;
  }

  receive(): Promise<TInbound | null> {
    if (this.closed) {
      return Promise.resolve(null);
    }
    if (this.inbox.length > 0) {
      const next = this.inbox.shift();
      return Promise.resolve(next ?? null);
    }
    if (this.ended) {
      return Promise.resolve(null);
    }
    return new Promise((resolve) => this.waiters.push(resolve));
  }

  send(message: TOutbound): void {
    if (this.closed) {
      return;
    }
    this.transmit(message);
  }

  close(reason?: Error): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this._closeReason = reason;
    this.inbox.length = 0;
    this.releaseWaiters();
    this.teardown(reason);

    for (const listener of this.closeListeners.splice(0)) {
      listener(reason);
    }
  }

  onClose(listener: (reason: Error | undefined) => void): void {
    if (this.closed) {
      listener(this._closeReason);
      return;
    }
    this.closeListeners.push(listener);
  }

  // ============ Liveness ============

  /** Last time anything arrived from the peer (ms since epoch) */
  get lastActivityAt(): number {
    return this._lastActivityAt;
  }

  get closeReason(): Error | undefined {
    return this._closeReason;
  }

  /**
   * Ask the peer to prove it is alive.
   */
  abstract probe(): void;

  // ============ Transport Hooks ============

  protected abstract transmit(message: TOutbound): void;

  /**
   * Release the underlying transport. Called once, from `close()`.
   */
  protected abstract teardown(reason: Error | undefined): void;

  protected markActivity(): void {
    this._lastActivityAt = Date.now();
  }

  protected deliverFrame(frame: TInbound): void {
    if (this.closed || this.ended) {
      return;
    }
    this.markActivity();

    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(frame);
    } else {
      this.inbox.push(frame);
    }
  }

  /**
   * The peer will send nothing more. Frames already queued are still handed out.
   */
  protected endOfStream(): void {
    this.ended = true;
    if (this.inbox.length === 0) {
      this.releaseWaiters();
    }
  }

  private releaseWaiters(): void {
    for (const waiter of this.waiters.splice(0)) {
      waiter(null);
    }
  }
}
