/**
 * @fileoverview Transport-agnostic connection contract.
 *
 * The server core only ever talks to a connection through this interface,
 * which lets TCP sockets, WebSockets and in-memory test doubles stand in
 * for one another.
 */

import type { InboundFrame } from './codec.js';
import type { ServerMessage } from './messages.js';

/**
 * A bidirectional, ordered message channel.
 */
export interface Channel<TInbound, TOutbound> {
  /** Identifier for logging */
  readonly id: string;

  /** Peer address for logging, if known */
  readonly remoteAddress: string;

  /** Whether the channel can still send */
  readonly isOpen: boolean;

  /**
   * Wait for the next inbound frame.
   * Resolves `null` at end of stream, which includes half-close, socket errors and `close()`.
   */
  receive(): Promise<TInbound | null>;

  /**
   * Queue a message for ordered transmission. Never waits for the peer.
   * Messages sent after close are dropped.
   */
  send(message: TOutbound): void;

  /**
   * Close the channel. Safe to call any number of times from any path.
   * @param reason - Recorded for logging and passed to close listeners
   */
  close(reason?: Error): void;

  /**
   * Register a listener invoked exactly once when the channel closes.
   */
  onClose(listener: (reason: Error | undefined) => void): void;
}

/**
 * Connection to a Broadside client speaking the structured line protocol.
 */
export type ConnectionHandle = Channel<InboundFrame, ServerMessage>;
