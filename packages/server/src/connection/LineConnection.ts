/**
 * @fileoverview Connection handle over a newline-framed byte stream (TCP).
 *
 * Outbound lines queue while the socket is write-blocked and flush on
 * `drain`. Once our queue plus the socket's own buffer exceeds the limit the
 * peer counts as unresponsive and the socket is destroyed.
 */

import type { Duplex } from 'node:stream';
import {
  type ConnectionHandle,
  DEFAULT_MAX_FRAME_BYTES,
  decodeClientFrame,
  encodeFrame,
  FrameTooLargeError,
  type InboundFrame,
  LineDecoder,
  type ServerMessage,
} from '@broadside/protocol';
import { ConnectionLostError } from '../errors.js';
import { logger } from '../utils/logger.js';
import { BaseConnection } from './BaseConnection.js';

/**
 * Turns lines into inbound frames and outbound messages into lines.
 */
export interface FrameCodec<TInbound, TOutbound> {
  decode(line: string): TInbound;
  encode(message: TOutbound): string;
  /** Message sent as a liveness probe, if the protocol has one */
  readonly probeMessage?: TOutbound;
}

export interface LineConnectionConfig {
  /** Outbound bytes (queued plus socket buffer) tolerated before the peer is dropped */
  maxBufferedBytes: number;
  /** Longest inbound line */
  maxFrameBytes: number;
  /** How long a graceful close may take before the socket is destroyed */
  closeGraceMs: number;
}

export const DEFAULT_LINE_CONNECTION_CONFIG: LineConnectionConfig = {
  maxBufferedBytes: 1024 * 1024,
  maxFrameBytes: DEFAULT_MAX_FRAME_BYTES,
  closeGraceMs: 2_000,
};

/**
 * Codec for the structured JSON line protocol.
 */
export const JSON_LINE_CODEC: FrameCodec<InboundFrame, ServerMessage> = {
  decode: decodeClientFrame,
  encode: encodeFrame,
  probeMessage: { type: 'ping' },
};

export class LineConnection<TInbound, TOutbound> extends BaseConnection<TInbound, TOutbound> {
  private readonly lines: LineDecoder;
  private readonly config: LineConnectionConfig;
  private readonly queued: string[] = [];
  private queuedBytes = 0;
  private writeBlocked = false;

  constructor(
    private readonly socket: Duplex,
    remoteAddress: string,
    private readonly codec: FrameCodec<TInbound, TOutbound>,
    config: Partial<LineConnectionConfig> = {},
    idPrefix = 'tcp'
  ) {
    super(idPrefix, remoteAddress);
    this.config = { ...DEFAULT_LINE_CONNECTION_CONFIG, ...config };
    this.lines = new LineDecoder(this.config.maxFrameBytes);

    socket.on('data', (chunk: Buffer | string) => this.onData(chunk));
    socket.on('end', () => this.onEnd());
    socket.on('drain', () => {
      this.writeBlocked = false;
      this.flush();
    });
    socket.on('error', (error: Error) => {
      logger.debug('Socket error', { connectionId: this.id, error });
      this.close(new ConnectionLostError(error.message));
    });
    socket.on('close', () => this.close(new ConnectionLostError('socket closed')));
  }

  probe(): void {
    if (this.codec.probeMessage !== undefined) {
      this.send(this.codec.probeMessage);
    }
  }

  /** Bytes waiting to be written, including the socket's own buffer */
  get bufferedBytes(): number {
    return this.queuedBytes + this.socket.writableLength;
  }

  protected transmit(message: TOutbound): void {
    const payload = this.codec.encode(message);
    this.queued.push(payload);
    this.queuedBytes += Buffer.byteLength(payload);
    this.flush();
  }

  protected teardown(reason: Error | undefined): void {
    if (reason instanceof ConnectionLostError) {
      this.socket.destroy();
      return;
    }

    // Written lines still flush; a peer that never closes its side is cut off after the grace period
    this.socket.end();
    const timer = setTimeout(() => this.socket.destroy(), this.config.closeGraceMs);
    timer.unref();
    this.socket.once('close', () => clearTimeout(timer));
  }

  private onData(chunk: Buffer | string): void {
    let lines: string[];
    try {
      lines = this.lines.push(chunk);
    } catch (error) {
      if (error instanceof FrameTooLargeError) {
        this.close(new ConnectionLostError(error.message));
        return;
      }
      throw error;
    }

    for (const line of lines) {
      this.deliverFrame(this.codec.decode(line));
    }
  }

  private onEnd(): void {
    for (const line of this.lines.end()) {
      this.deliverFrame(this.codec.decode(line));
    }
    this.endOfStream();
  }

  private flush(): void {
    while (!this.writeBlocked && this.queued.length > 0) {
      const payload = this.queued.shift();
      if (payload === undefined) break;
      this.queuedBytes -= Buffer.byteLength(payload);
      if (!this.socket.write(payload)) {
        this.writeBlocked = true;
      }
    }

    if (this.bufferedBytes > this.config.maxBufferedBytes) {
      this.close(new ConnectionLostError('output buffer exceeded'));
    }
  }
}

/**
 * Connection handle for the structured line protocol over TCP.
 */
export class TcpConnection
  extends LineConnection<InboundFrame, ServerMessage>
  implements ConnectionHandle
{
  constructor(socket: Duplex, remoteAddress: string, config: Partial<LineConnectionConfig> = {}) {
    super(socket, remoteAddress, JSON_LINE_CODEC, config, 'tcp');
  }
}
