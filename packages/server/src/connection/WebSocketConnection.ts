/**
 * @fileoverview Connection handle over a WebSocket.
 *
 * Each text message carries one or more newline-separated records. Liveness
 * probes use native ping frames, and a pong counts as activity.
 */

import type { EventEmitter } from 'node:events';
import {
  type ConnectionHandle,
  decodeClientFrame,
  type InboundFrame,
  type ServerMessage,
} from '@broadside/protocol';
import { type RawData, WebSocket } from 'ws';
import { ConnectionLostError } from '../errors.js';
import { logger } from '../utils/logger.js';
import { BaseConnection } from './BaseConnection.js';

/**
 * The part of a ws.WebSocket the handle relies on.
 * ws.WebSocket instances satisfy it directly.
 */
export interface WebSocketLike extends EventEmitter {
  readonly readyState: number;
  readonly bufferedAmount: number;
  send(data: string): void;
  ping(): void;
  close(code?: number, reason?: string): void;
  terminate(): void;
}

/** Normal closure status code */
const CLOSE_NORMAL = 1000;

export class WebSocketConnection
  extends BaseConnection<InboundFrame, ServerMessage>
  implements ConnectionHandle
{
  constructor(
    private readonly ws: WebSocketLike,
    remoteAddress: string,
    private readonly maxBufferedBytes = 1024 * 1024,
    private readonly closeGraceMs = 2_000
  ) {
    super('ws', remoteAddress);

    ws.on('message', (data: RawData) => this.onMessage(data));
    ws.on('pong', () => this.markActivity());
    ws.on('error', (error: Error) => {
      logger.debug('WebSocket error', { connectionId: this.id, error });
      this.close(new ConnectionLostError(error.message));
    });
    ws.on('close', () => this.close(new ConnectionLostError('websocket closed')));
  }

  probe(): void {
    if (this.isOpen && this.ws.readyState === WebSocket.OPEN) {
      this.ws.ping();
    }
  }

  protected transmit(message: ServerMessage): void {
    if (this.ws.readyState !== WebSocket.OPEN) {
      return;
    }
    this.ws.send(JSON.stringify(message));

    if (this.ws.bufferedAmount > this.maxBufferedBytes) {
      this.close(new ConnectionLostError('output buffer exceeded'));
    }
  }

  protected teardown(reason: Error | undefined): void {
    if (reason instanceof ConnectionLostError) {
      this.ws.terminate();
      return;
    }

    this.ws.close(CLOSE_NORMAL);
    const timer = setTimeout(() => this.ws.terminate(), this.closeGraceMs);
    timer.unref();
    this.ws.once('close', () => clearTimeout(timer));
  }

  private onMessage(data: RawData): void {
    for (const line of rawDataToString(data).split('\n')) {
      const trimmed = line.replace(/\r$/, '');
      if (trimmed.trim().length > 0) {
        this.deliverFrame(decodeClientFrame(trimmed));
      }
    }
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
