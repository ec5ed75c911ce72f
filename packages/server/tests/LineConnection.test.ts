import { MalformedMessageError } from '@broadside/protocol';
import { flushMicrotasks } from '@broadside/testing';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { TcpConnection } from '../src/connection/LineConnection.js';
import { ConnectionLostError } from '../src/errors.js';
import { createFakeSocket } from './fakeSocket.js';

describe('TcpConnection', () => {
  describe('receive', () => {
    it('should reassemble frames split across chunks', async () => {
      const { socket } = createFakeSocket();
      const conn = new TcpConnection(socket, '10.0.0.1:5000');

      socket.push('{"name":"Al');
      socket.push('ice"}\n{"type":"pong"}\n');
      await flushMicrotasks();

      expect(await conn.receive()).toEqual({ ok: true, message: { type: 'name', name: 'Alice' } });
      expect(await conn.receive()).toEqual({ ok: true, message: { type: 'pong' } });
    });

    it('should hand out a malformed frame and keep reading', async () => {
      const { socket } = createFakeSocket();
      const conn = new TcpConnection(socket, '10.0.0.1:5000');

      socket.push('oops\r\n{"type":"find_match"}\r\n');
      await flushMicrotasks();

      const bad = await conn.receive();
      expect(bad?.ok).toBe(false);
      if (bad && !bad.ok) {
        expect(bad.error).toBeInstanceOf(MalformedMessageError);
        expect(bad.error.message).toBe('Malformed message: frame is not valid JSON');
      }
      expect(await conn.receive()).toEqual({ ok: true, message: { type: 'find_match' } });
      expect(conn.isOpen).toBe(true);
    });

    it('should wake a waiting receiver', async () => {
      const { socket } = createFakeSocket();
      const conn = new TcpConnection(socket, '10.0.0.1:5000');

      const next = conn.receive();
      socket.push('{"type":"pong"}\n');

      expect(await next).toEqual({ ok: true, message: { type: 'pong' } });
    });

    it('should decode an unterminated last line at end of stream', async () => {
      const { socket } = createFakeSocket();
      const conn = new TcpConnection(socket, '10.0.0.1:5000');

      socket.push('{"type":"pong"}');
      socket.push(null);
      await flushMicrotasks();

      expect(await conn.receive()).toEqual({ ok: true, message: { type: 'pong' } });
      expect(await conn.receive()).toBeNull();
    });

    it('should drop the peer when a frame outgrows the limit', async () => {
      const { socket } = createFakeSocket();
      const conn = new TcpConnection(socket, '10.0.0.1:5000', { maxFrameBytes: 16 });

      socket.push('x'.repeat(40));
      await flushMicrotasks();

      expect(conn.isOpen).toBe(false);
      expect(conn.closeReason).toBeInstanceOf(ConnectionLostError);
      expect(conn.closeReason?.message).toBe(
        'Connection lost: Frame exceeds 16 bytes without a line terminator'
      );
      expect(await conn.receive()).toBeNull();
    });
  });

  describe('send', () => {
    it('should write one line per message', async () => {
      const { socket, written } = createFakeSocket();
      const conn = new TcpConnection(socket, '10.0.0.1:5000');

      conn.send({ type: 'waiting_for_opponent' });
      conn.send({ type: 'turn_change', current_player: 2 });
      await flushMicrotasks();

      expect(written).toEqual([
        '{"type":"waiting_for_opponent"}\n',
        '{"type":"turn_change","current_player":2}\n',
      ]);
    });

    it('should probe with a ping record', async () => {
      const { socket, written } = createFakeSocket();
      const conn = new TcpConnection(socket, '10.0.0.1:5000');

      conn.probe();
      await flushMicrotasks();

      expect(written).toEqual(['{"type":"ping"}\n']);
    });

    it('should hold messages while blocked and flush them on drain', async () => {
      const fake = createFakeSocket({ blockWrites: true, highWaterMark: 16 });
      const conn = new TcpConnection(fake.socket, '10.0.0.1:5000');

      conn.send({ type: 'waiting_for_opponent' });
      conn.send({ type: 'opponent_disconnected' });
      expect(fake.written).toEqual(['{"type":"waiting_for_opponent"}\n']);

      fake.pending.shift()?.();
      await flushMicrotasks();

      expect(fake.written).toEqual([
        '{"type":"waiting_for_opponent"}\n',
        '{"type":"opponent_disconnected"}\n',
      ]);
      expect(conn.isOpen).toBe(true);
    });

    it('should drop a peer that stops reading', () => {
      const { socket, written } = createFakeSocket({ blockWrites: true, highWaterMark: 16 });
      const conn = new TcpConnection(socket, '10.0.0.1:5000', { maxBufferedBytes: 64 });

      // Each record is 32 bytes on the wire
      conn.send({ type: 'waiting_for_opponent' });
      conn.send({ type: 'waiting_for_opponent' });
      expect(conn.isOpen).toBe(true);
      conn.send({ type: 'waiting_for_opponent' });

      expect(conn.isOpen).toBe(false);
      expect(conn.closeReason?.message).toBe('Connection lost: output buffer exceeded');
      expect(written).toHaveLength(1);
    });

    it('should not write after close', async () => {
      const { socket, written } = createFakeSocket();
      const conn = new TcpConnection(socket, '10.0.0.1:5000');

      conn.close();
      conn.send({ type: 'waiting_for_opponent' });
      await flushMicrotasks();

      expect(written).toEqual([]);
    });
  });

  describe('close', () => {
    afterEach(() => {
      vi.useRealTimers();
    });

    it('should end the socket gracefully and notify listeners once', () => {
      const { socket } = createFakeSocket();
      const conn = new TcpConnection(socket, '10.0.0.1:5000');
      const reasons: (Error | undefined)[] = [];
      conn.onClose((reason) => reasons.push(reason));

      conn.close();
      conn.close(new ConnectionLostError('late'));

      expect(socket.writableEnded).toBe(true);
      expect(reasons).toEqual([undefined]);
    });

    it('should destroy a socket the peer keeps half open once the grace period ends', () => {
      vi.useFakeTimers();
      const { socket } = createFakeSocket();
      const conn = new TcpConnection(socket, '10.0.0.1:5000', { closeGraceMs: 500 });

      conn.close();
      vi.advanceTimersByTime(499);
      expect(socket.writableEnded).toBe(true);
      expect(socket.destroyed).toBe(false);

      vi.advanceTimersByTime(1);
      expect(socket.destroyed).toBe(true);
    });

    it('should close when the socket goes away', async () => {
      const { socket } = createFakeSocket();
      const conn = new TcpConnection(socket, '10.0.0.1:5000');
      const next = conn.receive();

      socket.destroy();

      expect(await next).toBeNull();
      expect(conn.isOpen).toBe(false);
      expect(conn.closeReason?.message).toBe('Connection lost: socket closed');
    });

    it('should report its peer and a tcp id', () => {
      const { socket } = createFakeSocket();
      const conn = new TcpConnection(socket, '10.0.0.1:5000');

      expect(conn.remoteAddress).toBe('10.0.0.1:5000');
      expect(conn.id).toMatch(/^tcp-[0-9a-f]{8}$/);
    });
  });
});
