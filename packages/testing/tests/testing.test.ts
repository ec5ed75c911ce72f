/**
 * @fileoverview Tests for the testing utilities themselves.
 */

import { describe, expect, it } from 'vitest';
import { createMockHandle, flushMicrotasks } from '../src/index.js';

describe('createMockHandle', () => {
  it('should start open with nothing sent', () => {
    const handle = createMockHandle();

    expect(handle.isOpen).toBe(true);
    expect(handle.isClosed).toBe(false);
    expect(handle.sent).toEqual([]);
    expect(handle.remoteAddress).toBe('127.0.0.1');
    expect(handle.id).toMatch(/^mock-\d+$/);
  });

  it('should record sent messages and filter them by type', () => {
    const handle = createMockHandle();
    handle.send({ type: 'waiting_for_opponent' });
    handle.send({ type: 'turn_change', current_player: 2 });

    expect(handle.sent).toHaveLength(2);
    expect(handle.sentOfType('turn_change')).toEqual([{ type: 'turn_change', current_player: 2 }]);

    handle.clearSent();
    expect(handle.sent).toEqual([]);
  });

  it('should decode delivered records like the wire would', async () => {
    const handle = createMockHandle();
    handle.deliver({ name: 'Alice' });
    handle.deliverRaw('not json');

    expect(await handle.receive()).toEqual({ ok: true, message: { type: 'name', name: 'Alice' } });
    const bad = await handle.receive();
    expect(bad?.ok).toBe(false);
  });

  it('should wake a waiting receiver', async () => {
    const handle = createMockHandle();
    const next = handle.receive();

    handle.deliver({ type: 'pong' });

    expect(await next).toEqual({ ok: true, message: { type: 'pong' } });
  });

  it('should hand out queued frames before reporting the end', async () => {
    const handle = createMockHandle();
    handle.deliver({ type: 'pong' });
    handle.end();

    expect(await handle.receive()).toEqual({ ok: true, message: { type: 'pong' } });
    expect(await handle.receive()).toBeNull();
  });

  it('should close once and release waiters', async () => {
    const handle = createMockHandle();
    const reasons: (Error | undefined)[] = [];
    handle.onClose((reason) => reasons.push(reason));
    const next = handle.receive();
    const reason = new Error('gone');

    handle.close(reason);
    handle.close();

    expect(await next).toBeNull();
    expect(handle.closeCount).toBe(1);
    expect(handle.closeReason).toBe(reason);
    expect(reasons).toEqual([reason]);
  });

  it('should not record messages after close', () => {
    const handle = createMockHandle();
    handle.close();
    handle.send({ type: 'waiting_for_opponent' });

    expect(handle.sent).toEqual([]);
  });

  it('should count probes', () => {
    const handle = createMockHandle();
    handle.probe();
    handle.probe();

    expect(handle.probes).toBe(2);
  });
});

describe('flushMicrotasks', () => {
  it('should let pending continuations run', async () => {
    let ran = false;
    void Promise.resolve().then(() => {
      ran = true;
    });

    await flushMicrotasks();

    expect(ran).toBe(true);
  });
});
