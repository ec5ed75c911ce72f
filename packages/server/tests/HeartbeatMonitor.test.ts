import { createMockHandle } from '@broadside/testing';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { ConnectionLostError } from '../src/errors.js';
import { HeartbeatMonitor } from '../src/utils/HeartbeatMonitor.js';

describe('HeartbeatMonitor', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should probe connections that are still alive', () => {
    const monitor = new HeartbeatMonitor({ intervalMs: 1000, timeoutMs: 3000 });
    const handle = createMockHandle();
    monitor.watch(handle);
    monitor.start();

    vi.advanceTimersByTime(2000);

    expect(handle.probes).toBe(2);
    expect(handle.isClosed).toBe(false);

    monitor.stop();
  });

  it('should close a connection silent for the timeout', () => {
    const monitor = new HeartbeatMonitor({ intervalMs: 1000, timeoutMs: 3000 });
    const handle = createMockHandle();
    monitor.watch(handle);
    monitor.start();

    vi.advanceTimersByTime(3000);

    expect(handle.isClosed).toBe(true);
    expect(handle.closeReason).toBeInstanceOf(ConnectionLostError);
    expect(handle.closeReason?.message).toBe('Connection lost: heartbeat timeout');
    expect(handle.probes).toBe(2);
    expect(monitor.size).toBe(0);

    monitor.stop();
  });

  it('should keep a connection that keeps talking', () => {
    const monitor = new HeartbeatMonitor({ intervalMs: 1000, timeoutMs: 3000 });
    const handle = createMockHandle();
    monitor.watch(handle);
    monitor.start();

    for (let i = 0; i < 5; i++) {
      vi.advanceTimersByTime(2000);
      handle.deliver({ type: 'pong' });
    }

    expect(handle.isClosed).toBe(false);

    monitor.stop();
  });

  it('should forget closed and unwatched connections', () => {
    const monitor = new HeartbeatMonitor({ intervalMs: 1000, timeoutMs: 3000 });
    const closed = createMockHandle();
    const unwatched = createMockHandle();
    monitor.watch(closed);
    monitor.watch(unwatched);
    closed.close();
    monitor.unwatch(unwatched);

    monitor.check();

    expect(monitor.size).toBe(0);
    expect(closed.probes).toBe(0);
    expect(unwatched.probes).toBe(0);
  });

  it('should stop checking after stop', () => {
    const monitor = new HeartbeatMonitor({ intervalMs: 1000, timeoutMs: 3000 });
    const handle = createMockHandle();
    monitor.watch(handle);
    monitor.start();
    monitor.stop();

    vi.advanceTimersByTime(10_000);

    expect(handle.probes).toBe(0);
    expect(monitor.isRunning).toBe(false);
  });
});
