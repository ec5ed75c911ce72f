import { describe, expect, it } from 'vitest';
import { GameServer } from '../src/game/GameServer.js';
import { type JsonResponder, createStatusApp, sendHealth, sendStats } from '../src/status/statusApp.js';

function recorder(): JsonResponder & { bodies: unknown[] } {
  const bodies: unknown[] = [];
  return {
    bodies,
    json(body: unknown) {
      bodies.push(body);
      return this;
    },
  };
}

describe('status API', () => {
  it('should report health', () => {
    const res = recorder();

    sendHealth(res);

    expect(res.bodies).toEqual([{ status: 'ok' }]);
  });

  it('should report the server snapshot as stats', () => {
    const res = recorder();

    sendStats(new GameServer(), res);

    expect(res.bodies).toEqual([{ connections: 0, players: 0, queued: [], sessions: [] }]);
  });

  it('should build an express app', () => {
    const app = createStatusApp(new GameServer());

    expect(typeof app.listen).toBe('function');
  });
});
