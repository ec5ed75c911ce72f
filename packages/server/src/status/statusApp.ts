import express, { type Express, type Request, type Response, Router } from 'express';
import type { ServerSnapshot } from '../game/GameServer.js';

/**
 * Anything that can describe the running server.
 */
export interface StatusSource {
  snapshot(): ServerSnapshot;
}

/**
 * The slice of an express Response the status routes write to.
 */
export interface JsonResponder {
  json(body: unknown): unknown;
}

export function sendHealth(res: JsonResponder): void {
  res.json({ status: 'ok' });
}

export function sendStats(source: StatusSource, res: JsonResponder): void {
  res.json(source.snapshot());
}

export function createStatusRouter(source: StatusSource): Router {
  const router = Router();

  /**
   * GET /api/health - Liveness check
   */
  router.get('/health', (_req: Request, res: Response) => {
    sendHealth(res);
  });

  /**
   * GET /api/stats - Connections, queue and live sessions
   */
  router.get('/stats', (_req: Request, res: Response) => {
    sendStats(source, res);
  });

  return router;
}

export function createStatusApp(source: StatusSource): Express {
  const app = express();
  app.use('/api', createStatusRouter(source));
  return app;
}
