import { Router } from 'express';
import type { GameContext } from '../context';

export const SERVICE_VERSION = '0.1.0';

export function createHealthRouter(ctx: GameContext): Router {
  const router = Router();

  router.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      service: 'tic-tac-toe',
      version: SERVICE_VERSION,
      players: ctx.registry.size,
      waiting: ctx.matchmaker.hasWaitingPlayer ? 1 : 0,
      sessions: ctx.games.activeCount,
      connections: ctx.capacity.inUse,
    });
  });

  return router;
}
