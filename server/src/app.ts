import express from 'express';
import cors from 'cors';
import type { GameContext } from './context';
import { createHealthRouter } from './routes/health';

export function createApp(ctx: GameContext, corsOrigin: string) {
  const app = express();

  app.use(cors({ origin: corsOrigin }));

  app.use('/', createHealthRouter(ctx));

  return app;
}
