/**
 * @fileoverview Read-only HTTP status endpoint for an operator.
 */

import express, { type Express, type Request, type Response, Router } from 'express';
import type { RLGMOrchestrator } from '../league/RLGMOrchestrator.js';

export function createStatusRouter(orchestrator: RLGMOrchestrator): Router {
  const router = Router();

  /**
   * GET /status - Season state, current round and active game progress
   */
  router.get('/status', (_req: Request, res: Response) => {
    const status = orchestrator.getStatus();
    res.json({
      state: status.state,
      season_id: status.seasonId,
      current_round: status.currentRound,
      active_game: status.activeGame,
      last_game_result: status.lastGameResult,
    });
  });

  return router;
}

export function createStatusApp(orchestrator: RLGMOrchestrator): Express {
  const app = express();

  app.use(createStatusRouter(orchestrator));

  // Health check
  app.get('/health', (_req, res) => {
    res.json({ status: 'ok' });
  });

  return app;
}
