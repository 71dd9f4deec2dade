import { Router } from 'express';
import type { LobbyStats } from '../services/matchmakingService';

export interface ServerStats extends LobbyStats {
  sessions: number;
}

export function createStatsRouter(getStats: () => ServerStats) {
  const router = Router();

  router.get('/stats', (_req, res) => {
    res.json(getStats());
  });

  return router;
}
