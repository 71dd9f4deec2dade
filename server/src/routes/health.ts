import { Router } from 'express';

const router = Router();

router.get('/health', (_req, res) => {
  res.json({ status: 'ok', service: 'ttt-arena', version: '0.1.0' });
});

export default router;
