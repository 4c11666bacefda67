import { Router } from 'express';
import authRouter from '@/features/auth/auth.route';
import agentsRouter from '@/features/agents/agents.route';
import runsRouter from '@/features/runs/runs.route';

const router = Router();

router.get('/health', (_req, res) => {
  res.json({ status: 'ok' });
});
router.use('/auth', authRouter);
router.use('/agents', agentsRouter);
router.use('/runs', runsRouter);

export default router;
