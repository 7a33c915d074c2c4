// Liveness check; no auth, no downstream call
import { Router, Request, Response } from 'express';

const router = Router();

router.get('/', (_req: Request, res: Response): void => {
  res.status(200).json({ status: 'healthy' });
});

export default router;
