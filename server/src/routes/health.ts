import { Router, Request, Response } from 'express';
import { getDatabase } from '../db';
import logger from '../utils/logger';

const router = Router();

router.get('/', (_req: Request, res: Response) => {
  try {
    // Test database connection
    const result = getDatabase().prepare('SELECT 1 as ok').get() as { ok: number };

    res.json({
      status: 'healthy',
      timestamp: new Date().toISOString(),
      database: result.ok === 1 ? 'connected' : 'error'
    });
  } catch (error) {
    logger.error({ err: error }, 'health check failed');
    res.status(503).json({
      status: 'unhealthy',
      timestamp: new Date().toISOString(),
      database: 'error'
    });
  }
});

export default router;
