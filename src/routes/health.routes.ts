import { Router } from 'express';
import { config } from '../core/config';
import { logger } from '../core/logger';

const router = Router();

// Reports the policies simulations will run under
router.get('/', (req, res) => {
  logger.debug({ req: { id: req.id } }, 'Health check requested');
  res.json({
    success: true,
    data: {
      status: 'healthy',
      uptime: process.uptime(),
      policies: {
        stackSize: config.STACK_SIZE_POLICY,
        unresolved: config.UNRESOLVED_POLICY,
      },
    },
  });
});

export { router as healthRoutes };
