import { Router, NextFunction, Request, Response } from 'express';
import { logger } from '../core/logger';
import { SimulationRequestSchema } from '../core/types';
import { validateBody } from '../middleware/validate';
import { toInventoryView } from '../report/report.renderer';
import { fillService } from '../services/fill.service';

const router = Router();

// POST / (run a simulation over inline items and inventories text)
router.post('/',
  validateBody(SimulationRequestSchema),
  (req: Request, res: Response, next: NextFunction) => {
    try {
      const { items, inventories } = SimulationRequestSchema.parse(req.body);
      logger.info({ req: { id: req.id }, itemsBytes: items.length, inventoriesBytes: inventories.length }, 'Simulation requested');

      const result = fillService.run({ items, inventories });

      res.json({
        success: true,
        data: {
          report: result.report,
          inventories: result.results.map(toInventoryView),
          summary: result.summary,
        },
      });
    } catch (error) {
      next(error);
    }
  }
);

export { router as simulationRoutes };
