import express, { Request, Response } from 'express';
import { config } from './core/config';
import { errorHandler } from './middleware/error-handler';
import { requestIdMiddleware } from './middleware/request-id';
import { requestLoggerMiddleware } from './middleware/request-logger';
import { healthRoutes } from './routes/health.routes';
import { simulationRoutes } from './routes/simulation.routes';
import { metricsRoutes } from './routes/metrics.routes';

const app = express();

// Middleware
app.use(requestIdMiddleware);
app.use(requestLoggerMiddleware);
app.use(express.json({ limit: config.BODY_LIMIT }));

// Routes
app.use('/api/health', healthRoutes);
app.use('/api/simulations', simulationRoutes);
app.use('/api/metrics', metricsRoutes);

// 404 handler for unknown routes
app.use('*', (_req: Request, res: Response) => {
  res.status(404).json({
    success: false,
    error: {
      name: 'NotFoundError',
      message: 'Route not found',
      code: 'NOT_FOUND',
      statusCode: 404,
      timestamp: new Date().toISOString(),
    },
  });
});

// Error handling
app.use(errorHandler);

export { app };
