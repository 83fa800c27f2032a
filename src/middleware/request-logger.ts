import { Request, Response, NextFunction } from 'express';
import { logger } from '../core/logger';
import { incrementRequests, incrementErrors } from '../utils/metrics';

export const requestLoggerMiddleware = (req: Request, res: Response, next: NextFunction) => {
  const startTime = Date.now();

  logger.info({
    method: req.method,
    url: req.url,
    requestId: req.id,
    userAgent: req.get('User-Agent'),
    ip: req.ip,
  }, 'Request started');

  res.on('finish', () => {
    const durationMs = Date.now() - startTime;

    logger.info({
      method: req.method,
      url: req.url,
      status: res.statusCode,
      durationMs,
      requestId: req.id,
      contentLength: res.get('Content-Length'),
    }, 'Request completed');

    incrementRequests();
    if (res.statusCode >= 400) {
      incrementErrors();
    }
  });

  next();
};
