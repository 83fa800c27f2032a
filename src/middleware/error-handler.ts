import { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { logger } from '../core/logger';
import { DomainError, ErrorFactory } from '../core/errors';

const handleZodValidationError = (error: z.ZodError, res: Response) => {
  const fieldErrors = error.errors.map(err => ({
    field: err.path.join('.'),
    message: err.message,
    value: 'received' in err ? err.received : undefined,
  }));

  return res.status(400).json({
    success: false,
    error: {
      name: 'ValidationError',
      message: `Validation failed: ${fieldErrors.map(e => `${e.field}: ${e.message}`).join(', ')}`,
      code: 'VALIDATION_ERROR',
      statusCode: 400,
      timestamp: new Date().toISOString(),
      details: { fieldErrors }
    },
  });
};

// Body parser failures carry an HTTP status and a `type`
const isBodyParserError = (error: Error): error is Error & { status: number; type: string } =>
  'status' in error && typeof error.status === 'number' && 'type' in error && typeof error.type === 'string';

const handleBodyParserError = (error: Error & { status: number; type: string }, res: Response) => {
  return res.status(error.status).json({
    success: false,
    error: {
      name: 'BadRequestError',
      message: error.message,
      code: error.type === 'entity.too.large' ? 'PAYLOAD_TOO_LARGE' : 'BAD_REQUEST',
      statusCode: error.status,
      timestamp: new Date().toISOString(),
    },
  });
};

const handleGenericError = (error: Error, res: Response) => {
  const isDevelopment = process.env['NODE_ENV'] === 'development';
  return res.status(500).json({
    success: false,
    error: {
      name: 'InternalServerError',
      message: 'Internal server error',
      code: 'INTERNAL_SERVER_ERROR',
      statusCode: 500,
      timestamp: new Date().toISOString(),
      ...(isDevelopment && { stack: error.stack }),
    },
  });
};

export const errorHandler = (error: Error, req: Request, res: Response, _next: NextFunction) => {
  logger.error({ error, req: { id: req.id, method: req.method, url: req.url } }, 'Request error');

  if (error instanceof DomainError) {
    return res.status(error.statusCode).json(ErrorFactory.createErrorResponse(error));
  }

  if (error instanceof z.ZodError) {
    return handleZodValidationError(error, res);
  }

  if (isBodyParserError(error)) {
    return handleBodyParserError(error, res);
  }

  return handleGenericError(error, res);
};
