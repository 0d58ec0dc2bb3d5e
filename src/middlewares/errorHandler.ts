import { Request, Response, NextFunction } from 'express';
import * as functions from 'firebase-functions';
import { z } from 'zod';
import { RepositoryValidationError } from '../services/repositories/common/errors';

export function errorHandler(err: Error, req: Request, res: Response, next: NextFunction) {
  // If headers have already been sent, delegate to the default Express error handler
  if (res.headersSent) {
    return next(err);
  }

  if (err instanceof z.ZodError) {
    res.status(400).json({
      code: 'validation_failed',
      message: 'Invalid request body',
      details: err.errors,
    });
    return;
  }

  if (err instanceof RepositoryValidationError) {
    res.status(400).json({
      code: err.code,
      message: err.message,
    });
    return;
  }

  functions.logger.error('[errorHandler] Unhandled error', {
    path: req.path,
    method: req.method,
    error: err.message,
  });

  if (process.env.NODE_ENV === 'production') {
    // No stack traces outside development
    res.status(500).json({
      code: 'server_error',
      message: 'An unexpected error occurred',
    });
  } else {
    res.status(500).json({
      code: 'server_error',
      message: err.message,
      stack: err.stack,
    });
  }
}
