import type { ErrorRequestHandler } from 'express';
import { logger } from '../logger/index.js';
import { HttpError } from '../../shared/errors.js';

export const errorHandler: ErrorRequestHandler = (err: unknown, req, res, next) => {
  if (res.headersSent) {
    return next(err);
  }

  if (err instanceof HttpError) {
    // Statuses below 500 are the caller's to fix
    if (err.status < 500) {
      logger.warn({ err, status: err.status, path: req.path, method: req.method }, 'HttpError (user-actionable)');
      return res.status(err.status).json({
        message: err.message,
        requestId: req.id,
        details: err.details,
      });
    }

    logger.error(
      { err, status: err.status, details: err.details, path: req.path, method: req.method },
      'HttpError (server error)',
    );
    return res.status(err.status).json({
      message: err.message,
      requestId: req.id,
    });
  }

  logger.error(
    {
      err,
      status: 500,
      path: req.path,
      method: req.method,
      errorName: err instanceof Error ? err.name : undefined,
      errorMessage: err instanceof Error ? err.message : String(err),
    },
    'Unhandled error',
  );

  res.status(500).json({
    message: 'Internal server error',
    requestId: req.id,
  });
};
