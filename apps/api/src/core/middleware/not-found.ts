import type { RequestHandler } from 'express';

/** Terminal handler for paths no router claimed. */
export const notFoundHandler: RequestHandler = (req, res) => {
  res.status(404).json({
    message: 'Route not found',
    path: req.originalUrl,
    requestId: req.id,
  });
};
