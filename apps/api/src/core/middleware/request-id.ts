import type { RequestHandler } from 'express';
import { randomUUID } from 'crypto';

const MAX_INCOMING_ID_LENGTH = 128;

export const requestId: RequestHandler = (req, res, next) => {
  const incoming = req.get('x-request-id');
  req.id ||= incoming && incoming.length <= MAX_INCOMING_ID_LENGTH ? incoming : randomUUID();
  res.setHeader('X-Request-Id', String(req.id));
  next();
};
