import { Router } from 'express';

export const GREETING = "Hello! I'm a simple monitored service! 👋";

export const createHomeRouter = () => {
  const router = Router();

  router.get('/', (_req, res) => {
    res.type('text/plain').send(GREETING);
  });

  return router;
};
