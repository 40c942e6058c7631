import { Router } from 'express';

export interface HealthStatus {
  status: 'healthy';
  /** Seconds since the Unix epoch, with sub-second precision */
  timestamp: number;
}

export const createHealthRouter = () => {
  const router = Router();

  router.get('/', (_req, res) => {
    const body: HealthStatus = {
      status: 'healthy',
      timestamp: Date.now() / 1000,
    };

    res.json(body);
  });

  return router;
};
