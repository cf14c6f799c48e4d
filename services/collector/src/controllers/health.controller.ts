import type { Request, Response } from 'express';
import { readinessSvc, type HealthDeps } from '../services/health.service.js';

export async function liveness(_req: Request, res: Response) {
  res.json({ ok: true });
}

export function readinessCtrl(deps: HealthDeps) {
  return async (_req: Request, res: Response) => {
    const result = await readinessSvc(deps);
    res.status(result.status === 'ready' ? 200 : 503).json(result);
  };
}
