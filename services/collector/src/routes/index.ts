import { Router, type Request, type Response, type NextFunction } from 'express';
import { httpReqDuration } from '../metrics/metrics.js';
import type { CollectorControl } from '../services/control.service.js';
import type { HealthDeps } from '../services/health.service.js';
import { collectionRoutes } from './collection.routes.js';
import { opsRoutes } from './ops.routes.js';

export type ApiDeps = {
  control: CollectorControl;
  health: HealthDeps;
  apiKey: string | undefined;
};

export function apiRouter(deps: ApiDeps) {
  const r = Router();
  r.use((req: Request, res: Response, next: NextFunction) => {
    const end = httpReqDuration.startTimer({ method: req.method, route: req.path });
    res.on('finish', () => end({ code: String(res.statusCode) }));
    next();
  });
  r.use(opsRoutes(deps.health));
  r.use(collectionRoutes(deps.control, deps.apiKey));
  r.use((_req, res) => res.status(404).json({ error: { code: 'NOT_FOUND', message: 'route' } }));
  return r;
}
