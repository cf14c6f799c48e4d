import { Router } from 'express';
import { liveness, readinessCtrl } from '../controllers/health.controller.js';
import { promMetrics } from '../controllers/metrics.controller.js';
import { asyncHandler } from '../middleware/async-handler.js';
import type { HealthDeps } from '../services/health.service.js';

export function opsRoutes(health: HealthDeps) {
  const ops = Router();
  ops.get('/health/liveness', liveness);
  ops.get('/health/readiness', asyncHandler(readinessCtrl(health)));
  ops.get('/ops/metrics', asyncHandler(promMetrics));
  return ops;
}
