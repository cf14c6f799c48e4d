import { Router } from 'express';
import { collectionControllers } from '../controllers/collection.controller.js';
import { asyncHandler } from '../middleware/async-handler.js';
import { requireApiKey } from '../middleware/auth.js';
import type { CollectorControl } from '../services/control.service.js';

export function collectionRoutes(control: CollectorControl, apiKey: string | undefined) {
  const c = collectionControllers(control);
  const r = Router();
  r.get('/collection/status', asyncHandler(c.status));
  r.get('/collection/stats', asyncHandler(c.stats));
  r.post('/collection/trigger/current', requireApiKey(apiKey), asyncHandler(c.triggerCurrent));
  r.post('/collection/trigger/historical', requireApiKey(apiKey), asyncHandler(c.triggerHistorical));
  return r;
}
