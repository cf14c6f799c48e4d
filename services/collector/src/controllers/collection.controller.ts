import type { Request, Response } from 'express';
import type { CollectorControl, TriggerOutcome } from '../services/control.service.js';

function sendTrigger(res: Response, job: string, outcome: TriggerOutcome) {
  if (outcome.accepted) return res.status(202).json({ job, accepted: true });
  const status = outcome.rejected === 'already_running' ? 409 : 404;
  return res.status(status).json({
    error: { code: outcome.rejected.toUpperCase(), message: `${job} collection not started: ${outcome.rejected}` }
  });
}

export function collectionControllers(control: CollectorControl) {
  return {
    triggerCurrent: async (_req: Request, res: Response) =>
      sendTrigger(res, 'current', control.triggerCurrentCollection()),

    triggerHistorical: async (_req: Request, res: Response) =>
      sendTrigger(res, 'historical', control.triggerHistoricalCollection()),

    status: async (_req: Request, res: Response) =>
      res.json({ schedulerRunning: control.isSchedulerRunning(), jobs: control.getJobStatus() }),

    stats: async (_req: Request, res: Response) =>
      res.json(await control.getCollectionStats()),
  };
}
