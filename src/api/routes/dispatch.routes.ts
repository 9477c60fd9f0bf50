/**
 * Dispatch Routes
 * API endpoints for the dispatch job queue
 */

import { Router, Request, Response, NextFunction } from 'express';
import { EnqueueDispatchCommand } from '../../application/commands/enqueue-dispatch.command';
import {
  DEFAULT_JOB_LIST_LIMIT,
  GetDispatchJobsQuery,
} from '../../application/queries/get-dispatch-jobs.query';
import { ValidationError } from '../../domain/errors';
import { parseLimit } from '../middleware/validation';

/**
 * Create Dispatch Router
 */
export function createDispatchRouter(
  enqueueDispatchCommand: EnqueueDispatchCommand,
  getDispatchJobsQuery: GetDispatchJobsQuery
): Router {
  const router = Router();

  /**
   * POST /api/dispatch/jobs
   * Enqueue a job for the recipients due today
   */
  router.post('/jobs', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const result = await enqueueDispatchCommand.execute();

      switch (result.status) {
        case 'enqueued':
          res.status(201).json({ status: result.status, job_id: result.job.job_id, job: result.job });
          return;
        case 'already_active':
          res.status(409).json({
            status: result.status,
            job_id: result.job?.job_id ?? null,
            message: 'A dispatch job is already queued or running',
          });
          return;
        case 'nothing_due':
          res.json({ status: result.status, message: 'No recipients are due today' });
          return;
      }
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /api/dispatch/jobs/active
   * The queued or running job, or null
   */
  router.get('/jobs/active', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const job = await getDispatchJobsQuery.active();
      res.json({ job });
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /api/dispatch/jobs?limit=20
   * Recent jobs, newest first
   */
  router.get('/jobs', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const limit = parseLimit(req.query.limit, DEFAULT_JOB_LIST_LIMIT);
      if (limit === null) {
        throw new ValidationError('limit must be a positive integer');
      }

      const jobs = await getDispatchJobsQuery.recent(limit);
      res.json({ count: jobs.length, jobs });
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /api/dispatch/jobs/:job_id/items
   * Per-recipient items of a job
   */
  router.get('/jobs/:job_id/items', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const items = await getDispatchJobsQuery.items(req.params.job_id);
      res.json({ count: items.length, items });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
