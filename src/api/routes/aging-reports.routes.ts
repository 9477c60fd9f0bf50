/**
 * Aging Report Routes
 */

import { Router, Request, Response, NextFunction } from 'express';
import { RunAgingReportCommand } from '../../application/commands/run-aging-report.command';
import { SendNoticeCommand } from '../../application/commands/send-notice.command';
import { GetAgingReportQuery } from '../../application/queries/get-aging-report.query';
import { NotFoundError } from '../../domain/errors';
import {
  agingReportFilename,
  buildAgingReportWorkbook,
} from '../../infrastructure/reports/aging-report-workbook';
import { validateRequired } from '../middleware/validation';

export function createAgingReportsRouter(
  runAgingReportCommand: RunAgingReportCommand,
  sendNoticeCommand: SendNoticeCommand,
  getAgingReportQuery: GetAgingReportQuery
): Router {
  const router = Router();

  /**
   * POST /api/aging-reports
   * Aggregate the current invoice file and store the report
   */
  router.post('/', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const report = await runAgingReportCommand.execute();
      res.status(201).json(report);
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /api/aging-reports/latest
   */
  router.get('/latest', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const report = await getAgingReportQuery.latest();
      if (!report) {
        throw new NotFoundError('No aging report has been run yet');
      }
      res.json(report);
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /api/aging-reports/latest/export
   * The latest report as an .xlsx download
   */
  router.get('/latest/export', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const report = await getAgingReportQuery.latest();
      if (!report) {
        throw new NotFoundError('No aging report has been run yet');
      }
      const content = buildAgingReportWorkbook(report);
      res.attachment(agingReportFilename(report));
      res.send(content);
    } catch (error) {
      next(error);
    }
  });

  /**
   * POST /api/aging-reports/latest/notices
   * Body: { recipient_id, notice_type, invoice_ids? }
   */
  router.post(
    '/latest/notices',
    validateRequired(['recipient_id', 'notice_type']),
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const notice = await sendNoticeCommand.execute({
          recipient_id: String(req.body.recipient_id),
          notice_type: String(req.body.notice_type),
          invoice_ids: req.body.invoice_ids,
        });
        res.status(201).json(notice);
      } catch (error) {
        next(error);
      }
    }
  );

  return router;
}
