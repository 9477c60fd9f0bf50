/**
 * Statement Routes
 * Manual statement sends
 */

import { Router, Request, Response, NextFunction } from 'express';
import { SendStatementCommand } from '../../application/commands/send-statement.command';

export function createStatementsRouter(sendStatementCommand: SendStatementCommand): Router {
  const router = Router();

  /**
   * POST /api/statements/:recipient_id/send
   * Send a recipient's statement now from the current invoice file
   */
  router.post('/:recipient_id/send', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const result = await sendStatementCommand.execute(req.params.recipient_id);
      res.json({ status: 'sent', ...result });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
