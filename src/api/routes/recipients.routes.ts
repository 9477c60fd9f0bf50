/**
 * Recipients Routes
 * Minimal administration of the recipient directory
 */

import { Router, Request, Response, NextFunction } from 'express';
import { CreateRecipientCommand } from '../../application/commands/create-recipient.command';
import { AddRecipientAliasCommand } from '../../application/commands/add-recipient-alias.command';
import { AddGroupMemberCommand } from '../../application/commands/add-group-member.command';
import {
  ImportRecipientsCommand,
  RECIPIENT_IMPORT_COLUMNS,
} from '../../application/commands/import-recipients.command';
import {
  ImportCustomerMappingsCommand,
  MAPPING_IMPORT_COLUMNS,
} from '../../application/commands/import-customer-mappings.command';
import { GetRecipientsQuery } from '../../application/queries/get-recipients.query';
import { readImportRows, writeWorkbook } from '../../infrastructure/spreadsheets/workbook';
import { validateRequired } from '../middleware/validation';
import { spreadsheetUpload, uploadedFile } from '../middleware/upload';

/**
 * Create Recipients Router
 */
export function createRecipientsRouter(
  createRecipientCommand: CreateRecipientCommand,
  addRecipientAliasCommand: AddRecipientAliasCommand,
  addGroupMemberCommand: AddGroupMemberCommand,
  importRecipientsCommand: ImportRecipientsCommand,
  importCustomerMappingsCommand: ImportCustomerMappingsCommand,
  getRecipientsQuery: GetRecipientsQuery
): Router {
  const router = Router();

  /**
   * GET /api/recipients
   */
  router.get('/', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const recipients = await getRecipientsQuery.execute();
      res.json({ count: recipients.length, recipients });
    } catch (error) {
      next(error);
    }
  });

  /**
   * POST /api/recipients
   * Create a single or group recipient
   */
  router.post(
    '/',
    validateRequired(['name']),
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const recipient = await createRecipientCommand.execute(req.body);
        res.status(201).json(recipient);
      } catch (error) {
        next(error);
      }
    }
  );

  /**
   * POST /api/recipients/:recipient_id/aliases
   * Body: { alias }
   */
  router.post(
    '/:recipient_id/aliases',
    validateRequired(['alias']),
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const alias = await addRecipientAliasCommand.execute(
          req.params.recipient_id,
          String(req.body.alias)
        );
        res.status(201).json(alias);
      } catch (error) {
        next(error);
      }
    }
  );

  /**
   * POST /api/recipients/:group_id/members
   * Body: { member_id }
   */
  router.post(
    '/:group_id/members',
    validateRequired(['member_id']),
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const membership = await addGroupMemberCommand.execute(
          req.params.group_id,
          String(req.body.member_id)
        );
        res.status(201).json(membership);
      } catch (error) {
        next(error);
      }
    }
  );

  /**
   * POST /api/recipients/import
   * Body: spreadsheet of recipients, one per row
   */
  router.post('/import', spreadsheetUpload, async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { content, source } = uploadedFile(req);
      const summary = await importRecipientsCommand.execute(readImportRows(content, source));
      res.json(summary);
    } catch (error) {
      next(error);
    }
  });

  /**
   * POST /api/recipients/mappings/import
   * Body: spreadsheet of customer name to recipient mappings
   */
  router.post(
    '/mappings/import',
    spreadsheetUpload,
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const { content, source } = uploadedFile(req);
        const summary = await importCustomerMappingsCommand.execute(readImportRows(content, source));
        res.json(summary);
      } catch (error) {
        next(error);
      }
    }
  );

  // Empty import templates
  router.get('/import/template', (_req: Request, res: Response) => {
    res.attachment('recipients_template.xlsx');
    res.send(writeWorkbook('recipients', RECIPIENT_IMPORT_COLUMNS));
  });

  router.get('/mappings/import/template', (_req: Request, res: Response) => {
    res.attachment('customer_mappings_template.xlsx');
    res.send(writeWorkbook('mappings', MAPPING_IMPORT_COLUMNS));
  });

  return router;
}
