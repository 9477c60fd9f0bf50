/**
 * Spreadsheet Upload Middleware
 * The file travels as the raw request body
 */

import express, { Request } from 'express';
import { ValidationError } from '../../domain/errors';
import { SPREADSHEET_CONTENT_TYPE } from '../../infrastructure/spreadsheets/workbook';

export const spreadsheetUpload = express.raw({
  type: [SPREADSHEET_CONTENT_TYPE, 'application/vnd.ms-excel', 'text/csv', 'application/octet-stream'],
  limit: '10mb',
});

/**
 * @throws ValidationError if the body is missing or was sent as another content type
 */
export function uploadedFile(req: Request): { content: Buffer; source: string } {
  const body: unknown = req.body;
  if (!Buffer.isBuffer(body) || body.length === 0) {
    throw new ValidationError('Send the spreadsheet (.xlsx, .xls or .csv) as the request body');
  }
  return { content: body, source: req.get('X-File-Name') || 'upload' };
}
