/**
 * Invoice File Loader
 *
 * Reads invoice exports (.xlsx, .xls, .csv) and turns the first sheet into
 * invoice line items. Column names match after trimming.
 */

import * as XLSX from 'xlsx';
import {
  InvoiceLineItem,
  OPTIONAL_INVOICE_COLUMNS,
  REQUIRED_INVOICE_COLUMNS,
  normalizeOrderId,
} from '../../domain/models/invoice';
import { SystemError, ValidationError, errorMessage } from '../../domain/errors';
import { formatDate, parseCalendarDate } from '../../utils/date-helpers';
import { cellText } from '../../utils/cell-values';
import { firstSheet, headerRow, sheetRows } from '../spreadsheets/workbook';

/**
 * Numeric cell: numbers pass through, "$1,200.50" style strings are parsed,
 * anything else counts as 0
 */
export function toAmount(value: unknown): number {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : 0;
  }
  if (typeof value === 'string') {
    const parsed = parseFloat(value.replace(/[$,\s]/g, ''));
    return Number.isNaN(parsed) ? 0 : parsed;
  }
  return 0;
}

/**
 * Parse the first sheet of a workbook
 *
 * @param source - file name used in log and error messages
 * @param today - substituted for ship dates that cannot be parsed
 * @throws ValidationError if required columns are missing
 */
export function parseInvoiceWorkbook(
  workbook: XLSX.WorkBook,
  source: string,
  today: Date
): InvoiceLineItem[] {
  const sheet = firstSheet(workbook, `Invoice file ${source}`);
  const headers = new Set(headerRow(sheet));
  const missing = REQUIRED_INVOICE_COLUMNS.filter((column) => !headers.has(column));
  if (missing.length > 0) {
    throw new ValidationError(
      `Invoice file missing columns: ${[...missing].sort().join(', ')}`
    );
  }

  const absent = OPTIONAL_INVOICE_COLUMNS.filter((column) => !headers.has(column));
  if (absent.length > 0) {
    console.log(`[Invoice Loader] ${source}: no ${absent.join(', ')} column, using defaults`);
  }

  const items: InvoiceLineItem[] = [];
  let badDates = 0;

  for (const row of sheetRows(sheet)) {
    let shipDate = parseCalendarDate(row['Shipping Date']);
    if (!shipDate) {
      badDates++;
      shipDate = today;
    }

    const location = cellText(row['Location']);
    items.push({
      customer_name: cellText(row['Customer Name']),
      order_id: normalizeOrderId(row['Order ID']),
      ship_date: shipDate,
      total: toAmount(row['Order Total']),
      paid: toAmount(row['Paid Amount']),
      location: location || undefined,
    });
  }

  if (badDates > 0) {
    console.warn(
      `[Invoice Loader] ${source}: ${badDates} row(s) with unreadable Shipping Date, using ${formatDate(today)}`
    );
  }
  console.log(`[Invoice Loader] ${source}: ${items.length} rows loaded`);

  return items;
}

/**
 * Read an invoice file from disk
 *
 * @throws SystemError if the file cannot be read
 * @throws ValidationError if required columns are missing
 */
export function loadInvoiceFile(filePath: string, today: Date): InvoiceLineItem[] {
  let workbook: XLSX.WorkBook;
  try {
    workbook = XLSX.readFile(filePath, { cellDates: true });
  } catch (error) {
    throw new SystemError(`Cannot read invoice file ${filePath}: ${errorMessage(error)}`);
  }
  return parseInvoiceWorkbook(workbook, filePath, today);
}
