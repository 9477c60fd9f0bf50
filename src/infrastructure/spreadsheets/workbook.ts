/**
 * Workbook reading and writing with SheetJS
 * Shared by the invoice loader, the directory imports and the report export
 */

import * as XLSX from 'xlsx';
import { ValidationError, errorMessage } from '../../domain/errors';
import { SheetRow, cellText, importHeader } from '../../utils/cell-values';

export const SPREADSHEET_CONTENT_TYPE =
  'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet';

/**
 * Parse an uploaded .xlsx, .xls or .csv body
 *
 * @throws ValidationError if SheetJS cannot read it
 */
export function readWorkbook(content: Buffer, source: string): XLSX.WorkBook {
  try {
    return XLSX.read(content, { type: 'buffer', cellDates: true });
  } catch (error) {
    throw new ValidationError(`Cannot read ${source}: ${errorMessage(error)}`);
  }
}

/**
 * @param label - how the workbook is named in the error, e.g. "Invoice file x.xlsx"
 * @throws ValidationError if the workbook has no sheets
 */
export function firstSheet(workbook: XLSX.WorkBook, label: string): XLSX.WorkSheet {
  const sheetName = workbook.SheetNames[0];
  const sheet = sheetName ? workbook.Sheets[sheetName] : undefined;
  if (!sheet) {
    throw new ValidationError(`${label} has no sheets`);
  }
  return sheet;
}

/**
 * Non-empty header cells of the first row
 */
export function headerRow(sheet: XLSX.WorkSheet): string[] {
  const rows = XLSX.utils.sheet_to_json<unknown[]>(sheet, { header: 1, blankrows: false });
  const first = rows[0] ?? [];
  return first.map((cell) => cellText(cell)).filter((cell) => cell.length > 0);
}

/**
 * Data rows keyed by header; blank cells are null
 *
 * @param keyOf - header to key mapping, trimming by default
 */
export function sheetRows(
  sheet: XLSX.WorkSheet,
  keyOf: (header: string) => string = (header) => header.trim()
): SheetRow[] {
  return XLSX.utils.sheet_to_json<SheetRow>(sheet, { defval: null }).map((raw) => {
    const row: SheetRow = {};
    for (const [key, value] of Object.entries(raw)) {
      row[keyOf(key)] = value;
    }
    return row;
  });
}

/**
 * Rows of an uploaded import file, keyed by normalised header
 */
export function readImportRows(content: Buffer, source: string): SheetRow[] {
  const sheet = firstSheet(readWorkbook(content, source), `Import file ${source}`);
  return sheetRows(sheet, importHeader);
}

/**
 * Single-sheet .xlsx: a header row, then the rows in header order
 */
export function writeWorkbook(sheetName: string, headers: string[], rows: unknown[][] = []): Buffer {
  const workbook = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(workbook, XLSX.utils.aoa_to_sheet([headers, ...rows]), sheetName);
  return XLSX.write(workbook, { type: 'buffer', bookType: 'xlsx' });
}
