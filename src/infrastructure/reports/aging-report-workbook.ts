/**
 * Aging Report Workbook
 * Spreadsheet export of a report run, one row per recipient
 */

import { AgingReport, AgingReportStatus } from '../../domain/models/aging-report';
import { TERM_LABELS } from '../../domain/models/terms';
import { ValidationError } from '../../domain/errors';
import { formatDate, today } from '../../utils/date-helpers';
import { writeWorkbook } from '../spreadsheets/workbook';

export const AGING_REPORT_SHEET = 'aging_report';

export const AGING_REPORT_COLUMNS = [
  'Group',
  'Terms',
  'Overdue Invoices',
  'Oldest Overdue Days',
  'Overdue Amount',
  'Skipped Invoices',
  'Short Paid Invoices',
  'Short Paid Amount',
];

/**
 * aging_report_YYYYMMDD.xlsx, dated by the run's calendar day
 */
export function agingReportFilename(report: AgingReport): string {
  return `aging_report_${formatDate(today(report.created_at)).replace(/-/g, '')}.xlsx`;
}

/**
 * @throws ValidationError if the run failed or has no items
 */
export function buildAgingReportWorkbook(report: AgingReport): Buffer {
  if (report.status !== AgingReportStatus.SUCCESS) {
    throw new ValidationError(`Latest aging report failed: ${report.error ?? 'unknown error'}`);
  }
  if (report.items.length === 0) {
    throw new ValidationError('No aging data to export');
  }

  const rows = report.items.map((item) => [
    item.recipient_name,
    TERM_LABELS[item.terms_code],
    item.overdue_count,
    item.days_overdue,
    Math.round(item.overdue_amount * 100) / 100,
    item.skipped_count,
    item.short_paid_count,
    Math.round(item.short_paid_amount * 100) / 100,
  ]);
  return writeWorkbook(AGING_REPORT_SHEET, AGING_REPORT_COLUMNS, rows);
}
