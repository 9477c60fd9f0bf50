/**
 * Aging Report Repository Interface (Repository Port)
 */

import { AgingReport, AgingReportItem, AgingReportRun } from '../models/aging-report';

export interface IAgingReportRepository {
  /**
   * Save a report run together with its items
   */
  saveRun(run: AgingReportRun, items: AgingReportItem[]): Promise<void>;

  /**
   * Latest run (successful or not) with its items, largest overdue first
   */
  findLatest(): Promise<AgingReport | null>;
}
