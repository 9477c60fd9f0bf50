/**
 * File Invoice Source
 * Invoice snapshots are files: either one fixed path or the newest upload
 */

import * as fs from 'fs/promises';
import type { Stats } from 'fs';
import * as path from 'path';
import { IInvoiceSource } from '../../domain/ports/invoice-source.interface';
import { InvoiceLineItem } from '../../domain/models/invoice';
import { SystemError, errorMessage } from '../../domain/errors';
import { InvoiceSourceMode } from '../../config/app.config';
import { today } from '../../utils/date-helpers';
import { loadInvoiceFile } from './invoice-file-loader';

export const INVOICE_EXTENSIONS = ['.xlsx', '.xls', '.csv'];

export interface FileInvoiceSourceOptions {
  mode: InvoiceSourceMode;
  invoicePath: string;
  uploadFolder: string;
  clock?: () => Date;
}

export class FileInvoiceSource implements IInvoiceSource {
  private clock: () => Date;

  constructor(private options: FileInvoiceSourceOptions) {
    this.clock = options.clock ?? (() => new Date());
  }

  async currentReference(): Promise<string> {
    if (this.options.mode === 'path') {
      await this.assertReadable(this.options.invoicePath);
      return this.options.invoicePath;
    }
    return this.latestUpload();
  }

  async load(invoice_ref: string): Promise<InvoiceLineItem[]> {
    await this.assertReadable(invoice_ref);
    return loadInvoiceFile(invoice_ref, today(this.clock()));
  }

  /**
   * Newest invoice file in the upload folder by modification time
   */
  private async latestUpload(): Promise<string> {
    const folder = this.options.uploadFolder;

    let entries: string[];
    try {
      entries = await fs.readdir(folder);
    } catch {
      throw new SystemError(`Invoice upload folder not found: ${folder}`);
    }

    let latest: { file: string; mtime: number } | null = null;
    for (const entry of entries) {
      if (!INVOICE_EXTENSIONS.includes(path.extname(entry).toLowerCase())) continue;
      if (entry.startsWith('~$')) continue; // Office lock files

      const file = path.join(folder, entry);
      let stat: Stats;
      try {
        stat = await fs.stat(file);
      } catch (error) {
        // Removed (or a dangling link) between listing and stat
        console.warn(`[Invoice Source] Skipping ${file}: ${errorMessage(error)}`);
        continue;
      }
      if (!stat.isFile()) continue;
      if (!latest || stat.mtimeMs > latest.mtime) {
        latest = { file, mtime: stat.mtimeMs };
      }
    }

    if (!latest) {
      throw new SystemError(`No invoice file found in ${folder}`);
    }
    return latest.file;
  }

  private async assertReadable(file: string): Promise<void> {
    if (!file) {
      throw new SystemError('No invoice file configured');
    }
    try {
      await fs.access(file);
    } catch {
      throw new SystemError(`Invoice file not found: ${file}`);
    }
  }
}
