/**
 * CSV output
 * ==========
 *
 * One file per day inside a folder per month:
 *   <baseFolder>/<YYYY-MM>/<YYYY-MM-DD>_<fileSuffix>.csv
 * The header is written when a file is created; after that rows are only
 * ever appended.
 */

import { promises as fsp } from 'fs';
import * as path from 'path';
import { CsvCell, toRow } from '../drivers/record';
import type { DecodedRecord } from '../drivers/types';
import type { Logger } from '../logging/types';
import { formatDate, formatMonth } from '../utils/dates';

export interface OutputSink {
  appendRecords(header: readonly string[], records: readonly DecodedRecord[]): Promise<void>;
  close(): Promise<void>;
}

export interface CsvSinkConfig {
  baseFolder: string;
  fileSuffix: string;
}

export function escapeCsvCell(cell: CsvCell): string {
  if (cell === null) {
    return '';
  }
  const text = String(cell);
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

export function formatCsvLine(cells: readonly CsvCell[]): string {
  return cells.map(escapeCsvCell).join(',') + '\n';
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return typeof error === 'object' && error !== null && 'code' in error;
}

export class CsvFileSink implements OutputSink {
  private closed = false;

  constructor(
    private readonly config: CsvSinkConfig,
    private readonly logger: Logger
  ) {}

  csvPathFor(date: Date): string {
    return path.join(
      this.config.baseFolder,
      formatMonth(date),
      `${formatDate(date)}_${this.config.fileSuffix}.csv`
    );
  }

  /**
   * Create the file with its header row if it does not exist yet.
   * Returns true when the file was created.
   */
  async ensureFile(csvPath: string, header: readonly string[]): Promise<boolean> {
    await fsp.mkdir(path.dirname(csvPath), { recursive: true });
    try {
      await fsp.writeFile(csvPath, formatCsvLine(header), { flag: 'wx' });
    } catch (error) {
      if (isErrnoException(error) && error.code === 'EEXIST') {
        return false;
      }
      throw error;
    }
    this.logger.info(`Created CSV file ${csvPath}`);
    return true;
  }

  async appendRow(csvPath: string, values: readonly CsvCell[]): Promise<void> {
    await fsp.appendFile(csvPath, formatCsvLine(values));
  }

  async appendRecords(header: readonly string[], records: readonly DecodedRecord[]): Promise<void> {
    if (this.closed) {
      throw new Error('CSV sink is closed');
    }

    for (const record of records) {
      const row = toRow(record);
      if (row.length !== header.length) {
        throw new Error(
          `Row for unit ${record.unitId} has ${row.length} columns, header has ${header.length}`
        );
      }
      const csvPath = this.csvPathFor(record.timestamp);
      await this.ensureFile(csvPath, header);
      await this.appendRow(csvPath, row);
    }
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}
