/**
 * RPS Export - CSV Writer
 * =======================
 * Writes one CSV file per run: a single header, then rows in arrival order
 */

import * as fs from 'fs';
import * as path from 'path';
import { stringify } from 'csv-stringify/sync';
import { FileSystemError } from '../core/errors';
import { OutputRow } from '../types';

const CSV_OPTIONS = {
  record_delimiter: 'windows',
  // csv-stringify only checks for the full record delimiter, so a lone CR or LF needs forcing
  quoted_match: /[\r\n]/,
} as const;

export function formatCsv(rows: OutputRow[]): string {
  return stringify(rows, CSV_OPTIONS);
}

export class CsvWriter {
  private filePath: string;
  private fd: number | null;
  private headerWritten = false;
  private rowsWritten = 0;

  private constructor(filePath: string, fd: number) {
    this.filePath = filePath;
    this.fd = fd;
  }

  /**
   * Open the destination, truncating anything already there
   */
  static open(filePath: string): CsvWriter {
    const absolutePath = path.resolve(filePath);
    try {
      fs.mkdirSync(path.dirname(absolutePath), { recursive: true });
      return new CsvWriter(absolutePath, fs.openSync(absolutePath, 'w'));
    } catch (error) {
      throw new FileSystemError(`Cannot open output file ${absolutePath}`, absolutePath, error);
    }
  }

  hasHeader(): boolean {
    return this.headerWritten;
  }

  getRowsWritten(): number {
    return this.rowsWritten;
  }

  /**
   * Write the header row. Only the first call writes.
   */
  writeHeader(columns: string[]): void {
    if (this.headerWritten) return;
    this.write(formatCsv([columns]));
    this.headerWritten = true;
  }

  writeRows(rows: OutputRow[]): void {
    if (rows.length === 0) return;
    this.write(formatCsv(rows));
    this.rowsWritten += rows.length;
  }

  close(): void {
    if (this.fd === null) return;
    const fd = this.fd;
    this.fd = null;
    try {
      fs.closeSync(fd);
    } catch (error) {
      throw new FileSystemError(`Cannot close output file ${this.filePath}`, this.filePath, error);
    }
  }

  private write(text: string): void {
    if (this.fd === null) {
      throw new FileSystemError(`Output file ${this.filePath} is closed`, this.filePath);
    }
    try {
      fs.writeSync(this.fd, text);
    } catch (error) {
      throw new FileSystemError(`Cannot write to ${this.filePath}`, this.filePath, error);
    }
  }
}
