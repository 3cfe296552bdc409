/**
 * RPS Export - Exporter
 * =====================
 * Runs one export: scan the input directory, flatten each session file
 * and append its rows to the output CSV.
 */

import { v4 as uuid } from 'uuid';
import { ConfigManager } from '../core/config';
import { ConfigError, ExportError, isExportError } from '../core/errors';
import { ExportSummary } from '../types';
import { getLogger, Logger } from '../utils/logger';
import { CsvWriter } from './csv-writer';
import { createRecordFlattener, RecordFlattener } from './flattener';
import { readSessionFile, scanDirectory } from './scanner';
import { getSchema } from './schemas';

// ============================================================================
// TYPES
// ============================================================================

export type ExportResult =
  | { ok: true; summary: ExportSummary }
  | { ok: false; error: ExportError; summary: ExportSummary };

export interface ExportOptions {
  logger?: Logger;
  /** Base directory for a relative or default output path */
  cwd?: string;
}

// ============================================================================
// EXPORTER CLASS
// ============================================================================

export class Exporter {
  private configManager: ConfigManager;
  private logger: Logger;
  private cwd: string;

  constructor(configManager: ConfigManager, options: ExportOptions = {}) {
    this.configManager = configManager;
    this.logger = options.logger ?? getLogger();
    this.cwd = options.cwd ?? process.cwd();
  }

  /**
   * Run the export. Config, filesystem, decode and schema failures come
   * back as a failed result; the output keeps whatever was written.
   */
  run(): ExportResult {
    const config = this.configManager.getConfig();
    const summary: ExportSummary = {
      runId: uuid(),
      experiment: config.experiment,
      schemaVersion: config.schemaVersion,
      outputPath: this.configManager.resolveOutputPath(this.cwd),
      startedAt: new Date().toISOString(),
      finishedAt: null,
      filesProcessed: 0,
      rowsWritten: 0,
      sessions: [],
      incompleteSessions: [],
    };

    const validation = this.configManager.validate();
    if (!validation.valid) {
      return this.fail(new ConfigError(validation.errors), summary);
    }

    this.logger.info(`Export ${summary.runId}: ${config.experiment} (${config.schemaVersion}) -> ${summary.outputPath}`);

    const flattener = createRecordFlattener(getSchema(config.schemaVersion));
    let writer: CsvWriter | null = null;

    try {
      writer = CsvWriter.open(summary.outputPath);
      const files = scanDirectory(config.inputDir, config.exclusionMarkers);
      this.logger.debug(`Found ${files.length} session files in ${config.inputDir}`);

      for (const fileName of files) {
        this.logger.info(`Processing: ${fileName}`);
        this.exportFile(config.inputDir, fileName, flattener, writer, summary);
        summary.rowsWritten = writer.getRowsWritten();
        summary.filesProcessed++;
        this.checkCompleteness(summary, config.expectedRounds);
      }
      this.closeWriter(writer, summary);
    } catch (error) {
      if (!isExportError(error)) throw error;
      this.closeWriter(writer, summary);
      return this.fail(error, summary);
    }

    summary.finishedAt = new Date().toISOString();
    this.logger.info(`Wrote ${summary.rowsWritten} rows from ${summary.filesProcessed} files to ${summary.outputPath}`);
    return { ok: true, summary };
  }

  /**
   * Flatten one session file into the writer, round by round
   */
  private exportFile(
    inputDir: string,
    fileName: string,
    flattener: RecordFlattener,
    writer: CsvWriter,
    summary: ExportSummary
  ): void {
    const session = flattener.parse(readSessionFile(inputDir, fileName), fileName);
    flattener.checkSeats(session, fileName);
    const rounds = flattener.extractRounds(session, fileName);

    writer.writeHeader(flattener.getHeader());

    const stats = flattener.createStats(fileName, rounds);
    summary.sessions.push(stats);

    rounds.forEach((round, position) => {
      writer.writeRows(flattener.flattenRound(session, round, position, stats));
    });

    this.logger.debug(`${fileName}: ${stats.roundCount} rounds, ${stats.rowCount} rows`, stats.defaultsApplied);
  }

  private checkCompleteness(summary: ExportSummary, expectedRounds: number | null): void {
    const stats = summary.sessions[summary.sessions.length - 1];
    if (expectedRounds === null || stats === undefined || stats.roundCount >= expectedRounds) return;

    summary.incompleteSessions.push(stats.fileName);
    this.logger.warn(`${stats.fileName}: ${stats.roundCount} of ${expectedRounds} rounds (incomplete game)`);
  }

  private closeWriter(writer: CsvWriter | null, summary: ExportSummary): void {
    if (!writer) return;
    summary.rowsWritten = writer.getRowsWritten();
    writer.close();
  }

  private fail(error: ExportError, summary: ExportSummary): ExportResult {
    summary.finishedAt = new Date().toISOString();
    this.logger.error(`Export failed (${error.kind}): ${error.message}`);
    return { ok: false, error, summary };
  }
}

// ============================================================================
// FACTORY FUNCTIONS
// ============================================================================

export function createExporter(configManager: ConfigManager, options?: ExportOptions): Exporter {
  return new Exporter(configManager, options);
}

export function runExport(configManager: ConfigManager, options?: ExportOptions): ExportResult {
  return createExporter(configManager, options).run();
}
