/**
 * RPS Export - Data Module
 * ========================
 */

export { RecordFlattener, createRecordFlattener, isJsonObject, renderCell } from './flattener';
export type { FlattenResult } from './flattener';

export { DEFAULT_EXCLUSION_MARKERS, isSessionFile, scanDirectory, readSessionFile } from './scanner';

export { CsvWriter, formatCsv } from './csv-writer';

export { getSchema, getHeader, getOptionalColumns, seatKey } from './schemas';

export { Exporter, createExporter, runExport } from './exporter';
export type { ExportResult, ExportOptions } from './exporter';
