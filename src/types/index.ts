/**
 * RPS Export - Core Types
 * =======================
 * Type definitions shared by the scanner, flattener, writer and exporter
 */

// ============================================================================
// JSON VALUES
// ============================================================================

export type JsonPrimitive = string | number | boolean | null;

export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;

export interface JsonObject {
  [key: string]: JsonValue;
}

// ============================================================================
// RECORDS
// ============================================================================

/** Experiment schema versions with a field mapping */
export type SchemaVersion = 'v1' | 'v3';

export const SCHEMA_VERSIONS: readonly SchemaVersion[] = ['v1', 'v3'];

/** Player seat within a round */
export type PlayerSeat = 1 | 2;

/** One parsed session document (read-only, one per input file) */
export type SessionRecord = JsonObject;

/** One entry of a session's `rounds` array */
export type RoundRecord = JsonObject;

/** A value written into one CSV cell */
export type CsvCell = string | number;

/** One flattened (round, player) row, in column order */
export type OutputRow = CsvCell[];

/** Placeholder written for absent optional fields */
export const NA = 'NA';

// ============================================================================
// FIELD MAPPING
// ============================================================================

/** Where a column's value comes from */
export type FieldSource =
  | { from: 'round'; key: string }
  | { from: 'session'; key: string }
  | { from: 'constant'; value: CsvCell };

/**
 * A column's extraction rule for one seat. `defaultValue` makes the
 * field optional: it is written when the key is absent.
 */
export interface FieldRule {
  source: FieldSource;
  defaultValue?: CsvCell;
}

/** A column whose rule may differ between player 1 and player 2 */
export interface ColumnMapping {
  column: string;
  player1: FieldRule;
  player2: FieldRule;
}

/** Seat assumption checked against a session before flattening */
export interface SeatAssertion {
  key: string;
  /** Value the session must hold when the key is present */
  expected: boolean;
}

/** Declarative description of one experiment version's CSV shape */
export interface ExportSchema {
  version: SchemaVersion;
  description: string;
  columns: ColumnMapping[];
  seatAssertions: SeatAssertion[];
}

// ============================================================================
// RUN SUMMARY
// ============================================================================

/** Per-session stats collected while flattening */
export interface SessionStats {
  fileName: string;
  gameId: string | null;
  roundCount: number;
  rowCount: number;
  /** Count of default substitutions per optional column */
  defaultsApplied: Record<string, number>;
}

export interface ExportSummary {
  runId: string;
  experiment: string;
  schemaVersion: SchemaVersion;
  outputPath: string;
  startedAt: string;
  finishedAt: string | null;
  filesProcessed: number;
  rowsWritten: number;
  sessions: SessionStats[];
  /** File names whose round count is below the expected count */
  incompleteSessions: string[];
}
