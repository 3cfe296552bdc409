/**
 * RPS Export - Record Flattener
 * =============================
 * Turns one session document into two CSV rows per round
 */

import { DecodeError, SchemaError } from '../core/errors';
import {
  CsvCell,
  ExportSchema,
  FieldRule,
  JsonObject,
  JsonValue,
  OutputRow,
  PlayerSeat,
  RoundRecord,
  SessionRecord,
  SessionStats,
} from '../types';
import { getHeader } from './schemas';

const BOM = '\uFEFF';

export interface FlattenResult {
  rows: OutputRow[];
  stats: SessionStats;
}

// ============================================================================
// VALUE HELPERS
// ============================================================================

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Render a JSON value as a CSV cell. Scalars pass through unchanged;
 * nested structures become compact JSON text.
 */
export function renderCell(value: JsonValue): CsvCell {
  if (value === null) return '';
  if (typeof value === 'string' || typeof value === 'number') return value;
  if (typeof value === 'boolean') return value ? 'true' : 'false';
  return JSON.stringify(value);
}

// ============================================================================
// FLATTENER CLASS
// ============================================================================

export class RecordFlattener {
  private schema: ExportSchema;

  constructor(schema: ExportSchema) {
    this.schema = schema;
  }

  getSchema(): ExportSchema {
    return this.schema;
  }

  getHeader(): string[] {
    return getHeader(this.schema);
  }

  /**
   * Parse file content into a session document
   */
  parse(text: string, fileName: string): SessionRecord {
    const content = text.startsWith(BOM) ? text.slice(BOM.length) : text;

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      throw new DecodeError(fileName, error);
    }

    if (!isJsonObject(parsed)) {
      throw new SchemaError(fileName, '', 'document is not a JSON object');
    }
    return parsed;
  }

  /**
   * Check the session against the schema's fixed seat assumptions
   */
  checkSeats(session: SessionRecord, fileName: string): void {
    for (const assertion of this.schema.seatAssertions) {
      if (!Object.hasOwn(session, assertion.key)) continue;

      const value = session[assertion.key];
      if (value !== assertion.expected) {
        throw new SchemaError(
          fileName,
          assertion.key,
          `"${assertion.key}" must be ${assertion.expected} for ${this.schema.version} sessions, got ${JSON.stringify(value)}`
        );
      }
    }
  }

  /**
   * Get the session's round list
   */
  extractRounds(session: SessionRecord, fileName: string): RoundRecord[] {
    if (!Object.hasOwn(session, 'rounds')) {
      throw new SchemaError(fileName, 'rounds', 'missing required key "rounds"');
    }

    const rounds = session.rounds;
    if (!Array.isArray(rounds)) {
      throw new SchemaError(fileName, 'rounds', '"rounds" is not an array');
    }

    return rounds.map((round, position) => {
      if (!isJsonObject(round)) {
        throw new SchemaError(fileName, 'rounds', 'round is not a JSON object', position);
      }
      return round;
    });
  }

  /**
   * Build the player 1 and player 2 rows for one round
   */
  flattenRound(
    session: SessionRecord,
    round: RoundRecord,
    position: number,
    stats: SessionStats
  ): [OutputRow, OutputRow] {
    return [
      this.buildRow(1, session, round, position, stats),
      this.buildRow(2, session, round, position, stats),
    ];
  }

  /**
   * Flatten a whole session in round order
   */
  flattenSession(session: SessionRecord, fileName: string): FlattenResult {
    this.checkSeats(session, fileName);
    const rounds = this.extractRounds(session, fileName);
    const stats = this.createStats(fileName, rounds);

    const rows: OutputRow[] = [];
    rounds.forEach((round, position) => {
      rows.push(...this.flattenRound(session, round, position, stats));
    });

    return { rows, stats };
  }

  /**
   * Create empty stats for a session about to be flattened
   */
  createStats(fileName: string, rounds: RoundRecord[]): SessionStats {
    const first = rounds.length > 0 ? rounds[0].game_id : undefined;
    return {
      fileName,
      gameId: typeof first === 'string' || typeof first === 'number' ? String(first) : null,
      roundCount: rounds.length,
      rowCount: 0,
      defaultsApplied: {},
    };
  }

  private buildRow(
    seat: PlayerSeat,
    session: SessionRecord,
    round: RoundRecord,
    position: number,
    stats: SessionStats
  ): OutputRow {
    const row = this.schema.columns.map(mapping => {
      const rule = seat === 1 ? mapping.player1 : mapping.player2;
      const cell = this.resolve(rule, session, round, position, stats.fileName);
      if (cell.defaulted) {
        stats.defaultsApplied[mapping.column] = (stats.defaultsApplied[mapping.column] ?? 0) + 1;
      }
      return cell.value;
    });
    stats.rowCount++;
    return row;
  }

  private resolve(
    rule: FieldRule,
    session: SessionRecord,
    round: RoundRecord,
    position: number,
    fileName: string
  ): { value: CsvCell; defaulted: boolean } {
    const source = rule.source;
    if (source.from === 'constant') {
      return { value: source.value, defaulted: false };
    }

    const record = source.from === 'round' ? round : session;
    if (Object.hasOwn(record, source.key)) {
      return { value: renderCell(record[source.key]), defaulted: false };
    }

    if (rule.defaultValue !== undefined) {
      return { value: rule.defaultValue, defaulted: true };
    }

    throw new SchemaError(
      fileName,
      source.key,
      `missing required key "${source.key}"`,
      source.from === 'round' ? position : null
    );
  }
}

export function createRecordFlattener(schema: ExportSchema): RecordFlattener {
  return new RecordFlattener(schema);
}
