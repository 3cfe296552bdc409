/**
 * RPS Export - Schema Field Mappings
 * ==================================
 * One table per experiment version. Each table lists the CSV columns in
 * order with the rule that fills them for player 1 and player 2.
 */

import {
  ColumnMapping,
  CsvCell,
  ExportSchema,
  FieldRule,
  NA,
  PlayerSeat,
  SchemaVersion,
} from '../types';

// ============================================================================
// RULE BUILDERS
// ============================================================================

function round(key: string, defaultValue?: CsvCell): FieldRule {
  return defaultValue === undefined
    ? { source: { from: 'round', key } }
    : { source: { from: 'round', key }, defaultValue };
}

function session(key: string): FieldRule {
  return { source: { from: 'session', key } };
}

function constant(value: CsvCell): FieldRule {
  return { source: { from: 'constant', value } };
}

/** Same rule for both seats */
function shared(column: string, rule: FieldRule): ColumnMapping {
  return { column, player1: rule, player2: rule };
}

/** `playerN_<suffix>` from the round for each seat */
function perPlayer(column: string, suffix: string): ColumnMapping {
  return {
    column,
    player1: round(seatKey(1, suffix)),
    player2: round(seatKey(2, suffix)),
  };
}

export function seatKey(seat: PlayerSeat, suffix: string): string {
  return `player${seat}_${suffix}`;
}

// ============================================================================
// V1
// ============================================================================

const V1_SCHEMA: ExportSchema = {
  version: 'v1',
  description: 'Human vs human rounds, no session metadata',
  columns: [
    shared('game_id', round('game_id')),
    shared('round_index', round('round_index')),
    perPlayer('player_id', 'id'),
    shared('round_begin_ts', round('round_begin_ts')),
    perPlayer('player_move', 'move'),
    perPlayer('player_rt', 'rt'),
    perPlayer('player_outcome', 'outcome'),
    perPlayer('player_outcome_viewtime', 'outcome_viewtime'),
    perPlayer('player_points', 'points'),
    perPlayer('player_total', 'total'),
  ],
  seatAssertions: [],
};

// ============================================================================
// V3
// ============================================================================

// Player 1 is the recruited participant and player 2 the bot opponent.
const V3_SCHEMA: ExportSchema = {
  version: 'v3',
  description: 'Human vs adaptive bot rounds with recruitment metadata',
  columns: [
    // generic data true for all rounds
    shared('game_id', round('game_id')),
    shared('version', session('version')),
    shared('is_sona_autocredit', session('sona')),
    shared('sona_experiment_id', session('experiment_id')),
    shared('sona_credit_token', session('credit_token')),
    shared('sona_survey_code', session('survey_code')),
    // data specific to each round (or varies between players)
    shared('round_index', round('round_index')),
    { column: 'player_id', player1: round('player1_id'), player2: session('player2_botid') },
    { column: 'is_bot', player1: constant(0), player2: constant(1) },
    shared('bot_strategy', session('player2_bot_strategy')),
    { column: 'bot_round_memory', player1: constant(NA), player2: round('player2_memory_struct', NA) },
    shared('round_begin_ts', round('round_begin_ts')),
    { column: 'player_move', player1: round('player1_move'), player2: round('player2_move', NA) },
    perPlayer('player_rt', 'rt'),
    perPlayer('player_outcome', 'outcome'),
    perPlayer('player_outcome_viewtime', 'outcome_viewtime'),
    perPlayer('player_points', 'points'),
    perPlayer('player_total', 'total'),
  ],
  seatAssertions: [
    { key: 'player1_bot', expected: false },
    { key: 'player2_bot', expected: true },
  ],
};

// ============================================================================
// REGISTRY
// ============================================================================

const SCHEMAS: Record<SchemaVersion, ExportSchema> = {
  v1: V1_SCHEMA,
  v3: V3_SCHEMA,
};

export function getSchema(version: SchemaVersion): ExportSchema {
  return SCHEMAS[version];
}

export function getHeader(schema: ExportSchema): string[] {
  return schema.columns.map(c => c.column);
}

/** Columns that fall back to a default for the given seat */
export function getOptionalColumns(schema: ExportSchema, seat: PlayerSeat): string[] {
  return schema.columns
    .filter(c => (seat === 1 ? c.player1 : c.player2).defaultValue !== undefined)
    .map(c => c.column);
}
