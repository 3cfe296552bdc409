/**
 * RPS Export - Record Flattener Tests
 * ===================================
 */

import { DecodeError, SchemaError } from '../../src/core/errors';
import { RecordFlattener, createRecordFlattener, renderCell } from '../../src/data/flattener';
import { getHeader, getOptionalColumns, getSchema } from '../../src/data/schemas';
import { makeRound, makeV3Session, withoutKeys } from '../fixtures/sessions';

function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('expected an error');
}

describe('renderCell', () => {
  it('should pass strings and numbers through unchanged', () => {
    expect(renderCell('rock')).toBe('rock');
    expect(renderCell(500)).toBe(500);
    expect(renderCell(0.25)).toBe(0.25);
  });

  it('should render booleans and null', () => {
    expect(renderCell(true)).toBe('true');
    expect(renderCell(false)).toBe('false');
    expect(renderCell(null)).toBe('');
  });

  it('should render nested values as compact JSON', () => {
    expect(renderCell({ rock: 2, paper: 1 })).toBe('{"rock":2,"paper":1}');
    expect(renderCell([1, [2, 3]])).toBe('[1,[2,3]]');
  });
});

describe('Schemas', () => {
  it('should list v1 columns in output order', () => {
    expect(getHeader(getSchema('v1'))).toEqual([
      'game_id', 'round_index', 'player_id', 'round_begin_ts',
      'player_move', 'player_rt', 'player_outcome', 'player_outcome_viewtime',
      'player_points', 'player_total',
    ]);
  });

  it('should list v3 columns in output order', () => {
    expect(getHeader(getSchema('v3'))).toEqual([
      'game_id', 'version', 'is_sona_autocredit', 'sona_experiment_id', 'sona_credit_token', 'sona_survey_code',
      'round_index', 'player_id', 'is_bot', 'bot_strategy', 'bot_round_memory',
      'round_begin_ts', 'player_move', 'player_rt', 'player_outcome', 'player_outcome_viewtime',
      'player_points', 'player_total',
    ]);
  });

  it('should declare only the bot memory and bot move as optional', () => {
    expect(getOptionalColumns(getSchema('v3'), 1)).toEqual([]);
    expect(getOptionalColumns(getSchema('v3'), 2)).toEqual(['bot_round_memory', 'player_move']);
    expect(getOptionalColumns(getSchema('v1'), 1)).toEqual([]);
    expect(getOptionalColumns(getSchema('v1'), 2)).toEqual([]);
  });
});

describe('RecordFlattener', () => {
  describe('parse', () => {
    const flattener = createRecordFlattener(getSchema('v1'));

    it('should parse a session document', () => {
      expect(flattener.parse('{"rounds":[]}', 'g1.json')).toEqual({ rounds: [] });
    });

    it('should ignore a leading byte-order mark', () => {
      expect(flattener.parse('\uFEFF{"rounds":[]}', 'g1.json')).toEqual({ rounds: [] });
    });

    it('should raise a decode error for invalid JSON', () => {
      const error = catchError(() => flattener.parse('{"rounds": [', 'broken.json'));

      expect(error).toBeInstanceOf(DecodeError);
      if (error instanceof DecodeError) {
        expect(error.kind).toBe('decode');
        expect(error.fileName).toBe('broken.json');
        expect(error.message).toMatch(/^Invalid JSON in broken\.json: /);
        expect(error.cause).toBeDefined();
      }
    });

    it('should raise a schema error when the document is not an object', () => {
      expect(() => flattener.parse('[1, 2]', 'list.json')).toThrow(SchemaError);
      expect(() => flattener.parse('null', 'null.json')).toThrow(SchemaError);
    });
  });

  describe('v1', () => {
    let flattener: RecordFlattener;

    beforeEach(() => {
      flattener = createRecordFlattener(getSchema('v1'));
    });

    it('should flatten one round into a player 1 and a player 2 row', () => {
      const { rows, stats } = flattener.flattenSession({ rounds: [makeRound(0, { round_begin_ts: 100 })] }, 'g1.json');

      expect(rows).toEqual([
        ['g1', 0, 'p1', 100, 'rock', 500, 'win', 200, 1, 1],
        ['g1', 0, 'p2', 100, 'scissors', 600, 'lose', 200, 0, 0],
      ]);
      expect(stats).toEqual({
        fileName: 'g1.json',
        gameId: 'g1',
        roundCount: 1,
        rowCount: 2,
        defaultsApplied: {},
      });
    });

    it('should produce two rows per round alternating players in round order', () => {
      const rounds = [makeRound(0), makeRound(1), makeRound(2)];
      const { rows } = flattener.flattenSession({ rounds }, 'g1.json');

      expect(rows).toHaveLength(6);
      expect(rows.map(r => [r[1], r[2]])).toEqual([
        [0, 'p1'], [0, 'p2'],
        [1, 'p1'], [1, 'p2'],
        [2, 'p1'], [2, 'p2'],
      ]);
    });

    it('should produce no rows for a session without rounds', () => {
      const { rows, stats } = flattener.flattenSession({ rounds: [] }, 'empty.json');

      expect(rows).toEqual([]);
      expect(stats.gameId).toBeNull();
      expect(stats.roundCount).toBe(0);
    });

    it('should raise a schema error when rounds are missing', () => {
      const error = catchError(() => flattener.flattenSession({ version: 1 }, 'g1.json'));

      expect(error).toBeInstanceOf(SchemaError);
      if (error instanceof SchemaError) {
        expect(error.key).toBe('rounds');
        expect(error.roundPosition).toBeNull();
        expect(error.message).toBe('g1.json: session: missing required key "rounds"');
      }
    });

    it('should raise a schema error when rounds is not an array', () => {
      expect(() => flattener.flattenSession({ rounds: { 0: 'x' } }, 'g1.json')).toThrow('"rounds" is not an array');
    });

    it('should not default the player 2 move', () => {
      const rounds = [makeRound(0), withoutKeys(makeRound(1), 'player2_move')];
      const error = catchError(() => flattener.flattenSession({ rounds }, 'g1.json'));

      expect(error).toBeInstanceOf(SchemaError);
      if (error instanceof SchemaError) {
        expect(error.key).toBe('player2_move');
        expect(error.roundPosition).toBe(1);
        expect(error.message).toBe('g1.json: round 1: missing required key "player2_move"');
      }
    });

    it('should write null values as empty cells', () => {
      const { rows } = flattener.flattenSession({ rounds: [makeRound(0, { player1_rt: null })] }, 'g1.json');

      expect(rows[0][5]).toBe('');
    });

    it('should not mutate the session', () => {
      const session = { rounds: [makeRound(0), makeRound(1)] };
      const before = JSON.stringify(session);

      flattener.flattenSession(session, 'g1.json');

      expect(JSON.stringify(session)).toBe(before);
    });
  });

  describe('v3', () => {
    let flattener: RecordFlattener;

    beforeEach(() => {
      flattener = createRecordFlattener(getSchema('v3'));
    });

    it('should project session metadata into both rows', () => {
      const round = makeRound(0, { round_begin_ts: 100, player2_memory_struct: { rock: 2, paper: 1 } });
      const { rows, stats } = flattener.flattenSession(makeV3Session([round]), 'g1.json');

      expect(rows).toEqual([
        ['g1', 3, 'true', 'exp-42', 'token-abc', 'SC-001', 0, 'p1', 0, 'nash', 'NA', 100, 'rock', 500, 'win', 200, 1, 1],
        ['g1', 3, 'true', 'exp-42', 'token-abc', 'SC-001', 0, 'bot-7', 1, 'nash', '{"rock":2,"paper":1}', 100, 'scissors', 600, 'lose', 200, 0, 0],
      ]);
      expect(stats.defaultsApplied).toEqual({});
    });

    it('should use the bot id for player 2 rather than the round player id', () => {
      const { rows } = flattener.flattenSession(makeV3Session([makeRound(0)]), 'g1.json');

      expect(rows[1][7]).toBe('bot-7');
    });

    it('should write NA for a missing player 2 move', () => {
      const round = withoutKeys(makeRound(0, { player2_memory_struct: [] }), 'player2_move');
      const { rows, stats } = flattener.flattenSession(makeV3Session([round]), 'g1.json');

      expect(rows[1][12]).toBe('NA');
      expect(rows[0][12]).toBe('rock');
      expect(stats.defaultsApplied).toEqual({ player_move: 1 });
    });

    it('should write NA for a missing bot memory structure', () => {
      const { rows, stats } = flattener.flattenSession(makeV3Session([makeRound(0), makeRound(1)]), 'g1.json');

      expect(rows[1][10]).toBe('NA');
      expect(rows[3][10]).toBe('NA');
      expect(stats.defaultsApplied).toEqual({ bot_round_memory: 2 });
    });

    it('should keep player 1 as human and player 2 as bot', () => {
      const { rows } = flattener.flattenSession(makeV3Session([makeRound(0), makeRound(1)]), 'g1.json');

      expect(rows.map(r => r[8])).toEqual([0, 1, 0, 1]);
    });

    it('should still require the player 1 move', () => {
      const round = withoutKeys(makeRound(0), 'player1_move');
      const error = catchError(() => flattener.flattenSession(makeV3Session([round]), 'g1.json'));

      expect(error).toBeInstanceOf(SchemaError);
      if (error instanceof SchemaError) {
        expect(error.key).toBe('player1_move');
        expect(error.roundPosition).toBe(0);
      }
    });

    it('should raise a session-level schema error for missing metadata', () => {
      const session = withoutKeys(makeV3Session([makeRound(0)]), 'survey_code');
      const error = catchError(() => flattener.flattenSession(session, 'g1.json'));

      expect(error).toBeInstanceOf(SchemaError);
      if (error instanceof SchemaError) {
        expect(error.key).toBe('survey_code');
        expect(error.roundPosition).toBeNull();
      }
    });

    it('should accept sessions that confirm the bot seat', () => {
      const session = makeV3Session([makeRound(0)], { player1_bot: false, player2_bot: true });

      expect(flattener.flattenSession(session, 'g1.json').rows).toHaveLength(2);
    });

    it('should reject sessions where player 1 is a bot', () => {
      const session = makeV3Session([makeRound(0)], { player1_bot: true });
      const error = catchError(() => flattener.flattenSession(session, 'g1.json'));

      expect(error).toBeInstanceOf(SchemaError);
      if (error instanceof SchemaError) {
        expect(error.key).toBe('player1_bot');
        expect(error.message).toBe('g1.json: session: "player1_bot" must be false for v3 sessions, got true');
      }
    });

    it('should reject sessions where player 2 is not a bot', () => {
      const session = makeV3Session([makeRound(0)], { player2_bot: false });

      expect(() => flattener.flattenSession(session, 'g1.json')).toThrow(SchemaError);
    });
  });
});
