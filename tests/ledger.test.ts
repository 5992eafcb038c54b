import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import {
  checkDatabaseHealth,
  closeDatabase,
  getLedgerStats,
  getRecentRuns,
  getRun,
  getRunMismatches,
  initDatabase,
  recordMatchRun,
} from '../src/database/db.js';
import type { MatchRun } from '../src/matching/driver.js';
import type { MatchKind, MatchResult } from '../src/types.js';

function result(kind: MatchKind, fields: Partial<MatchResult> = {}): MatchResult {
  return {
    kind,
    checked: 0,
    matched: 0,
    fixed: 0,
    mismatches: [],
    missingOnGuide: [],
    notOnCodex: [],
    unmatched: [],
    created: [],
    errors: [],
    ...fields,
  };
}

const failedRun: MatchRun = {
  ok: false,
  fix: true,
  kinds: ['items', 'monsters'],
  startedAt: '2026-03-01T10:00:00.000Z',
  finishedAt: '2026-03-01T10:05:00.000Z',
  results: [
    result('items', {
      checked: 3,
      mismatches: [{ entity: 'Iron Sword', id: 1, field: 'attack', codex: '10', guide: '8', fixed: true }],
    }),
    result('monsters', { checked: 2, errors: [{ entity: 'Goblin', message: 'boom' }] }),
  ],
};

const cleanRun: MatchRun = {
  ok: true,
  fix: false,
  kinds: ['statusEffects'],
  startedAt: '2026-03-02T10:00:00.000Z',
  finishedAt: '2026-03-02T10:00:01.000Z',
  results: [
    result('statusEffects', {
      checked: 4,
      mismatches: [{ entity: 'Blind', id: null, field: 'missing', codex: '"Blind"', guide: 'None', fixed: false }],
    }),
  ],
};

describe('match ledger', () => {
  beforeEach(() => {
    initDatabase(':memory:');
  });

  afterEach(() => {
    closeDatabase();
  });

  it('stores a run with its totals', () => {
    const id = recordMatchRun(failedRun);
    expect(getRun(id)).toEqual({
      id,
      started_at: '2026-03-01T10:00:00.000Z',
      finished_at: '2026-03-01T10:05:00.000Z',
      fix: true,
      kinds: ['items', 'monsters'],
      ok: false,
      checked: 5,
      error_count: 1,
      mismatch_count: 1,
      created_at: expect.any(String),
    });
  });

  it('stores the mismatches of a run in order', () => {
    const id = recordMatchRun(failedRun);
    expect(getRunMismatches(id)).toEqual([{
      id: 1,
      run_id: id,
      kind: 'items',
      entity_id: 1,
      entity_name: 'Iron Sword',
      field: 'attack',
      codex_value: '10',
      guide_value: '8',
      fixed: true,
    }]);
  });

  it('lists the newest run first', () => {
    recordMatchRun(failedRun);
    recordMatchRun(cleanRun);
    expect(getRecentRuns().map(r => r.kinds)).toEqual([['statusEffects'], ['items', 'monsters']]);
    expect(getRecentRuns(1)).toHaveLength(1);
    expect(getRun(99)).toBeNull();
  });

  it('aggregates stats across runs', () => {
    recordMatchRun(failedRun);
    recordMatchRun(cleanRun);
    expect(getLedgerStats()).toEqual({
      totalRuns: 2,
      okRuns: 1,
      totalMismatches: 2,
      fixedMismatches: 1,
      mismatchesByField: { 'items.attack': 1, 'statusEffects.missing': 1 },
      lastRunAt: '2026-03-02T10:00:00.000Z',
    });
  });

  it('reports health with the run count', () => {
    recordMatchRun(cleanRun);
    const health = checkDatabaseHealth();
    expect(health.ok).toBe(true);
    expect(health.details).toMatchObject({ runCount: 1, path: ':memory:' });
  });
});
