import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import type BetterSqlite3 from 'better-sqlite3';
import { createDb } from '@/store/db.js';
import { HistoryStore } from '@/store/history.js';
import { decide, type DecisionInputs } from '@/engine/decide.js';

const behind: DecisionInputs = {
  finance: { gross: 50, gas_cost: 30, maintenance_cost: 10, target: 200 },
  situation: {
    hours_available_today: 6,
    energy_level: 4,
    commitments: [],
    safety_flags: [],
    rest_debt_hours: 0,
  },
  rates: {
    base_rate_per_hr: 12,
    tip_multiplier: 1.3,
    miles_per_hr: 12,
    mpg: 15,
    gas_price_per_gal: 3.6,
    maintenance_per_mile: 0.15,
  },
};

let tmpDir: string;
let sqlite: BetterSqlite3.Database;
let store: HistoryStore;

beforeEach(() => {
  tmpDir = mkdtempSync(join(tmpdir(), 'shiftvote-history-'));
  const created = createDb(join(tmpDir, 'test.db'));
  sqlite = created.sqlite;
  store = new HistoryStore(created.db);
});

afterEach(() => {
  sqlite.close();
  rmSync(tmpDir, { recursive: true, force: true });
});

describe('HistoryStore', () => {
  it('records a decision with its planned hours and money', () => {
    const result = decide(behind);
    const entry = store.recordDecision(result, '2025-12-20');

    expect(entry.choice).toBe('FULL');
    expect(entry.hours).toBe(6);
    expect(entry.gross).toBe(93.6);
    expect(entry.net).toBe(65.52);
    expect(entry.actualHours).toBeNull();
    expect(entry.id).toHaveLength(21);
  });

  it('reads a decision back with the full result', () => {
    const result = decide(behind);
    const entry = store.recordDecision(result, '2025-12-20');

    const loaded = store.getDecision(entry.id);
    expect(loaded).toEqual(entry);
    expect(loaded?.result.tally.totals).toEqual({ NONE: 14, SHORT: 18, FULL: 20 });
  });

  it('returns null for an unknown id', () => {
    expect(store.getDecision('missing')).toBeNull();
  });

  it('records zero money when no rate card was given', () => {
    const entry = store.recordDecision(decide({ finance: behind.finance, situation: behind.situation }), '2025-12-20');
    expect(entry.gross).toBe(0);
    expect(entry.net).toBe(0);
    expect(entry.hours).toBe(6);
  });

  it('updates actuals', () => {
    const entry = store.recordDecision(decide(behind), '2025-12-19');
    expect(store.recordActuals(entry.id, 5, 50)).toBe(true);
    expect(store.getDecision(entry.id)).toMatchObject({ actualHours: 5, actualNet: 50 });
  });

  it('reports an unknown id when updating actuals', () => {
    expect(store.recordActuals('missing', 1, 1)).toBe(false);
  });

  describe('windows', () => {
    let ids: Record<string, string>;

    beforeEach(() => {
      const result = decide(behind);
      ids = {};
      for (const day of ['2025-12-10', '2025-12-18', '2025-12-19', '2025-12-20']) {
        ids[day] = store.recordDecision(result, day).id;
      }
    });

    it('lists recent entries oldest first', () => {
      const days = store.listRecent('2025-12-20').map((e) => e.decidedOn);
      expect(days).toEqual(['2025-12-18', '2025-12-19', '2025-12-20']);
    });

    it('keeps the most recent entries under a limit', () => {
      const days = store.listRecent('2025-12-20', { limit: 2 }).map((e) => e.decidedOn);
      expect(days).toEqual(['2025-12-19', '2025-12-20']);
    });

    it('widens the window with a longer lookback', () => {
      expect(store.listRecent('2025-12-20', { lookbackDays: 10 })).toHaveLength(4);
    });

    it('lists everything oldest first', () => {
      expect(store.listAll().map((e) => e.decidedOn)).toEqual([
        '2025-12-10',
        '2025-12-18',
        '2025-12-19',
        '2025-12-20',
      ]);
    });

    it('summarizes the days before today', () => {
      store.recordActuals(ids['2025-12-19'], 5, 50);
      // 65.52 / 6 = 10.92 and 50 / 5 = 10
      expect(store.stats('2025-12-20')).toEqual({ hoursYesterday: 5, avgNetPerHourRecent: 10.46 });
    });

    it('has no stats before the first entry', () => {
      expect(store.stats('2025-12-10')).toEqual({ hoursYesterday: 0, avgNetPerHourRecent: 0 });
    });
  });
});
