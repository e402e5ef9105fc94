import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import Database from 'better-sqlite3';
import { mkdtempSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { createDb, runMigrations } from '@/store/db.js';

/** Decision log as first shipped, before actuals and tally metadata */
const STALE_SCHEMA = `
  CREATE TABLE decisions (
    id TEXT PRIMARY KEY,
    decided_on TEXT NOT NULL,
    choice TEXT NOT NULL,
    hours REAL NOT NULL,
    gross REAL NOT NULL,
    net REAL NOT NULL,
    result TEXT NOT NULL,
    created_at TEXT NOT NULL
  );
`;

const ADDED_COLUMNS = ['actual_hours', 'actual_net', 'urgency', 'nudge_applied'];

function getColumnNames(sqlite: Database.Database, table: string): string[] {
  const rows = sqlite.pragma(`table_info(${table})`) as { name: string }[];
  return rows.map((r) => r.name);
}

describe('DB schema migrations', () => {
  let dir: string;
  let sqlite: Database.Database | undefined;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'shiftvote-test-'));
  });

  afterEach(() => {
    sqlite?.close();
    sqlite = undefined;
    rmSync(dir, { recursive: true, force: true });
  });

  it('fresh DB from createDb has every column', () => {
    const created = createDb(join(dir, 'fresh.db'));
    sqlite = created.sqlite;
    const columns = getColumnNames(created.sqlite, 'decisions');
    for (const column of ADDED_COLUMNS) {
      expect(columns).toContain(column);
    }
  });

  it('stale DB missing columns gets them added', () => {
    const db = new Database(join(dir, 'stale.db'));
    sqlite = db;
    db.exec(STALE_SCHEMA);
    expect(getColumnNames(db, 'decisions')).not.toContain('actual_hours');

    runMigrations(db);

    expect(getColumnNames(db, 'decisions')).toEqual(expect.arrayContaining(ADDED_COLUMNS));
  });

  it('migrations are idempotent', () => {
    const db = new Database(join(dir, 'idempotent.db'));
    sqlite = db;
    db.exec(STALE_SCHEMA);

    runMigrations(db);
    runMigrations(db);

    expect(getColumnNames(db, 'decisions').filter((c) => c === 'urgency')).toHaveLength(1);
  });

  it('existing rows keep their data and get column defaults', () => {
    const db = new Database(join(dir, 'data.db'));
    sqlite = db;
    db.exec(STALE_SCHEMA);
    db.exec(`
      INSERT INTO decisions (id, decided_on, choice, hours, gross, net, result, created_at)
      VALUES ('d1', '2025-12-01', 'SHORT', 3, 46.8, 32.76, '{}', '2025-12-01T08:00:00.000Z');
    `);

    runMigrations(db);

    const row = db.prepare('SELECT * FROM decisions WHERE id = ?').get('d1') as Record<string, unknown>;
    expect(row.choice).toBe('SHORT');
    expect(row.net).toBe(32.76);
    expect(row.actual_hours).toBeNull();
    expect(row.actual_net).toBeNull();
    expect(row.urgency).toBe(0);
    expect(row.nudge_applied).toBe(0);
  });
});
