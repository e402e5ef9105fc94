import Database from 'better-sqlite3';
import type BetterSqlite3 from 'better-sqlite3';
import { drizzle } from 'drizzle-orm/better-sqlite3';
import { sqliteTable, text, integer, real } from 'drizzle-orm/sqlite-core';

// ── Drizzle schema ──

export const decisions = sqliteTable('decisions', {
  id: text('id').primaryKey(),
  decidedOn: text('decided_on').notNull(), // yyyy-mm-dd
  choice: text('choice').notNull(), // Action
  hours: real('hours').notNull(),
  gross: real('gross').notNull(),
  net: real('net').notNull(),
  actualHours: real('actual_hours'),
  actualNet: real('actual_net'),
  urgency: real('urgency').notNull().default(0),
  nudgeApplied: integer('nudge_applied').notNull().default(0),
  result: text('result').notNull(), // JSON DecisionResult
  createdAt: text('created_at').notNull(),
});

// ── Schema migrations ──

interface ColumnMigration {
  table: string;
  column: string;
  type: string;
  defaultValue?: string;
}

const MIGRATIONS: ColumnMigration[] = [
  { table: 'decisions', column: 'actual_hours', type: 'REAL' },
  { table: 'decisions', column: 'actual_net', type: 'REAL' },
  { table: 'decisions', column: 'urgency', type: 'REAL NOT NULL', defaultValue: '0' },
  { table: 'decisions', column: 'nudge_applied', type: 'INTEGER NOT NULL', defaultValue: '0' },
];

export function runMigrations(sqlite: BetterSqlite3.Database): void {
  const columnCache = new Map<string, Set<string>>();

  function getColumns(table: string): Set<string> {
    let cols = columnCache.get(table);
    if (!cols) {
      const rows = sqlite.pragma(`table_info(${table})`) as { name: string }[];
      cols = new Set(rows.map((r) => r.name));
      columnCache.set(table, cols);
    }
    return cols;
  }

  for (const migration of MIGRATIONS) {
    const existing = getColumns(migration.table);
    if (!existing.has(migration.column)) {
      const defaultClause = migration.defaultValue !== undefined
        ? ` DEFAULT ${migration.defaultValue}`
        : '';
      sqlite.exec(
        `ALTER TABLE ${migration.table} ADD COLUMN ${migration.column} ${migration.type}${defaultClause}`,
      );
      existing.add(migration.column);
      console.log(`Migration: added ${migration.table}.${migration.column} (${migration.type})`);
    }
  }
}

export type DbClient = ReturnType<typeof drizzle>;

export function createDb(dbPath: string): { db: DbClient; sqlite: BetterSqlite3.Database } {
  const sqlite = new Database(dbPath);
  sqlite.pragma('journal_mode = WAL');

  const db = drizzle(sqlite);

  sqlite.exec(`
    CREATE TABLE IF NOT EXISTS decisions (
      id TEXT PRIMARY KEY,
      decided_on TEXT NOT NULL,
      choice TEXT NOT NULL,
      hours REAL NOT NULL,
      gross REAL NOT NULL,
      net REAL NOT NULL,
      actual_hours REAL,
      actual_net REAL,
      urgency REAL NOT NULL DEFAULT 0,
      nudge_applied INTEGER NOT NULL DEFAULT 0,
      result TEXT NOT NULL,
      created_at TEXT NOT NULL
    );

    CREATE INDEX IF NOT EXISTS idx_decisions_decided_on ON decisions(decided_on);
  `);

  runMigrations(sqlite);

  return { db, sqlite };
}
