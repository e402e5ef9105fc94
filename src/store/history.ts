import { nanoid } from 'nanoid';
import { and, asc, desc, eq, gte, lt, lte } from 'drizzle-orm';
import { isAction } from '../shared/types.js';
import type { DecisionResult, HistoryEntry, HistoryStats } from '../shared/types.js';
import { addDays } from '../engine/bills.js';
import { summarizeHistory } from '../engine/history.js';
import { decisions, type DbClient } from './db.js';

type DecisionRow = typeof decisions.$inferSelect;

export interface ListRecentOptions {
  lookbackDays?: number;
  limit?: number;
}

/**
 * Decision log and work history. One row per decision, with the full
 * DecisionResult kept as JSON for later export.
 */
export class HistoryStore {
  constructor(private db: DbClient) {}

  private parseRow(row: DecisionRow): HistoryEntry {
    if (!isAction(row.choice)) {
      throw new Error(`Corrupt history row ${row.id}: unknown choice "${row.choice}"`);
    }
    return {
      id: row.id,
      decidedOn: row.decidedOn,
      choice: row.choice,
      hours: row.hours,
      gross: row.gross,
      net: row.net,
      actualHours: row.actualHours,
      actualNet: row.actualNet,
      result: JSON.parse(row.result) as DecisionResult,
      createdAt: row.createdAt,
    };
  }

  /** Log a decision. Planned hours and money come from the result; actuals start empty. */
  recordDecision(result: DecisionResult, decidedOn: string): HistoryEntry {
    const planned = result.economics?.[result.winner];
    const entry: HistoryEntry = {
      id: nanoid(),
      decidedOn,
      choice: result.winner,
      hours: result.plannedHours,
      gross: planned?.gross ?? 0,
      net: planned?.net ?? 0,
      actualHours: null,
      actualNet: null,
      result,
      createdAt: new Date().toISOString(),
    };

    this.db.insert(decisions).values({
      id: entry.id,
      decidedOn: entry.decidedOn,
      choice: entry.choice,
      hours: entry.hours,
      gross: entry.gross,
      net: entry.net,
      urgency: result.urgency,
      nudgeApplied: result.tally.nudgeApplied ? 1 : 0,
      result: JSON.stringify(result),
      createdAt: entry.createdAt,
    }).run();

    return entry;
  }

  /** Fill in what actually happened. Returns false for an unknown id. */
  recordActuals(id: string, actualHours: number, actualNet: number): boolean {
    const outcome = this.db.update(decisions)
      .set({ actualHours, actualNet })
      .where(eq(decisions.id, id))
      .run();
    return outcome.changes > 0;
  }

  getDecision(id: string): HistoryEntry | null {
    const rows = this.db.select().from(decisions).where(eq(decisions.id, id)).all();
    if (rows.length === 0) return null;
    return this.parseRow(rows[0]);
  }

  /**
   * Entries from the last `lookbackDays` up to and including `today`,
   * oldest first, keeping at most the `limit` most recent.
   */
  listRecent(today: string, opts: ListRecentOptions = {}): HistoryEntry[] {
    const lookbackDays = opts.lookbackDays ?? 7;
    const limit = opts.limit ?? 14;

    const rows = this.db.select().from(decisions)
      .where(and(
        gte(decisions.decidedOn, addDays(today, -lookbackDays)),
        lte(decisions.decidedOn, today),
      ))
      .orderBy(desc(decisions.decidedOn), desc(decisions.createdAt))
      .limit(limit)
      .all();

    return rows.reverse().map((row) => this.parseRow(row));
  }

  /** Every entry, oldest first. */
  listAll(): HistoryEntry[] {
    return this.db.select().from(decisions)
      .orderBy(asc(decisions.decidedOn), asc(decisions.createdAt))
      .all()
      .map((row) => this.parseRow(row));
  }

  /** Recent-history stats for agents deciding on `today`, ignoring today's own entries. */
  stats(today: string, opts: ListRecentOptions = {}): HistoryStats {
    const lookbackDays = opts.lookbackDays ?? 7;
    const limit = opts.limit ?? 14;

    const rows = this.db.select().from(decisions)
      .where(and(
        gte(decisions.decidedOn, addDays(today, -lookbackDays)),
        lt(decisions.decidedOn, today),
      ))
      .orderBy(desc(decisions.decidedOn), desc(decisions.createdAt))
      .limit(limit)
      .all();

    return summarizeHistory(rows);
  }
}
