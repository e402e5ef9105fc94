import type { HistoryEntry, HistoryStats } from '../shared/types.js';
import { roundCents } from './bills.js';

export type HistorySample = Pick<HistoryEntry, 'decidedOn' | 'hours' | 'net' | 'actualHours' | 'actualNet'>;

/**
 * Hours worked on the most recent day in `entries`, and the average net per
 * hour across entries that involved work. Actuals override planned values.
 */
export function summarizeHistory(entries: readonly HistorySample[]): HistoryStats {
  if (entries.length === 0) {
    return { hoursYesterday: 0, avgNetPerHourRecent: 0 };
  }

  const hoursByDate = new Map<string, number>();
  const rates: number[] = [];
  for (const entry of entries) {
    const hours = entry.actualHours ?? entry.hours;
    const net = entry.actualNet ?? entry.net;
    hoursByDate.set(entry.decidedOn, (hoursByDate.get(entry.decidedOn) ?? 0) + hours);
    if (hours > 0) rates.push(net / hours);
  }

  const mostRecent = [...hoursByDate.keys()].sort().at(-1);
  const avg = rates.length > 0 ? rates.reduce((a, b) => a + b, 0) / rates.length : 0;

  return {
    hoursYesterday: mostRecent === undefined ? 0 : hoursByDate.get(mostRecent) ?? 0,
    avgNetPerHourRecent: roundCents(avg),
  };
}
