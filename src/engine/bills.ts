import type { Bill, BillInputs, BillPressure } from '../shared/types.js';
import { InvalidInputError, requireNonNegative } from './errors.js';

const NO_PRESSURE_DAYS = 365;
const MS_PER_DAY = 86_400_000;
const WANTS_WEIGHT = 0.5;

export function roundCents(value: number): number {
  return Math.round(value * 100) / 100;
}

function parseIsoDate(label: string, iso: string): number {
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(iso);
  if (!match) {
    throw new InvalidInputError(`${label} must be an ISO date (yyyy-mm-dd), got "${iso}"`);
  }
  const [, y, m, d] = match;
  return Date.UTC(Number(y), Number(m) - 1, Number(d));
}

/** `iso` moved by `days` (may be negative). */
export function addDays(iso: string, days: number): string {
  return new Date(parseIsoDate('date', iso) + days * MS_PER_DAY).toISOString().slice(0, 10);
}

/** Whole days from `from` to `to`; negative when `to` is earlier. */
export function daysBetween(from: string, to: string): number {
  return Math.round((parseIsoDate('date', to) - parseIsoDate('date', from)) / MS_PER_DAY);
}

/**
 * Near-term bill pressure as of `today`.
 *
 * Bills already past due are ignored. `dailyNeed` spreads the shortfall over
 * the days left before the closest due bill (at least one), plus half the
 * wants gap spread over the window.
 */
export function summarizeBillPressure(
  bills: Bill[],
  cashOnHand: number,
  windowDays: number,
  today: string,
  wantsCost = 0,
): BillPressure {
  requireNonNegative('cash_on_hand', cashOnHand);
  requireNonNegative('window_days', windowDays);
  requireNonNegative('wants_cost', wantsCost);

  const upcoming: Array<{ inDays: number; amount: number }> = [];
  for (const bill of bills) {
    requireNonNegative('bill amount', bill.amount);
    const inDays = daysBetween(today, bill.due_date);
    if (inDays >= 0) upcoming.push({ inDays, amount: bill.amount });
  }

  const totalDue = upcoming
    .filter((b) => b.inDays <= windowDays)
    .reduce((sum, b) => sum + b.amount, 0);
  const nextDueInDays = upcoming.length > 0 ? Math.min(...upcoming.map((b) => b.inDays)) : NO_PRESSURE_DAYS;
  const shortfall = Math.max(0, totalDue - cashOnHand);
  const wantsGap = Math.max(0, wantsCost - Math.max(0, cashOnHand - totalDue));

  const billNeed = upcoming.length > 0 ? shortfall / Math.max(1, nextDueInDays) : 0;
  const wantsNeed = (WANTS_WEIGHT * wantsGap) / Math.max(1, windowDays);

  return {
    totalDue: roundCents(totalDue),
    shortfall: roundCents(shortfall),
    wantsGap: roundCents(wantsGap),
    nextDueInDays,
    dailyNeed: roundCents(billNeed + wantsNeed),
  };
}

/** Today's earnings target: explicit if given, otherwise the bill pressure's daily need. */
export function resolveTarget(target: number | undefined, bills: BillInputs | undefined, today: string): number {
  if (target !== undefined) return target;
  if (!bills) {
    throw new InvalidInputError('Either a finance target or a bill list is required');
  }
  return summarizeBillPressure(bills.items, bills.cash_on_hand, bills.window_days, today, bills.wants_cost).dailyNeed;
}
