import { describe, it, expect } from 'vitest';
import { summarizeBillPressure, resolveTarget, addDays, daysBetween } from '@/engine/bills.js';
import { estimateActionEconomics } from '@/engine/economics.js';
import { DEFAULT_PROFILES } from '@/engine/decide.js';
import { InvalidInputError } from '@/engine/errors.js';
import type { Bill, RateCard } from '@/shared/types.js';

const bills: Bill[] = [
  { amount: 280, due_date: '2025-12-23' },
  { amount: 155, due_date: '2025-12-26' },
  { amount: 99, due_date: '2025-12-10' }, // already past
  { amount: 500, due_date: '2026-01-15' }, // beyond the window
];

describe('summarizeBillPressure', () => {
  it('totals bills in the window and spreads the shortfall to the next due date', () => {
    const pressure = summarizeBillPressure(bills, 120, 7, '2025-12-20');
    expect(pressure).toEqual({ totalDue: 435, shortfall: 315, wantsGap: 0, nextDueInDays: 3, dailyNeed: 105 });
  });

  it('reports no pressure when nothing is upcoming', () => {
    const pressure = summarizeBillPressure([{ amount: 99, due_date: '2025-12-10' }], 0, 7, '2025-12-20');
    expect(pressure).toEqual({ totalDue: 0, shortfall: 0, wantsGap: 0, nextDueInDays: 365, dailyNeed: 0 });
  });

  it('has no shortfall when cash covers the window', () => {
    const pressure = summarizeBillPressure(bills, 500, 7, '2025-12-20');
    expect(pressure.totalDue).toBe(435);
    expect(pressure.shortfall).toBe(0);
    expect(pressure.dailyNeed).toBe(0);
  });

  it('needs the whole shortfall today when a bill is due today', () => {
    const pressure = summarizeBillPressure([{ amount: 80, due_date: '2025-12-20' }], 30, 7, '2025-12-20');
    expect(pressure.nextDueInDays).toBe(0);
    expect(pressure.dailyNeed).toBe(50);
  });

  it('rounds daily need to cents', () => {
    const pressure = summarizeBillPressure([{ amount: 100, due_date: '2025-12-23' }], 0, 7, '2025-12-20');
    expect(pressure.dailyNeed).toBe(33.33);
  });

  it('adds half the uncovered wants, spread over the window', () => {
    // 500 on hand leaves 65 after the window's bills; 165 of wants leaves 100 uncovered
    const pressure = summarizeBillPressure(bills, 500, 7, '2025-12-20', 165);
    expect(pressure.shortfall).toBe(0);
    expect(pressure.wantsGap).toBe(100);
    expect(pressure.dailyNeed).toBe(7.14);
  });

  it('counts wants even with no bills upcoming', () => {
    const pressure = summarizeBillPressure([], 0, 7, '2025-12-20', 70);
    expect(pressure).toEqual({ totalDue: 0, shortfall: 0, wantsGap: 70, nextDueInDays: 365, dailyNeed: 5 });
  });

  it('stacks wants on top of a bill shortfall', () => {
    // no cash left over, so all 42 of wants count: 315 / 3 + 0.5 × 42 / 7
    const pressure = summarizeBillPressure(bills, 120, 7, '2025-12-20', 42);
    expect(pressure.wantsGap).toBe(42);
    expect(pressure.dailyNeed).toBe(108);
  });

  it('rejects negative wants', () => {
    expect(() => summarizeBillPressure(bills, 120, 7, '2025-12-20', -1))
      .toThrow('wants_cost must not be negative, got -1');
  });

  it('rejects malformed dates', () => {
    expect(() => summarizeBillPressure([{ amount: 1, due_date: '12/23/2025' }], 0, 7, '2025-12-20'))
      .toThrow(InvalidInputError);
  });
});

describe('resolveTarget', () => {
  const billInputs = { cash_on_hand: 120, window_days: 7, items: bills };

  it('prefers an explicit target', () => {
    expect(resolveTarget(50, billInputs, '2025-12-20')).toBe(50);
  });

  it('falls back to the daily need from bills', () => {
    expect(resolveTarget(undefined, billInputs, '2025-12-20')).toBe(105);
  });

  it('includes wants in the derived target', () => {
    expect(resolveTarget(undefined, { ...billInputs, wants_cost: 42 }, '2025-12-20')).toBe(108);
  });

  it('needs one or the other', () => {
    expect(() => resolveTarget(undefined, undefined, '2025-12-20')).toThrow(InvalidInputError);
  });
});

describe('date helpers', () => {
  it('adds days across month and leap boundaries', () => {
    expect(addDays('2025-12-30', 3)).toBe('2026-01-02');
    expect(addDays('2024-03-01', -1)).toBe('2024-02-29');
  });

  it('counts whole days between dates', () => {
    expect(daysBetween('2025-12-20', '2025-12-23')).toBe(3);
    expect(daysBetween('2025-12-20', '2025-12-10')).toBe(-10);
  });
});

describe('estimateActionEconomics', () => {
  const rates: RateCard = {
    base_rate_per_hr: 12,
    tip_multiplier: 1.3,
    miles_per_hr: 12,
    mpg: 15,
    gas_price_per_gal: 3.6,
    maintenance_per_mile: 0.15,
  };

  it('prices each action from the rate card', () => {
    const economics = estimateActionEconomics(rates, DEFAULT_PROFILES, 6);
    expect(economics.NONE).toEqual({ hours: 0, gross: 0, gasCost: 0, maintenanceCost: 0, net: 0 });
    expect(economics.SHORT).toEqual({ hours: 3, gross: 46.8, gasCost: 8.64, maintenanceCost: 5.4, net: 32.76 });
    expect(economics.FULL).toEqual({ hours: 6, gross: 93.6, gasCost: 17.28, maintenanceCost: 10.8, net: 65.52 });
  });

  it('caps hours at what is available today', () => {
    const economics = estimateActionEconomics(rates, DEFAULT_PROFILES, 4);
    expect(economics.FULL).toEqual({ hours: 4, gross: 62.4, gasCost: 11.52, maintenanceCost: 7.2, net: 43.68 });
  });

  it('rejects a zero mpg', () => {
    expect(() => estimateActionEconomics({ ...rates, mpg: 0 }, DEFAULT_PROFILES, 6)).toThrow(InvalidInputError);
  });
});
