import { describe, it, expect } from 'vitest';
import { urgency, DEFAULT_URGENCY_CURVE } from '@/engine/urgency.js';
import { InvalidInputError } from '@/engine/errors.js';

describe('urgency', () => {
  it('is exactly zero for a zero gap', () => {
    expect(urgency(0)).toBe(0);
    expect(urgency(0, { soft: 0.1, scale: 0.5 })).toBe(0);
  });

  it('is non-decreasing in the gap ratio', () => {
    let previous = -1;
    for (let ratio = 0; ratio <= 3; ratio += 0.05) {
      const value = urgency(ratio, DEFAULT_URGENCY_CURVE);
      expect(value).toBeGreaterThanOrEqual(previous);
      previous = value;
    }
  });

  it('saturates toward 100 and stays in bounds', () => {
    expect(urgency(10)).toBeGreaterThan(99.99);
    expect(urgency(10)).toBeLessThanOrEqual(100);
    expect(urgency(1e6)).toBe(100);
  });

  it('stays low for a small gap and high for a large one', () => {
    expect(urgency(10 / 150)).toBeCloseTo(2.495, 2);
    expect(urgency(0.95)).toBeCloseTo(98.95, 1);
  });

  it('crosses the midpoint near soft when the curve is steep', () => {
    expect(urgency(1, { soft: 1, scale: 0.05 })).toBeCloseTo(50, 4);
  });

  it('rises faster with a smaller scale', () => {
    const steep = urgency(0.5, { soft: 0.4, scale: 0.05 });
    const gentle = urgency(0.5, { soft: 0.4, scale: 0.2 });
    expect(steep).toBeGreaterThan(gentle);
  });

  it('rejects a non-positive scale', () => {
    expect(() => urgency(0.5, { soft: 0.4, scale: 0 })).toThrow(InvalidInputError);
    expect(() => urgency(0.5, { soft: 0.4, scale: -1 })).toThrow('Urgency scale must be a positive number, got -1');
  });

  it('rejects a negative soft threshold or gap ratio', () => {
    expect(() => urgency(0.5, { soft: -0.1, scale: 0.1 })).toThrow(InvalidInputError);
    expect(() => urgency(-0.2)).toThrow(InvalidInputError);
    expect(() => urgency(Number.NaN)).toThrow(InvalidInputError);
  });
});
