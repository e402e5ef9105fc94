import type { FinanceInputs, FinanceSnapshot } from '../shared/types.js';
import { requireNonNegative } from './errors.js';

/**
 * Net earnings and the shortfall against today's target.
 * Throws InvalidInputError on any negative or non-finite input.
 */
export function createFinanceSnapshot(inputs: FinanceInputs): FinanceSnapshot {
  requireNonNegative('gross', inputs.gross);
  requireNonNegative('gas_cost', inputs.gas_cost);
  requireNonNegative('maintenance_cost', inputs.maintenance_cost);
  requireNonNegative('target', inputs.target);

  const net = inputs.gross - inputs.gas_cost - inputs.maintenance_cost;
  const gap = Math.max(0, inputs.target - net);

  return {
    gross: inputs.gross,
    gasCost: inputs.gas_cost,
    maintenanceCost: inputs.maintenance_cost,
    net,
    target: inputs.target,
    gap,
    gapRatio: inputs.target > 0 ? gap / inputs.target : 0,
  };
}
