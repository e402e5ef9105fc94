import type { UrgencyCurveParams } from '../shared/types.js';
import { InvalidInputError } from './errors.js';

export const DEFAULT_URGENCY_CURVE: UrgencyCurveParams = { soft: 0.4, scale: 0.12 };

function logistic(x: number, { soft, scale }: UrgencyCurveParams): number {
  return 1 / (1 + Math.exp(-(x - soft) / scale));
}

/**
 * Map a gap ratio to urgency in [0, 100].
 *
 * A logistic centred on `soft`, rescaled so that a zero gap is exactly 0 and
 * the curve saturates at 100. The rescale moves the midpoint slightly above
 * `soft` when soft/scale is small.
 */
export function urgency(gapRatio: number, params: UrgencyCurveParams = DEFAULT_URGENCY_CURVE): number {
  if (!Number.isFinite(params.scale) || params.scale <= 0) {
    throw new InvalidInputError(`Urgency scale must be a positive number, got ${params.scale}`);
  }
  // soft >= 0 keeps logistic(0) <= 0.5, so the rescale never divides by zero
  if (!Number.isFinite(params.soft) || params.soft < 0) {
    throw new InvalidInputError(`Urgency soft threshold must be a non-negative number, got ${params.soft}`);
  }
  if (!Number.isFinite(gapRatio) || gapRatio < 0) {
    throw new InvalidInputError(`Gap ratio must be a non-negative number, got ${gapRatio}`);
  }

  const floor = logistic(0, params);
  const value = (100 * (logistic(gapRatio, params) - floor)) / (1 - floor);
  return Math.min(100, Math.max(0, value));
}
