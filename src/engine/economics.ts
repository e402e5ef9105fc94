import { mapActions } from '../shared/types.js';
import type { Action, ActionEconomics, ActionProfiles, RateCard } from '../shared/types.js';
import { InvalidInputError, requireNonNegative } from './errors.js';
import { roundCents } from './bills.js';

export const DEFAULT_MAINTENANCE_PER_MILE = 0.15;

/**
 * Expected gross, driving costs and net for each action's hours,
 * capped at the hours actually available today.
 */
export function estimateActionEconomics(
  rates: RateCard,
  profiles: ActionProfiles,
  hoursAvailable: number,
): Record<Action, ActionEconomics> {
  requireNonNegative('base_rate_per_hr', rates.base_rate_per_hr);
  requireNonNegative('tip_multiplier', rates.tip_multiplier);
  requireNonNegative('miles_per_hr', rates.miles_per_hr);
  requireNonNegative('gas_price_per_gal', rates.gas_price_per_gal);
  requireNonNegative('maintenance_per_mile', rates.maintenance_per_mile);
  requireNonNegative('hours_available_today', hoursAvailable);
  if (!Number.isFinite(rates.mpg) || rates.mpg <= 0) {
    throw new InvalidInputError(`mpg must be a positive number, got ${rates.mpg}`);
  }

  const grossPerHour = rates.base_rate_per_hr * rates.tip_multiplier;
  return mapActions((action) => {
    const hours = Math.min(profiles[action].hours, hoursAvailable);
    const miles = rates.miles_per_hr * hours;
    const gross = grossPerHour * hours;
    const gasCost = (miles / rates.mpg) * rates.gas_price_per_gal;
    const maintenanceCost = rates.maintenance_per_mile * miles;
    return {
      hours,
      gross: roundCents(gross),
      gasCost: roundCents(gasCost),
      maintenanceCost: roundCents(maintenanceCost),
      net: roundCents(gross - gasCost - maintenanceCost),
    };
  });
}
