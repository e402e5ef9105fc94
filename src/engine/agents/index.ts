import type { AgentName, EngineRules } from '../../shared/types.js';
import type { ScoringAgent } from './types.js';
import { MoneyAgent } from './money.js';
import { EnergyMatchAgent } from './energy-match.js';
import { ScheduleFitAgent } from './schedule-fit.js';
import { SafetyAgent } from './safety.js';
import { RestPriorAgent } from './rest-prior.js';

export type { ScoringAgent, AgentContext } from './types.js';

export const ALL_AGENTS: readonly AgentName[] = ['money', 'energy_match', 'schedule_fit', 'safety', 'rest_prior'];

export function createAgent(
  name: AgentName,
  rules?: Pick<EngineRules, 'fatigue_after_hours' | 'rest_debt_saturation_hours'>,
): ScoringAgent {
  switch (name) {
    case 'money':
      return new MoneyAgent();
    case 'energy_match':
      return new EnergyMatchAgent({ fatigueAfterHours: rules?.fatigue_after_hours });
    case 'schedule_fit':
      return new ScheduleFitAgent();
    case 'safety':
      return new SafetyAgent();
    case 'rest_prior':
      return new RestPriorAgent({ saturationHours: rules?.rest_debt_saturation_hours });
  }
}

/** The fixed agent list for a decision; defaults to all five. */
export function createAgents(rules?: Partial<EngineRules>): ScoringAgent[] {
  const names = rules?.agents ?? ALL_AGENTS;
  return names.map((name) => createAgent(name, {
    fatigue_after_hours: rules?.fatigue_after_hours ?? 6,
    rest_debt_saturation_hours: rules?.rest_debt_saturation_hours ?? 8,
  }));
}

export { MoneyAgent, EnergyMatchAgent, ScheduleFitAgent, SafetyAgent, RestPriorAgent };
