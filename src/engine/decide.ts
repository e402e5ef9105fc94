import type {
  ActionProfiles,
  DecisionResult,
  EngineRules,
  FinanceInputs,
  HistoryStats,
  RateCard,
  Situation,
} from '../shared/types.js';
import { createAgents } from './agents/index.js';
import type { AgentContext, ScoringAgent } from './agents/index.js';
import { buildBallot } from './ballot.js';
import { estimateActionEconomics } from './economics.js';
import { InvalidInputError, requireNonNegative } from './errors.js';
import { createFinanceSnapshot } from './finance.js';
import { DEFAULT_TIE_BREAK_BIAS, starTally } from './star-tally.js';
import { DEFAULT_URGENCY_CURVE, urgency } from './urgency.js';

export const DEFAULT_PROFILES: ActionProfiles = {
  NONE: { hours: 0, energy: 0 },
  SHORT: { hours: 3, energy: 3 },
  FULL: { hours: 6, energy: 4 },
};

export const DEFAULT_RULES: EngineRules = {
  urgency: DEFAULT_URGENCY_CURVE,
  tie_break: { bias: DEFAULT_TIE_BREAK_BIAS, min_urgency: 30 },
  agents: ['money', 'energy_match', 'schedule_fit', 'safety', 'rest_prior'],
  weights: {},
  profiles: DEFAULT_PROFILES,
  fatigue_after_hours: 6,
  rest_debt_saturation_hours: 8,
};

export const EMPTY_HISTORY: HistoryStats = { hoursYesterday: 0, avgNetPerHourRecent: 0 };

export interface DecisionInputs {
  finance: FinanceInputs;
  situation: Situation;
  rates?: RateCard | null;
  history?: HistoryStats;
}

function validateSituation(situation: Situation): void {
  requireNonNegative('hours_available_today', situation.hours_available_today);
  requireNonNegative('rest_debt_hours', situation.rest_debt_hours);
  const { energy_level } = situation;
  if (!Number.isInteger(energy_level) || energy_level < 1 || energy_level > 5) {
    throw new InvalidInputError(`energy_level must be a whole number from 1 to 5, got ${energy_level}`);
  }
  for (const commitment of situation.commitments) {
    requireNonNegative(`commitment "${commitment.label}" hours`, commitment.hours);
  }
}

/**
 * Run one decision: finance snapshot, urgency, agent ballot, STAR tally.
 *
 * The near-tie nudge is only allowed once urgency reaches
 * `rules.tie_break.min_urgency`; below that the plain STAR winner stands.
 * It also never moves to an action whose hours exceed today's availability.
 */
export function decide(
  inputs: DecisionInputs,
  rules: EngineRules = DEFAULT_RULES,
  agents: readonly ScoringAgent[] = createAgents(rules),
): DecisionResult {
  validateSituation(inputs.situation);

  const snapshot = createFinanceSnapshot(inputs.finance);
  const score = urgency(snapshot.gapRatio, rules.urgency);
  const economics = inputs.rates
    ? estimateActionEconomics(inputs.rates, rules.profiles, inputs.situation.hours_available_today)
    : null;
  const history = inputs.history ?? EMPTY_HISTORY;

  const context: AgentContext = {
    snapshot,
    urgency: score,
    situation: inputs.situation,
    profiles: rules.profiles,
    economics,
    history,
  };

  const hoursAvailable = inputs.situation.hours_available_today;
  const ballot = buildBallot(agents, context, rules.weights);
  const tally = starTally(ballot, {
    bias: rules.tie_break.bias,
    allowNudge: score >= rules.tie_break.min_urgency,
    canNudgeTo: (action) => rules.profiles[action].hours <= hoursAvailable,
  });

  return {
    winner: tally.winner,
    plannedHours: Math.min(rules.profiles[tally.winner].hours, hoursAvailable),
    tally,
    ballot,
    snapshot,
    urgency: score,
    economics,
    history,
  };
}
