export * from './shared/types.js';
export { ShiftConfigSchema, validateAgentList, type ValidatedShiftConfig } from './shared/schemas.js';
export { InvalidInputError, AgentScoreRangeError, EmptyBallotError } from './engine/errors.js';
export { createFinanceSnapshot } from './engine/finance.js';
export { summarizeBillPressure, resolveTarget } from './engine/bills.js';
export { estimateActionEconomics } from './engine/economics.js';
export { urgency, DEFAULT_URGENCY_CURVE } from './engine/urgency.js';
export {
  createAgent,
  createAgents,
  ALL_AGENTS,
  MoneyAgent,
  EnergyMatchAgent,
  ScheduleFitAgent,
  SafetyAgent,
  RestPriorAgent,
  type ScoringAgent,
  type AgentContext,
} from './engine/agents/index.js';
export { applyWeight, buildBallot, validateVote } from './engine/ballot.js';
export { starTally, DEFAULT_TIE_BREAK_BIAS, type StarTallyOptions } from './engine/star-tally.js';
export { decide, DEFAULT_RULES, DEFAULT_PROFILES, type DecisionInputs } from './engine/decide.js';
export { summarizeHistory } from './engine/history.js';
export { parseConfig, loadConfigFile, toDecisionInputs, ConfigLoadError } from './engine/config-loader.js';
export { createDb, runMigrations } from './store/db.js';
export { HistoryStore } from './store/history.js';
