import type {
  Action,
  ActionEconomics,
  ActionProfiles,
  AgentName,
  AgentVote,
  FinanceSnapshot,
  HistoryStats,
  Situation,
} from '../../shared/types.js';

/** Everything an agent may look at. Built once per decision and shared read-only. */
export interface AgentContext {
  readonly snapshot: FinanceSnapshot;
  /** 0..100 */
  readonly urgency: number;
  readonly situation: Readonly<Situation>;
  readonly profiles: Readonly<ActionProfiles>;
  readonly economics: Readonly<Record<Action, ActionEconomics>> | null;
  readonly history: HistoryStats;
}

export interface ScoringAgent {
  readonly name: AgentName;
  score(context: AgentContext): AgentVote;
}

/** True when the rate card says this work action would not cover its own driving costs. */
export function losesMoney(context: AgentContext, action: Action): boolean {
  return action !== 'NONE' && context.economics !== null && context.economics[action].net <= 0;
}
