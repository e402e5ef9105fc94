// ── Actions ──

export const ACTIONS = ['NONE', 'SHORT', 'FULL'] as const;

export type Action = (typeof ACTIONS)[number];

/** Least to most work. Also the index used by tie-break priority. */
export const WORK_ORDER: Record<Action, number> = {
  NONE: 0,
  SHORT: 1,
  FULL: 2,
};

export function isAction(value: unknown): value is Action {
  return ACTIONS.some((action) => action === value);
}

/** Build a per-action record. */
export function mapActions<T>(fn: (action: Action) => T): Record<Action, T> {
  return { NONE: fn('NONE'), SHORT: fn('SHORT'), FULL: fn('FULL') };
}

// ── Raw inputs (mirrors the YAML config, hence snake_case) ──

export interface FinanceInputs {
  gross: number;
  gas_cost: number;
  maintenance_cost: number;
  target: number;
}

export interface Bill {
  amount: number;
  /** ISO date, yyyy-mm-dd */
  due_date: string;
}

export interface BillInputs {
  cash_on_hand: number;
  window_days: number;
  items: Bill[];
  /** Optional spending this week beyond bills. Counts at half weight. */
  wants_cost?: number;
}

export interface RateCard {
  base_rate_per_hr: number;
  tip_multiplier: number;
  miles_per_hr: number;
  mpg: number;
  gas_price_per_gal: number;
  maintenance_per_mile: number;
}

export type SafetyFlag = 'fatigue' | 'hazard' | 'weather' | 'vehicle_issue';

export interface Commitment {
  label: string;
  hours: number;
}

export interface Situation {
  hours_available_today: number;
  /** Honest energy, 1..5 */
  energy_level: number;
  commitments: Commitment[];
  safety_flags: SafetyFlag[];
  rest_debt_hours: number;
}

export interface ActionProfile {
  hours: number;
  /** Energy needed, on the same 1..5 scale as Situation.energy_level. 0 = none. */
  energy: number;
}

export type ActionProfiles = Record<Action, ActionProfile>;

// ── Engine rules ──

export type AgentName = 'money' | 'energy_match' | 'schedule_fit' | 'safety' | 'rest_prior';

export interface UrgencyCurveParams {
  /** gap ratio where the curve crosses its midpoint */
  soft: number;
  /** steepness; smaller rises faster */
  scale: number;
}

export interface TieBreakRules {
  /**
   * Per-entry score margin the more work-oriented finalist may trail by and
   * still take a near-tie. The threshold is bias × ballot entries.
   */
  bias: number;
  /** Urgency (0..100) below which the nudge never fires. */
  min_urgency: number;
}

/** Fixed per-agent multipliers applied to each star before the 0..5 clamp. Missing = 1. */
export type AgentWeights = Partial<Record<AgentName, number>>;

export interface EngineRules {
  urgency: UrgencyCurveParams;
  tie_break: TieBreakRules;
  agents: AgentName[];
  weights: AgentWeights;
  profiles: ActionProfiles;
  fatigue_after_hours: number;
  rest_debt_saturation_hours: number;
}

// ── Computed records ──

export interface FinanceSnapshot {
  readonly gross: number;
  readonly gasCost: number;
  readonly maintenanceCost: number;
  readonly net: number;
  readonly target: number;
  readonly gap: number;
  readonly gapRatio: number;
}

export interface BillPressure {
  readonly totalDue: number;
  readonly shortfall: number;
  /** Wants not covered by cash left after the window's bills. */
  readonly wantsGap: number;
  readonly nextDueInDays: number;
  readonly dailyNeed: number;
}

export interface ActionEconomics {
  readonly hours: number;
  readonly gross: number;
  readonly gasCost: number;
  readonly maintenanceCost: number;
  readonly net: number;
}

export interface HistoryStats {
  readonly hoursYesterday: number;
  readonly avgNetPerHourRecent: number;
}

export type AgentVote = Readonly<Record<Action, number>>;

export interface BallotEntry {
  readonly agent: string;
  readonly vote: AgentVote;
}

export interface Ballot {
  readonly entries: readonly BallotEntry[];
}

export interface TallyResult {
  readonly totals: Readonly<Record<Action, number>>;
  readonly topTwo: readonly [Action, Action];
  /** Entries that scored each finalist strictly higher than the other, aligned with topTwo. */
  readonly preferences: readonly [number, number];
  readonly runoffWinner: Action;
  readonly winner: Action;
  readonly nudgeApplied: boolean;
  /** total(runoffWinner) − total(other finalist) */
  readonly scoreMargin: number;
  readonly summary: string;
}

export interface DecisionResult {
  readonly winner: Action;
  /** Winner's hours, capped at the hours available today. */
  readonly plannedHours: number;
  readonly tally: TallyResult;
  readonly ballot: Ballot;
  readonly snapshot: FinanceSnapshot;
  readonly urgency: number;
  readonly economics: Readonly<Record<Action, ActionEconomics>> | null;
  readonly history: HistoryStats;
}

// ── Persisted entities ──

export interface HistoryEntry {
  id: string;
  /** ISO date, yyyy-mm-dd */
  decidedOn: string;
  choice: Action;
  hours: number;
  gross: number;
  net: number;
  actualHours: number | null;
  actualNet: number | null;
  result: DecisionResult;
  createdAt: string;
}
