import { ACTIONS, WORK_ORDER, mapActions } from '../shared/types.js';
import type { Action, Ballot, TallyResult } from '../shared/types.js';
import { validateVote } from './ballot.js';
import { EmptyBallotError, InvalidInputError } from './errors.js';

export const DEFAULT_TIE_BREAK_BIAS = 0.6;

export interface StarTallyOptions {
  /** Per-entry score margin for the near-tie nudge. Threshold = bias × entries. */
  bias?: number;
  /** Set false to report the plain STAR result. */
  allowNudge?: boolean;
  /** The nudge only moves to an action this accepts, e.g. one that fits today's hours. */
  canNudgeTo?: (action: Action) => boolean;
}

/** Tie-break priority for equal totals: most work first. */
const PRIORITY: readonly Action[] = [...ACTIONS].sort((a, b) => WORK_ORDER[b] - WORK_ORDER[a]);

function moreWork(a: Action, b: Action): Action {
  return WORK_ORDER[a] >= WORK_ORDER[b] ? a : b;
}

/**
 * Score Then Automatic Runoff over one ballot.
 *
 * Score phase sums stars per action. The two highest totals go to a runoff
 * decided by how many entries score one finalist strictly above the other;
 * an even runoff falls back to the higher total, then to the more
 * work-oriented finalist.
 *
 * Near-tie nudge: when the runoff goes to the less work-oriented finalist
 * and the two totals are less than bias × entries apart (either way), the
 * other finalist wins instead. The margin is measured on score totals, not
 * preference counts.
 */
export function starTally(ballot: Ballot, opts: StarTallyOptions = {}): TallyResult {
  const bias = opts.bias ?? DEFAULT_TIE_BREAK_BIAS;
  const allowNudge = opts.allowNudge ?? true;
  if (!Number.isFinite(bias) || bias < 0) {
    throw new InvalidInputError(`Tie-break bias must be a non-negative number, got ${bias}`);
  }

  const { entries } = ballot;
  if (entries.length === 0) {
    throw new EmptyBallotError();
  }
  for (const entry of entries) {
    validateVote(entry.agent, entry.vote);
  }

  // ── Score phase ──
  const totals = mapActions((action) => entries.reduce((sum, e) => sum + e.vote[action], 0));

  // ── Runoff phase ──
  // Array.prototype.sort is stable, so equal totals keep PRIORITY order.
  const [first, second] = [...PRIORITY].sort((a, b) => totals[b] - totals[a]);

  let firstPref = 0;
  let secondPref = 0;
  for (const { vote } of entries) {
    if (vote[first] > vote[second]) firstPref++;
    else if (vote[second] > vote[first]) secondPref++;
  }

  let runoffWinner: Action;
  if (firstPref !== secondPref) {
    runoffWinner = firstPref > secondPref ? first : second;
  } else {
    // `first` already holds the higher total, or the more work on equal totals
    runoffWinner = first;
  }
  const runnerUp = runoffWinner === first ? second : first;
  const scoreMargin = totals[runoffWinner] - totals[runnerUp];

  // ── Near-tie nudge ──
  const workFinalist = moreWork(first, second);
  const nudgeApplied = allowNudge
    && runoffWinner !== workFinalist
    && Math.abs(scoreMargin) < bias * entries.length
    && (opts.canNudgeTo?.(workFinalist) ?? true);
  const winner = nudgeApplied ? workFinalist : runoffWinner;

  const parts = [
    `Totals: ${ACTIONS.map((a) => `${a} ${totals[a]}`).join(', ')}`,
    `Runoff: ${first} ${firstPref} vs ${second} ${secondPref}`,
    `Winner: ${winner}`,
  ];
  if (nudgeApplied) parts.push(`Near-tie nudge: ${runoffWinner} -> ${winner}`);

  return {
    totals,
    topTwo: [first, second],
    preferences: [firstPref, secondPref],
    runoffWinner,
    winner,
    nudgeApplied,
    scoreMargin,
    summary: parts.join('. '),
  };
}
