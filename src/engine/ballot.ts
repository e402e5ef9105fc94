import { ACTIONS, isAction, mapActions } from '../shared/types.js';
import type { AgentVote, AgentWeights, Ballot, BallotEntry } from '../shared/types.js';
import type { AgentContext, ScoringAgent } from './agents/index.js';
import { AgentScoreRangeError, InvalidInputError } from './errors.js';

export const MIN_SCORE = 0;
export const MAX_SCORE = 5;

/**
 * Check that a vote scores exactly the three actions, each with a whole
 * number of stars in [0, 5].
 */
export function validateVote(agent: string, vote: AgentVote): void {
  for (const key of Object.keys(vote)) {
    if (!isAction(key)) {
      throw new AgentScoreRangeError(agent, `scored unknown action "${key}"`);
    }
  }
  for (const action of ACTIONS) {
    const score: unknown = vote[action];
    if (typeof score !== 'number') {
      throw new AgentScoreRangeError(agent, `no score for ${action}`);
    }
    if (!Number.isInteger(score) || score < MIN_SCORE || score > MAX_SCORE) {
      throw new AgentScoreRangeError(
        agent,
        `score for ${action} must be a whole number in [${MIN_SCORE}, ${MAX_SCORE}], got ${score}`,
      );
    }
  }
}

/** Scale a validated vote by a fixed weight, rounding back to whole stars in [0, 5]. */
export function applyWeight(vote: AgentVote, weight: number): AgentVote {
  return mapActions((action) => Math.min(MAX_SCORE, Math.max(MIN_SCORE, Math.round(vote[action] * weight))));
}

/**
 * Run every agent over the same context and collect the votes.
 * Entries come back sorted by agent name, so the ballot does not depend
 * on the order the agents were listed in. Each vote is validated before
 * its agent's weight (default 1) is applied.
 */
export function buildBallot(
  agents: readonly ScoringAgent[],
  context: AgentContext,
  weights: AgentWeights = {},
): Ballot {
  for (const [agent, weight] of Object.entries(weights)) {
    if (weight !== undefined && (!Number.isFinite(weight) || weight < 0)) {
      throw new InvalidInputError(`Weight for ${agent} must be a non-negative number, got ${weight}`);
    }
  }

  const seen = new Set<string>();
  const entries: BallotEntry[] = [];

  for (const agent of agents) {
    if (seen.has(agent.name)) {
      throw new InvalidInputError(`Agent "${agent.name}" is listed more than once`);
    }
    seen.add(agent.name);

    const vote = agent.score(context);
    validateVote(agent.name, vote);
    entries.push({ agent: agent.name, vote: applyWeight(vote, weights[agent.name] ?? 1) });
  }

  entries.sort((a, b) => (a.agent < b.agent ? -1 : a.agent > b.agent ? 1 : 0));
  return { entries };
}
