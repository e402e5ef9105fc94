import type { AgentVote } from '../../shared/types.js';
import type { AgentContext, ScoringAgent } from './types.js';

export interface RestPriorOptions {
  /** Rest debt at which the pull toward NONE is at its strongest. */
  saturationHours?: number;
}

/**
 * Counterweight to Money: the more rest debt, the more NONE is preferred.
 * Ignores urgency on purpose. With no debt it scores every action the same.
 */
export class RestPriorAgent implements ScoringAgent {
  readonly name = 'rest_prior';
  private saturationHours: number;

  constructor(opts: RestPriorOptions = {}) {
    this.saturationHours = opts.saturationHours ?? 8;
  }

  score(context: AgentContext): AgentVote {
    const r = Math.min(1, context.situation.rest_debt_hours / this.saturationHours);

    return {
      NONE: Math.round(2 + 3 * r),
      SHORT: Math.round(2 - r),
      FULL: Math.round(2 - 2 * r),
    };
  }
}
