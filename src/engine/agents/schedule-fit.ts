import { mapActions } from '../../shared/types.js';
import type { AgentVote } from '../../shared/types.js';
import type { AgentContext, ScoringAgent } from './types.js';

const MIN_FREE_HOURS = 0.1;

/**
 * Fit against today's free hours (available minus commitments).
 * Actions that fill more of the free time score higher; an action that
 * overruns but could be done at least half-way keeps partial credit.
 */
export class ScheduleFitAgent implements ScoringAgent {
  readonly name = 'schedule_fit';

  freeHours(context: AgentContext): number {
    const committed = context.situation.commitments.reduce((sum, c) => sum + c.hours, 0);
    return Math.max(0, context.situation.hours_available_today - committed);
  }

  score(context: AgentContext): AgentVote {
    const free = this.freeHours(context);

    return mapActions((action) => {
      const hours = context.profiles[action].hours;
      if (hours === 0) return 4;
      if (hours <= free) {
        return Math.round(2 + (3 * hours) / Math.max(MIN_FREE_HOURS, free));
      }
      return free >= hours / 2 ? 1 : 0;
    });
  }
}
