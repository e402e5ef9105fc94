import type { Action, AgentVote } from '../../shared/types.js';
import type { AgentContext, ScoringAgent } from './types.js';
import { losesMoney } from './types.js';

/** Urgency (as a 0..1 fraction) at or below which resting still earns Money credit. */
const NEAR_ZERO_URGENCY = 0.1;
/** Net per hour that counts as a fully worthwhile shift. */
const GOOD_NET_PER_HOUR = 12;
/** Share of a work score that comes from earning efficiency rather than urgency. */
const EFFICIENCY_SHARE = 0.25;

/**
 * Financial pressure. Work scores rise with urgency; NONE only scores
 * while urgency is close to zero.
 *
 * When there is a net-per-hour to go on (recent history first, else the
 * rate card's estimate for that action), a quarter of each work score
 * tracks it instead of urgency.
 */
export class MoneyAgent implements ScoringAgent {
  readonly name = 'money';

  /** 0..1, or null when neither history nor a rate card says anything. */
  efficiency(context: AgentContext, action: Action): number | null {
    const recent = context.history.avgNetPerHourRecent;
    if (recent > 0) return Math.min(1, recent / GOOD_NET_PER_HOUR);

    const planned = context.economics?.[action];
    if (planned && planned.hours > 0) {
      return Math.min(1, Math.max(0, planned.net / planned.hours) / GOOD_NET_PER_HOUR);
    }
    return null;
  }

  private work(context: AgentContext, action: Action, fromUrgency: number): number {
    if (losesMoney(context, action)) return 0;
    const eff = this.efficiency(context, action);
    if (eff === null) return Math.round(fromUrgency);
    return Math.round((1 - EFFICIENCY_SHARE) * fromUrgency + EFFICIENCY_SHARE * 5 * eff);
  }

  score(context: AgentContext): AgentVote {
    const u = context.urgency / 100;

    return {
      NONE: u <= NEAR_ZERO_URGENCY ? Math.round(3 * (1 - u / NEAR_ZERO_URGENCY)) : 0,
      SHORT: this.work(context, 'SHORT', 1 + 3 * u),
      FULL: this.work(context, 'FULL', 5 * u),
    };
  }
}
