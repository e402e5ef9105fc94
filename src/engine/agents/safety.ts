import type { AgentVote } from '../../shared/types.js';
import type { AgentContext, ScoringAgent } from './types.js';
import { losesMoney } from './types.js';

const NEUTRAL = 3;

export class SafetyAgent implements ScoringAgent {
  readonly name = 'safety';

  score(context: AgentContext): AgentVote {
    if (context.situation.safety_flags.length > 0) {
      return { NONE: 5, SHORT: 1, FULL: 0 };
    }

    return {
      NONE: NEUTRAL,
      SHORT: losesMoney(context, 'SHORT') ? 1 : NEUTRAL,
      FULL: losesMoney(context, 'FULL') ? 1 : NEUTRAL,
    };
  }
}
