import { mapActions } from '../../shared/types.js';
import type { AgentVote } from '../../shared/types.js';
import type { AgentContext, ScoringAgent } from './types.js';

export interface EnergyMatchOptions {
  /** A worked day at least this long costs one energy point the next day. */
  fatigueAfterHours?: number;
}

export class EnergyMatchAgent implements ScoringAgent {
  readonly name = 'energy_match';
  private fatigueAfterHours: number;

  constructor(opts: EnergyMatchOptions = {}) {
    this.fatigueAfterHours = opts.fatigueAfterHours ?? 6;
  }

  /** Energy level after yesterday's load, never below 1. */
  effectiveEnergy(context: AgentContext): number {
    const level = context.situation.energy_level;
    if (context.history.hoursYesterday >= this.fatigueAfterHours) {
      return Math.max(1, level - 1);
    }
    return level;
  }

  score(context: AgentContext): AgentVote {
    const have = this.effectiveEnergy(context);

    return mapActions((action) => {
      const need = context.profiles[action].energy;
      if (need <= have) return 5;
      // One point short is a stretch, further is a slog. Neither is a hard block.
      if (need <= have + 1) return 2;
      return 1;
    });
  }
}
