import { z } from 'zod';

// ── Zod schemas for YAML config validation ──

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

// js-yaml turns an unquoted 2025-12-23 into a Date; fold it back to yyyy-mm-dd.
const IsoDateSchema = z.preprocess(
  (val) => (val instanceof Date ? val.toISOString().slice(0, 10) : val),
  z.string().regex(ISO_DATE, 'Expected an ISO date (yyyy-mm-dd)'),
);

const ActionProfileSchema = z.object({
  hours: z.number().min(0),
  energy: z.number().int().min(0).max(5),
});

const AgentNameSchema = z.enum(['money', 'energy_match', 'schedule_fit', 'safety', 'rest_prior']);

const WeightSchema = z.number().min(0).optional();

const AgentWeightsSchema = z.object({
  money: WeightSchema,
  energy_match: WeightSchema,
  schedule_fit: WeightSchema,
  safety: WeightSchema,
  rest_prior: WeightSchema,
}).strict();

const EngineRulesSchema = z.object({
  urgency: z.object({
    soft: z.number().min(0).default(0.4),
    scale: z.number().positive().default(0.12),
  }).default({}),
  tie_break: z.object({
    bias: z.number().min(0).default(0.6),
    min_urgency: z.number().min(0).max(100).default(30),
  }).default({}),
  agents: z.array(AgentNameSchema)
    .min(1, 'At least one agent is required')
    .default(['money', 'energy_match', 'schedule_fit', 'safety', 'rest_prior']),
  weights: AgentWeightsSchema.default({}),
  profiles: z.object({
    NONE: ActionProfileSchema,
    SHORT: ActionProfileSchema,
    FULL: ActionProfileSchema,
  }).default({
    NONE: { hours: 0, energy: 0 },
    SHORT: { hours: 3, energy: 3 },
    FULL: { hours: 6, energy: 4 },
  }),
  fatigue_after_hours: z.number().positive().default(6),
  rest_debt_saturation_hours: z.number().positive().default(8),
});

const FinanceSchema = z.object({
  gross: z.number().min(0),
  gas_cost: z.number().min(0).default(0),
  maintenance_cost: z.number().min(0).default(0),
  target: z.number().min(0).optional(),
});

const BillsSchema = z.object({
  cash_on_hand: z.number().min(0),
  window_days: z.number().int().min(0).default(7),
  items: z.array(z.object({
    amount: z.number().min(0),
    due_date: IsoDateSchema,
  })).default([]),
  wants_cost: z.number().min(0).default(0),
});

const RateCardSchema = z.object({
  base_rate_per_hr: z.number().min(0),
  tip_multiplier: z.number().min(0).default(1),
  miles_per_hr: z.number().min(0),
  mpg: z.number().positive(),
  gas_price_per_gal: z.number().min(0),
  maintenance_per_mile: z.number().min(0).default(0.15),
});

const SituationSchema = z.object({
  hours_available_today: z.number().min(0),
  energy_level: z.number().int().min(1).max(5),
  commitments: z.array(z.object({
    label: z.string().min(1),
    hours: z.number().min(0),
  })).default([]),
  safety_flags: z.array(z.enum(['fatigue', 'hazard', 'weather', 'vehicle_issue'])).default([]),
  rest_debt_hours: z.number().min(0).default(0),
});

const TodaySchema = z.object({
  date: IsoDateSchema.optional(),
  finance: FinanceSchema,
  bills: BillsSchema.optional(),
  rates: RateCardSchema.optional(),
  situation: SituationSchema,
}).refine(
  (t) => t.finance.target !== undefined || t.bills !== undefined,
  { message: 'finance.target is required when no bills are listed', path: ['finance', 'target'] },
);

export const ShiftConfigSchema = z.object({
  version: z.literal('1'),
  engine: EngineRulesSchema.default({}),
  today: TodaySchema,
});

export type ValidatedShiftConfig = z.infer<typeof ShiftConfigSchema>;

/**
 * Validate that no agent is listed twice.
 * Returns an array of error messages (empty = valid).
 */
export function validateAgentList(config: ValidatedShiftConfig): string[] {
  const errors: string[] = [];
  const seen = new Set<string>();
  for (const name of config.engine.agents) {
    if (seen.has(name)) {
      errors.push(`engine.agents: "${name}" is listed more than once`);
    }
    seen.add(name);
  }
  return errors;
}
