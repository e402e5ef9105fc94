import * as yaml from 'js-yaml';
import { readFileSync } from 'node:fs';
import { ShiftConfigSchema, validateAgentList, type ValidatedShiftConfig } from '../shared/schemas.js';
import type { EngineRules } from '../shared/types.js';
import { resolveTarget } from './bills.js';
import type { DecisionInputs } from './decide.js';

export class ConfigLoadError extends Error {
  constructor(
    message: string,
    public details: string[] = [],
  ) {
    super(message);
    this.name = 'ConfigLoadError';
  }
}

const PLACEHOLDER = /\$\{([A-Za-z_][A-Za-z0-9_]*)\}/g;
const WHOLE_PLACEHOLDER = /^\$\{([A-Za-z_][A-Za-z0-9_]*)\}$/;
const NUMERIC = /^-?\d+(\.\d+)?$/;

/**
 * Recursively resolve ${ENV_VAR} patterns in parsed string values. A value
 * that is a single placeholder resolving to a plain number becomes that
 * number. Unset variables become empty.
 */
function resolveEnvVars(value: unknown): unknown {
  if (typeof value === 'string') {
    const whole = WHOLE_PLACEHOLDER.exec(value);
    if (whole) {
      const resolved = process.env[whole[1]] ?? '';
      return NUMERIC.test(resolved) ? Number(resolved) : resolved;
    }
    return value.replace(PLACEHOLDER, (_match, varName: string) => {
      return process.env[varName] ?? '';
    });
  }
  if (value instanceof Date) {
    return value;
  }
  if (Array.isArray(value)) {
    return value.map(resolveEnvVars);
  }
  if (value !== null && typeof value === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, val] of Object.entries(value)) {
      result[key] = resolveEnvVars(val);
    }
    return result;
  }
  return value;
}

/**
 * Parse and validate a shift YAML config string.
 */
export function parseConfig(yamlContent: string): ValidatedShiftConfig {
  let raw: unknown;
  try {
    raw = yaml.load(yamlContent);
  } catch (err) {
    throw new ConfigLoadError(`Invalid YAML: ${(err as Error).message}`);
  }

  const result = ShiftConfigSchema.safeParse(resolveEnvVars(raw));
  if (!result.success) {
    const details = result.error.issues.map(
      (i) => `${i.path.join('.')}: ${i.message}`,
    );
    throw new ConfigLoadError('Config validation failed', details);
  }

  const listErrors = validateAgentList(result.data);
  if (listErrors.length > 0) {
    throw new ConfigLoadError('Invalid agent list in config', listErrors);
  }

  return result.data;
}

/**
 * Load and validate a shift config from a file path.
 */
export function loadConfigFile(filePath: string): ValidatedShiftConfig {
  let content: string;
  try {
    content = readFileSync(filePath, 'utf-8');
  } catch (err) {
    throw new ConfigLoadError(`Cannot read config file: ${(err as Error).message}`);
  }
  return parseConfig(content);
}

export interface PreparedDecision {
  date: string;
  rules: EngineRules;
  inputs: DecisionInputs;
}

/**
 * Turn a validated config into engine rules and inputs for `date`
 * (the config's own `today.date` wins when set). A missing target is
 * filled from the bill list.
 */
export function toDecisionInputs(config: ValidatedShiftConfig, date: string): PreparedDecision {
  const { today } = config;
  const day = today.date ?? date;

  return {
    date: day,
    rules: config.engine,
    inputs: {
      finance: {
        gross: today.finance.gross,
        gas_cost: today.finance.gas_cost,
        maintenance_cost: today.finance.maintenance_cost,
        target: resolveTarget(today.finance.target, today.bills, day),
      },
      situation: today.situation,
      rates: today.rates ?? null,
    },
  };
}
