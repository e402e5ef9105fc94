/** Malformed or out-of-range numeric input to the finance or urgency stages. */
export class InvalidInputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidInputError';
  }
}

/** An agent returned a vote that is missing an action, has an extra one, or is out of bounds. */
export class AgentScoreRangeError extends Error {
  constructor(
    public agent: string,
    message: string,
  ) {
    super(`${agent}: ${message}`);
    this.name = 'AgentScoreRangeError';
  }
}

export class EmptyBallotError extends Error {
  constructor(message = 'Cannot tally an empty ballot') {
    super(message);
    this.name = 'EmptyBallotError';
  }
}

export function requireNonNegative(label: string, value: number): void {
  if (!Number.isFinite(value)) {
    throw new InvalidInputError(`${label} must be a finite number, got ${value}`);
  }
  if (value < 0) {
    throw new InvalidInputError(`${label} must not be negative, got ${value}`);
  }
}
