/**
 * Errors that can cross the research core's boundary.
 * Parse failures, failed decomposition, exhausted budgets and stalled plans are
 * absorbed into degraded output and never surface as errors.
 */

export class ResearchInputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ResearchInputError';
  }
}

export class ResearchCancelledError extends Error {
  constructor(
    message: string,
    public readonly completedSubtasks: number = 0
  ) {
    super(message);
    this.name = 'ResearchCancelledError';
  }
}

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly key?: string
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}
