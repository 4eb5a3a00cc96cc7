/**
 * Error taxonomy for the evolution engine.
 *
 * Invariant violations (wrong genome length) end the run. Configuration and
 * operator errors have a documented fallback. Every class carries a stable
 * `name` so callers can branch on it after a serialization boundary.
 */

/** Base class for every error the engine raises on purpose. */
export class EvolutionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** A genome handed to the decoder does not have the schema's bit length. */
export class InvalidGenomeLengthError extends EvolutionError {
  constructor(readonly expected: number, readonly actual: number) {
    super(`Genome has ${actual} bits, the vehicle schema needs ${expected}.`);
  }
}

/**
 * Settings or an operator module were rejected while loading.
 *
 * `issues` lists one human-readable line per failed check.
 */
export class ConfigurationError extends EvolutionError {
  readonly issues: readonly string[];

  constructor(message: string, issues: readonly string[] = []) {
    super(issues.length ? `${message}: ${issues.join('; ')}` : message);
    this.issues = issues;
  }
}

/** Which of the two pluggable operator roles failed. */
export type OperatorRole = 'crossover' | 'mutate';

/** A pluggable operator threw or returned something that is not a valid genome. */
export class OperatorFailureError extends EvolutionError {
  constructor(
    readonly role: OperatorRole,
    readonly operator: string,
    readonly reason: string,
    readonly original?: unknown
  ) {
    super(`Operator "${operator}" failed during ${role}: ${reason}`);
  }
}

/** The next generation was requested while some fitness values are missing. */
export class IncompleteGenerationError extends EvolutionError {
  constructor(readonly generation: number, readonly pending: readonly number[]) {
    super(
      `Generation ${generation} still waits for fitness of ${pending.length} individual(s): ${pending.join(', ')}`
    );
  }
}

/** A fitness report named an unknown id, repeated an id, or was not a finite number. */
export class InvalidFitnessReportError extends EvolutionError {
  constructor(readonly individualId: number, reason: string) {
    super(`Rejected fitness report for individual ${individualId}: ${reason}`);
  }
}

/** Seed text with a `\x` or `\d` prefix did not hold a valid integer. */
export class SeedParseError extends EvolutionError {
  constructor(readonly input: string, reason: string) {
    super(`Cannot parse seed "${input}": ${reason}`);
  }
}
