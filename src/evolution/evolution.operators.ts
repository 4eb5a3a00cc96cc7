import Genome, { Rng } from '../architecture/genome';
import { crossover, CrossoverFn } from '../methods/crossover';
import { mutation, MutationFn } from '../methods/mutation';
import { OperatorFailureError, OperatorRole } from '../errors';

/**
 * Pluggable genetic operators.
 *
 * The manager only ever calls the two functions of a {@link GeneticOperators}
 * value. Where the value came from (built-in, registry, a module loaded at
 * startup) is invisible to it.
 */

/** The two operator roles the generation manager breeds with. */
export interface GeneticOperators {
  /** Label used in warnings and telemetry. */
  readonly name: string;
  readonly crossover: CrossoverFn;
  readonly mutate: MutationFn;
}

/** Built-in operators: point crossover and distinct bit flips. */
export const BUILTIN_OPERATORS: GeneticOperators = Object.freeze({
  name: 'builtin',
  crossover: crossover.POINT.fn,
  mutate: mutation.FLIP_BITS.fn,
});

/**
 * Named operator sets. Built-ins are registered on construction as
 * `builtin` (point crossover) and `uniform` (uniform crossover).
 */
export class OperatorRegistry {
  private readonly entries = new Map<string, GeneticOperators>();

  constructor() {
    this.bind(BUILTIN_OPERATORS);
    this.bind({
      name: 'uniform',
      crossover: crossover.UNIFORM.fn,
      mutate: mutation.FLIP_BITS.fn,
    });
  }

  /** Register (or replace) an operator set under its `name`. */
  bind(operators: GeneticOperators): this {
    this.entries.set(operators.name, operators);
    return this;
  }

  has(name: string): boolean {
    return this.entries.has(name);
  }

  /** Look up a set; unknown names resolve to the built-ins. */
  resolve(name: string): GeneticOperators {
    return this.entries.get(name) ?? BUILTIN_OPERATORS;
  }

  names(): string[] {
    return [...this.entries.keys()];
  }
}

/** Result of one guarded breeding step. */
export interface BreedOutcome {
  readonly genome: Genome;
  /** Failures of the pluggable operator that were recovered by the built-in. */
  readonly failures: readonly OperatorFailureError[];
}

/** Check an operator result is a genome of the expected length. */
function checkResult(
  result: unknown,
  expectedLength: number,
  role: OperatorRole,
  operator: string
): Genome {
  if (!(result instanceof Genome)) {
    throw new OperatorFailureError(role, operator, 'did not return a Genome');
  }
  if (result.length !== expectedLength) {
    throw new OperatorFailureError(
      role,
      operator,
      `returned ${result.length} bits instead of ${expectedLength}`
    );
  }
  return result;
}

/** Run `call`, turning throws and malformed results into OperatorFailureError. */
function invoke(
  call: () => unknown,
  expectedLength: number,
  role: OperatorRole,
  operator: string
): Genome {
  let result: unknown;
  try {
    result = call();
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new OperatorFailureError(role, operator, `threw: ${reason}`, err);
  }
  return checkResult(result, expectedLength, role, operator);
}

/**
 * Invoke one operator role, retrying once with the built-in on failure.
 *
 * The retry draws from `fallbackRng` so the recovered result does not depend
 * on how much of the primary stream the failed operator consumed.
 *
 * @throws {OperatorFailureError} when the built-in fallback fails as well.
 */
export function guardedCall(
  role: OperatorRole,
  operators: GeneticOperators,
  primary: (ops: GeneticOperators) => unknown,
  fallback: (ops: GeneticOperators) => unknown,
  expectedLength: number,
  failures: OperatorFailureError[]
): Genome {
  try {
    return invoke(() => primary(operators), expectedLength, role, operators.name);
  } catch (err) {
    if (!(err instanceof OperatorFailureError) || operators === BUILTIN_OPERATORS) {
      throw err;
    }
    failures.push(err);
    return invoke(
      () => fallback(BUILTIN_OPERATORS),
      expectedLength,
      role,
      BUILTIN_OPERATORS.name
    );
  }
}

/**
 * Breed one offspring: crossover of the parents, then mutation of the result,
 * each guarded by the built-in fallback.
 */
export function breed(
  operators: GeneticOperators,
  parentA: Genome,
  parentB: Genome,
  crossoverRate: number,
  flipCount: number,
  rng: Rng,
  fallbackRng: Rng
): BreedOutcome {
  const failures: OperatorFailureError[] = [];
  const length = parentA.length;
  const crossed = guardedCall(
    'crossover',
    operators,
    (ops) => ops.crossover(parentA, parentB, crossoverRate, rng),
    (ops) => ops.crossover(parentA, parentB, crossoverRate, fallbackRng),
    length,
    failures
  );
  const genome = guardedCall(
    'mutate',
    operators,
    (ops) => ops.mutate(crossed, flipCount, rng),
    (ops) => ops.mutate(crossed, flipCount, fallbackRng),
    length,
    failures
  );
  return { genome, failures };
}
