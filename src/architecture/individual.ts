import Genome from './genome';

/**
 * How an individual entered its generation.
 * - `cloned`: genome copied verbatim from a top performer of the previous generation.
 * - `random`: freshly randomized genome (random injection, and the whole first generation).
 * - `bred`: crossover of two selected parents followed by mutation.
 */
export type IndividualOrigin = 'bred' | 'cloned' | 'random';

/** Every origin tag, in the order a generation is assembled. */
export const ORIGINS: readonly IndividualOrigin[] = ['cloned', 'random', 'bred'];

/**
 * Where an individual's genome came from, in ids of the previous generation.
 * Random individuals have no lineage.
 */
export type Lineage =
  | { readonly origin: 'random' }
  | { readonly origin: 'cloned'; readonly source: number }
  | { readonly origin: 'bred'; readonly parents: readonly [number, number] };

// Fitness lives outside the instance so that holders of an Individual can
// read it but only `assignFitness` can write it.
const fitnessOf = new WeakMap<Individual, number>();

/**
 * One member of a generation: a genome plus its generation-scoped metadata.
 *
 * Nothing changes after construction except the fitness, which the owning
 * `GenerationManager` assigns through {@link assignFitness} once the value
 * has passed its checks.
 */
export default class Individual {
  readonly id: number;
  readonly genome: Genome;
  readonly lineage: Lineage;

  constructor(id: number, genome: Genome, lineage: Lineage) {
    this.id = id;
    this.genome = genome;
    this.lineage = lineage;
  }

  /** Distance reported by the simulation harness; unset until evaluated. */
  get fitness(): number | undefined {
    return fitnessOf.get(this);
  }

  get origin(): IndividualOrigin {
    return this.lineage.origin;
  }

  /** Whether the harness has reported a fitness for this individual. */
  get evaluated(): boolean {
    return fitnessOf.has(this);
  }
}

/**
 * Attach a fitness to `individual`. Engine-internal: callers validate the
 * value first, and the public barrel does not re-export this function.
 */
export function assignFitness(individual: Individual, fitness: number): void {
  fitnessOf.set(individual, fitness);
}
