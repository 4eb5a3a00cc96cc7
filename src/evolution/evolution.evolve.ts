import Genome from '../architecture/genome';
import Individual from '../architecture/individual';
import type { OperatorFailureError } from '../errors';
import { breed, GeneticOperators } from './evolution.operators';
import { createStream, Seed } from './evolution.rng';
import { selectParent } from './evolution.selection';
import type { EvolutionSettings } from './evolution.settings';

/**
 * Generation assembly.
 *
 * Given the ranked previous generation, build the next one in three blocks:
 *
 *   ids 0 .. C-1       cloned   top C ranked genomes, copied verbatim
 *   ids C .. C+R-1     random   fresh random genomes
 *   ids C+R .. P-1     bred     crossover of two selected parents, then mutation
 *
 * Each random or bred individual draws from its own stream keyed by
 * `(seed, epoch, generation, id)`, so the result does not depend on the
 * order individuals are built in.
 */

/** Everything assembly reads besides the ranked pool. */
export interface AssemblyContext {
  readonly seed: Seed;
  /** Bumped whenever the population is discarded under the same seed. */
  readonly epoch: number;
  /** Number of the generation being built. */
  readonly generation: number;
  readonly settings: EvolutionSettings;
  readonly operators: GeneticOperators;
  readonly genomeLength: number;
}

/** One built individual plus the operator failures recovered on the way. */
export interface BuildResult {
  readonly individual: Individual;
  readonly failures: readonly OperatorFailureError[];
}

/** Assembled generation. */
export interface AssemblyResult {
  readonly population: Individual[];
  readonly failures: readonly OperatorFailureError[];
}

/** Stream for the random genome of individual `id`. */
export function randomStream(ctx: AssemblyContext, id: number) {
  return createStream(ctx.seed, ctx.epoch, ctx.generation, id, 'random');
}

/** Build a `random` individual with id `id`. */
export function randomIndividual(ctx: AssemblyContext, id: number): Individual {
  return new Individual(id, Genome.random(ctx.genomeLength, randomStream(ctx, id)), {
    origin: 'random',
  });
}

/** First generation: every individual random. */
export function createInitialPopulation(ctx: AssemblyContext): Individual[] {
  return Array.from({ length: ctx.settings.populationSize }, (_, id) =>
    randomIndividual(ctx, id)
  );
}

/**
 * Build the individual that gets id `id` in the next generation.
 *
 * @param ranked Previous generation, best first; must not be empty.
 */
export function buildIndividual(
  ranked: readonly Individual[],
  id: number,
  ctx: AssemblyContext
): BuildResult {
  const { numClones, numRandom, populationSize } = ctx.settings;
  if (!Number.isInteger(id) || id < 0 || id >= populationSize) {
    throw new RangeError(`Individual id ${id} outside population of ${populationSize}`);
  }

  if (id < numClones) {
    // More clones than individuals wraps around and duplicates.
    const source = ranked[id % ranked.length];
    return {
      individual: new Individual(id, source.genome, { origin: 'cloned', source: source.id }),
      failures: [],
    };
  }

  if (id < numClones + numRandom) {
    return { individual: randomIndividual(ctx, id), failures: [] };
  }

  const rng = createStream(ctx.seed, ctx.epoch, ctx.generation, id, 'breed');
  const fallbackRng = createStream(ctx.seed, ctx.epoch, ctx.generation, id, 'fallback');
  const parentA = selectParent(ranked, ctx.settings.selection, rng);
  const parentB = selectParent(ranked, ctx.settings.selection, rng);
  const { genome, failures } = breed(
    ctx.operators,
    parentA.genome,
    parentB.genome,
    ctx.settings.crossoverRate,
    ctx.settings.mutationFlipCount,
    rng,
    fallbackRng
  );
  return {
    individual: new Individual(id, genome, {
      origin: 'bred',
      parents: [parentA.id, parentB.id],
    }),
    failures,
  };
}

/**
 * Assemble the full next generation.
 *
 * @param ranked Previous generation, best first.
 * @param order Order to build ids in; defaults to 0..P-1. The result is the
 *        same for any permutation.
 * @throws {OperatorFailureError} when an operator and its built-in fallback both fail.
 */
export function assembleNextGeneration(
  ranked: readonly Individual[],
  ctx: AssemblyContext,
  order?: readonly number[]
): AssemblyResult {
  const size = ctx.settings.populationSize;
  const ids = order ?? Array.from({ length: size }, (_, i) => i);
  const slots: Array<Individual | undefined> = new Array(size);
  const failures: OperatorFailureError[] = [];
  for (const id of ids) {
    const built = buildIndividual(ranked, id, ctx);
    slots[id] = built.individual;
    failures.push(...built.failures);
  }
  const population: Individual[] = [];
  for (let id = 0; id < size; id++) {
    const individual = slots[id];
    if (!individual) throw new RangeError(`Assembly order never built individual ${id}`);
    population.push(individual);
  }
  return { population, failures };
}
