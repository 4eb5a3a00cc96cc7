import { z } from 'zod';
import Genome from '../architecture/genome';
import Individual, { assignFitness, Lineage } from '../architecture/individual';
import { ConfigurationError } from '../errors';
import type { HighScoreEntry } from './evolution.highscores';
import type { Seed } from './evolution.rng';
import { formatIssues, settingsSchema, EvolutionSettings } from './evolution.settings';
import type { GenerationSummary } from './evolution.types';

// ----------------------------------------------------------------------------------
// Export / import of a whole run: seed, settings, current population, ledger and
// history. The JSON form is what you persist to pause a run and resume it later.
// ----------------------------------------------------------------------------------

/** Current version of the persisted state layout. */
export const STATE_VERSION = 1;

const lineageSchema = z.discriminatedUnion('origin', [
  z.object({ origin: z.literal('random') }),
  z.object({ origin: z.literal('cloned'), source: z.number().int().min(0) }),
  z.object({
    origin: z.literal('bred'),
    parents: z.tuple([z.number().int().min(0), z.number().int().min(0)]),
  }),
]);

const individualSchema = z.object({
  id: z.number().int().min(0),
  genome: z.string().regex(/^[01]*$/),
  lineage: lineageSchema,
  fitness: z.number().finite().optional(),
});

const highScoreSchema = z.object({
  rank: z.number().int().min(1),
  generation: z.number().int().min(1),
  individualId: z.number().int().min(0),
  fitness: z.number().finite(),
});

const summarySchema = z.object({
  generation: z.number().int().min(1),
  best: z.number(),
  mean: z.number(),
  worst: z.number(),
  championId: z.number().int().min(0),
  origins: z.object({
    bred: z.number().int().min(0),
    cloned: z.number().int().min(0),
    random: z.number().int().min(0),
  }),
  operatorFailures: z.number().int().min(0),
});

/** Zod schema of the persisted run state. */
export const stateSchema = z.object({
  version: z.literal(STATE_VERSION),
  seed: z.union([z.string(), z.number().finite()]),
  epoch: z.number().int().min(0),
  generation: z.number().int().min(1),
  /** Operator failures recovered while assembling the current generation. */
  assemblyFailures: z.number().int().min(0).default(0),
  settings: settingsSchema,
  population: z.array(individualSchema),
  highScores: z.array(highScoreSchema),
  history: z.array(summarySchema),
});

/** JSON form of a run (what `exportState()` returns). */
export type EvolutionStateJSON = z.input<typeof stateSchema>;

/** In-memory snapshot exchanged with the manager. */
export interface EvolutionSnapshot {
  readonly seed: Seed;
  readonly epoch: number;
  readonly generation: number;
  readonly assemblyFailures: number;
  readonly settings: EvolutionSettings;
  readonly population: readonly Individual[];
  readonly highScores: readonly Readonly<HighScoreEntry>[];
  readonly history: readonly GenerationSummary[];
}

function lineageJSON(lineage: Lineage): z.input<typeof lineageSchema> {
  switch (lineage.origin) {
    case 'random':
      return { origin: 'random' };
    case 'cloned':
      return { origin: 'cloned', source: lineage.source };
    case 'bred':
      return { origin: 'bred', parents: [lineage.parents[0], lineage.parents[1]] };
  }
}

/** Serialize a snapshot into plain JSON-safe data. */
export function serializeState(snapshot: EvolutionSnapshot): EvolutionStateJSON {
  return {
    version: STATE_VERSION,
    seed: snapshot.seed,
    epoch: snapshot.epoch,
    generation: snapshot.generation,
    assemblyFailures: snapshot.assemblyFailures,
    settings: { ...snapshot.settings },
    population: snapshot.population.map((ind) => ({
      id: ind.id,
      genome: ind.genome.toString(),
      lineage: lineageJSON(ind.lineage),
      ...(ind.fitness !== undefined ? { fitness: ind.fitness } : {}),
    })),
    highScores: snapshot.highScores.map((entry) => ({ ...entry })),
    history: snapshot.history.map((summary) => ({
      ...summary,
      origins: { ...summary.origins },
    })),
  };
}

/**
 * Validate and rehydrate persisted state.
 *
 * Edge cases rejected:
 * - population size differs from `settings.populationSize`
 * - ids not exactly 0..P-1 in order
 * - genomes of a length other than `genomeLength`
 *
 * @throws {ConfigurationError} listing every problem found.
 */
export function parseState(raw: unknown, genomeLength: number): EvolutionSnapshot {
  const result = stateSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigurationError('Invalid evolution state', formatIssues(result.error));
  }
  const state = result.data;
  const issues: string[] = [];
  if (state.population.length !== state.settings.populationSize) {
    issues.push(
      `population has ${state.population.length} individuals, settings.populationSize is ${state.settings.populationSize}`
    );
  }
  state.population.forEach((ind, i) => {
    if (ind.id !== i) issues.push(`population.${i}.id: expected ${i}, got ${ind.id}`);
    if (ind.genome.length !== genomeLength) {
      issues.push(
        `population.${i}.genome: expected ${genomeLength} bits, got ${ind.genome.length}`
      );
    }
  });
  if (state.highScores.length > state.settings.highScoreCapacity) {
    issues.push(
      `highScores holds ${state.highScores.length} entries, capacity is ${state.settings.highScoreCapacity}`
    );
  }
  if (issues.length) throw new ConfigurationError('Invalid evolution state', issues);

  return {
    seed: state.seed,
    epoch: state.epoch,
    generation: state.generation,
    assemblyFailures: state.assemblyFailures,
    settings: state.settings,
    population: state.population.map((ind) => {
      const individual = new Individual(ind.id, Genome.fromString(ind.genome), ind.lineage);
      if (ind.fitness !== undefined) assignFitness(individual, ind.fitness);
      return individual;
    }),
    highScores: state.highScores,
    history: state.history,
  };
}
