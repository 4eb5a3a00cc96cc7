import type Individual from '../architecture/individual';
import type { IndividualOrigin } from '../architecture/individual';
import type { GeneticOperators } from './evolution.operators';
import type { HighScoreEntry } from './evolution.highscores';
import type { Seed } from './evolution.rng';

/**
 * Shared types for the generation manager and its helper modules.
 */

/**
 * Manager phase.
 * - `evaluating`: the current population waits for fitness reports.
 * - `advancing`: the next population is being assembled. Transient: it is only
 *   held inside `advance()`, and callbacks already see `evaluating` for the
 *   new generation.
 */
export type GenerationPhase = 'evaluating' | 'advancing';

/** Hooks the presentation layer subscribes to. */
export interface EvolutionCallbacks {
  /** A new generation has been assembled and now awaits evaluation. */
  onGenerationAdvanced?: (generation: number, individuals: readonly Individual[]) => void;
  /** A new entry made it into the high-score ledger. */
  onChampion?: (entry: Readonly<HighScoreEntry>) => void;
  /** Recoverable problem: operator fallback, rejected operator module. */
  onWarning?: (message: string, error?: Error) => void;
}

/** Construction options for a `GenerationManager`. */
export interface EvolutionOptions extends EvolutionCallbacks {
  /** Run seed. Defaults to the current date/time string. */
  seed?: Seed;
  /** Operator set to breed with. Defaults to the built-ins. */
  operators?: GeneticOperators;
}

/** Per-generation summary kept for telemetry exports. */
export interface GenerationSummary {
  generation: number;
  best: number;
  mean: number;
  worst: number;
  /** Id of the top-ranked individual. */
  championId: number;
  /** Individuals per origin tag. */
  origins: Record<IndividualOrigin, number>;
  /** Operator failures recovered while assembling this generation. */
  operatorFailures: number;
}
