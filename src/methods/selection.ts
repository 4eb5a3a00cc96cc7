/**
 * Defines the parent selection methods used when breeding the `bred` share of
 * a generation.
 *
 * Every method works on the ranked pool (best first, ties broken by lowest
 * id) and draws only from the breeding individual's own random stream, so a
 * given seed always picks the same parents. Higher-ranked individuals are
 * always at least as likely to be picked as lower-ranked ones; the methods
 * differ in how steeply that preference falls off.
 *
 * @see {@link https://en.wikipedia.org/wiki/Selection_(genetic_algorithm)|Selection (genetic algorithm) - Wikipedia}
 */

/** Roulette wheel over fitness; negative scores are shifted to zero. */
export interface FitnessProportionateSelection {
  readonly name: 'FITNESS_PROPORTIONATE';
}

/** Index `floor(u^power * n)` into the ranked pool. */
export interface PowerSelection {
  readonly name: 'POWER';
  readonly power: number;
}

/** Linear ranking: rank `r` (0-based) has weight `n - r`. */
export interface RankProportionateSelection {
  readonly name: 'RANK_PROPORTIONATE';
}

/**
 * Sample `size` competitors with replacement, then walk them best-first,
 * taking each with `probability` (the last one unconditionally).
 */
export interface TournamentSelection {
  readonly name: 'TOURNAMENT';
  readonly size: number;
  readonly probability: number;
}

export type SelectionMethod =
  | FitnessProportionateSelection
  | PowerSelection
  | RankProportionateSelection
  | TournamentSelection;

export const selection = {
  /**
   * Fitness Proportionate Selection (also known as Roulette Wheel Selection).
   *
   * An individual's chance is proportional to its distance travelled. Works
   * poorly when every vehicle stalls at nearly the same spot.
   */
  FITNESS_PROPORTIONATE: {
    name: 'FITNESS_PROPORTIONATE',
  },

  /**
   * Power Selection.
   *
   * @property power - Exponent applied to the uniform draw. Higher values push harder towards the top ranks. Defaults to 4.
   */
  POWER: {
    name: 'POWER',
    power: 4,
  },

  /**
   * Linear rank selection. Insensitive to the scale of the distances, only
   * their order matters.
   */
  RANK_PROPORTIONATE: {
    name: 'RANK_PROPORTIONATE',
  },

  /**
   * Tournament Selection. Default parent selection policy.
   *
   * @property size - Competitors per tournament. Must not exceed the population size. Defaults to 3.
   * @property probability - Chance of taking the best remaining competitor. Defaults to 0.75.
   */
  TOURNAMENT: {
    name: 'TOURNAMENT',
    size: 3,
    probability: 0.75,
  },
} as const satisfies Record<string, SelectionMethod>;
