import Genome, { Rng } from '../architecture/genome';

/**
 * Crossover methods for bit-string genomes.
 *
 * Both built-ins share one contract: every offspring bit is copied from the
 * same position of parent A or parent B, `rate = 0` yields an exact copy of
 * A, and crossing a genome with itself returns that genome for any rate.
 *
 * @see {@link https://en.wikipedia.org/wiki/Crossover_(genetic_algorithm)}
 */

/** Signature shared by built-in and externally supplied crossover operators. */
export type CrossoverFn = (a: Genome, b: Genome, rate: number, rng: Rng) => Genome;

/**
 * Point crossover with a switching probability.
 *
 * Copying starts on strand A. Between each pair of consecutive positions the
 * source strand switches with probability `rate`, so the expected number of
 * crossover points is `rate * (length - 1)`. With `rate = 1` the strands
 * alternate A, B, A, B… which is the mirror image of starting on B.
 */
export const pointCrossover: CrossoverFn = (a, b, rate, rng) => {
  assertSameLength(a, b);
  const bits = new Uint8Array(a.length);
  let fromB = false;
  for (let i = 0; i < a.length; i++) {
    if (i > 0 && rng() < rate) fromB = !fromB;
    bits[i] = (fromB ? b : a).bit(i);
  }
  return Genome.fromBits(bits);
};

/**
 * Biased-coin uniform crossover: each bit comes from B with probability
 * `rate`, otherwise from A. `rate = 1` copies B.
 */
export const uniformCrossover: CrossoverFn = (a, b, rate, rng) => {
  assertSameLength(a, b);
  const bits = new Uint8Array(a.length);
  for (let i = 0; i < a.length; i++) {
    bits[i] = rng() < rate ? b.bit(i) : a.bit(i);
  }
  return Genome.fromBits(bits);
};

function assertSameLength(a: Genome, b: Genome): void {
  if (a.length !== b.length) {
    throw new RangeError(
      `Cannot cross genomes of different lengths (${a.length} and ${b.length})`
    );
  }
}

/** Named crossover descriptors; `fn` is the operator implementation. */
export const crossover = {
  /**
   * Point crossover; strands switch between positions with probability `rate`.
   * Default built-in operator.
   */
  POINT: {
    name: 'POINT',
    fn: pointCrossover,
  },

  /**
   * Uniform crossover; each bit independently taken from parent B with
   * probability `rate`.
   */
  UNIFORM: {
    name: 'UNIFORM',
    fn: uniformCrossover,
  },
} as const;

export type CrossoverName = keyof typeof crossover;
