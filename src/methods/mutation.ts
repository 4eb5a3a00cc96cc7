import Genome, { Rng } from '../architecture/genome';

/**
 * Mutation methods for bit-string genomes.
 *
 * A mutation flips a fixed number of bits. Positions are drawn without
 * repetition, so no bit is ever flipped twice and a count at or above the
 * genome length flips every bit once.
 *
 * @see {@link https://en.wikipedia.org/wiki/Mutation_(genetic_algorithm)#Bit_string_mutation}
 */

/** Signature shared by built-in and externally supplied mutation operators. */
export type MutationFn = (genome: Genome, flipCount: number, rng: Rng) => Genome;

/**
 * Choose `min(count, length)` distinct positions in `[0, length)` with a
 * partial Fisher–Yates shuffle. Consumes one random value per chosen position.
 */
export function choosePositions(length: number, count: number, rng: Rng): number[] {
  const k = Math.max(0, Math.min(Math.floor(count), length));
  const pool = Array.from({ length }, (_, i) => i);
  for (let i = 0; i < k; i++) {
    const j = i + Math.floor(rng() * (length - i));
    const tmp = pool[i];
    pool[i] = pool[j];
    pool[j] = tmp;
  }
  return pool.slice(0, k);
}

/** Flip exactly `min(flipCount, genome.length)` distinct bits. */
export const flipBits: MutationFn = (genome, flipCount, rng) =>
  genome.flip(choosePositions(genome.length, flipCount, rng));

/** Named mutation descriptors; `fn` is the operator implementation. */
export const mutation = {
  /** Flip a fixed count of distinct bits. Default built-in operator. */
  FLIP_BITS: {
    name: 'FLIP_BITS',
    fn: flipBits,
  },
} as const;

export type MutationName = keyof typeof mutation;
