import seedrandom from 'seedrandom';
import type { Rng } from '../architecture/genome';
import { SeedParseError } from '../errors';

/**
 * Seed handling and deterministic random streams.
 *
 * A run is identified by its seed. Every consumer of randomness (the initial
 * population, each random injection, each breeding step) gets its own stream
 * keyed by the seed plus a path such as `[epoch, generation, index]`. Streams
 * never share state, so building individuals in any order, or interleaved,
 * produces the same genomes.
 */

/** A run seed as supplied by the harness or the user. */
export type Seed = string | number;

/** Separator between seed and path segments in a stream key. */
const KEY_SEPARATOR = '|';

/** Normalize a seed to the string fed to seedrandom. */
export function seedKey(seed: Seed): string {
  return typeof seed === 'number' ? `#${seed}` : seed;
}

/**
 * Independent random stream for `seed` and `path`. Equal inputs always yield
 * equal sequences.
 *
 * @example
 * const rng = createStream(42, 0, 3, 17); // epoch 0, generation 3, individual 17
 * rng(); // same value on every run
 */
export function createStream(seed: Seed, ...path: Array<string | number>): Rng {
  const prng = seedrandom([seedKey(seed), ...path].join(KEY_SEPARATOR));
  return () => prng();
}

/**
 * Interpret seed text the way the seed entry box does.
 *
 * - `\x1F2A` → the hexadecimal integer `0x1F2A`
 * - `\d1234` → the decimal integer `1234`
 * - empty or blank text → the current date/time string
 * - anything else → the text itself, used as a string seed
 *
 * @throws {SeedParseError} when a `\x` or `\d` payload is not a valid 32-bit integer.
 */
export function parseSeed(text: string, now: () => Date = () => new Date()): Seed {
  const trimmed = text.trim();
  if (!trimmed) return now().toString();
  if (trimmed.startsWith('\\x')) {
    const payload = trimmed.slice(2);
    if (!/^[0-9a-fA-F]{1,8}$/.test(payload)) {
      throw new SeedParseError(text, 'expected 1 to 8 hexadecimal digits after \\x');
    }
    return parseInt(payload, 16) | 0;
  }
  if (trimmed.startsWith('\\d')) {
    const payload = trimmed.slice(2);
    if (!/^[+-]?\d+$/.test(payload)) {
      throw new SeedParseError(text, 'expected a decimal integer after \\d');
    }
    const value = Number(payload);
    if (value < -0x80000000 || value > 0x7fffffff) {
      throw new SeedParseError(text, 'value does not fit in a 32-bit signed integer');
    }
    return value;
  }
  return trimmed;
}

/** Render a seed for logs: integers in both decimal and hex. */
export function describeSeed(seed: Seed): string {
  if (typeof seed === 'string') return `"${seed}"`;
  const hex = (seed >>> 0).toString(16).toUpperCase().padStart(8, '0');
  return `${seed} (0x${hex})`;
}
