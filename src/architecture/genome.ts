/** Uniform random source in [0, 1). Seeded streams from `createStream` satisfy it. */
export type Rng = () => number;

/**
 * Fixed-length, immutable bit vector holding one individual's heritable traits.
 *
 * Every transform (`setBit`, `flip`) returns a fresh genome; the backing
 * buffer is never exposed, so genomes can be shared freely between
 * generations and breeding steps without copying.
 *
 * @example
 * const g = Genome.fromString('1010');
 * g.bit(0); // 1
 * g.flip([0, 3]).toString(); // '0011'
 */
export default class Genome {
  /** One byte per bit, each 0 or 1. */
  private readonly bits: Uint8Array;

  private constructor(bits: Uint8Array) {
    this.bits = bits;
  }

  /**
   * Build a genome of `length` bits, each drawn independently from `rng`.
   * Consumes exactly `length` values from the stream.
   */
  static random(length: number, rng: Rng): Genome {
    assertLength(length);
    const bits = new Uint8Array(length);
    for (let i = 0; i < length; i++) bits[i] = rng() < 0.5 ? 1 : 0;
    return new Genome(bits);
  }

  /** All-zero genome, mostly useful for tests and fixtures. */
  static zeros(length: number): Genome {
    assertLength(length);
    return new Genome(new Uint8Array(length));
  }

  /** All-one genome. */
  static ones(length: number): Genome {
    assertLength(length);
    return new Genome(new Uint8Array(length).fill(1));
  }

  /** Copy the given bits; any truthy entry becomes 1. */
  static fromBits(values: ArrayLike<number | boolean>): Genome {
    const bits = new Uint8Array(values.length);
    for (let i = 0; i < values.length; i++) bits[i] = values[i] ? 1 : 0;
    return new Genome(bits);
  }

  /**
   * Parse the textual form produced by {@link Genome.toString}.
   * @throws {SyntaxError} when the text holds anything besides `0` and `1`.
   */
  static fromString(text: string): Genome {
    if (!/^[01]*$/.test(text)) {
      throw new SyntaxError(`Genome text may only contain 0 and 1, got "${text}"`);
    }
    const bits = new Uint8Array(text.length);
    for (let i = 0; i < text.length; i++) bits[i] = text.charCodeAt(i) === 49 ? 1 : 0;
    return new Genome(bits);
  }

  /** Number of bits. */
  get length(): number {
    return this.bits.length;
  }

  /** Value of bit `index`. Out-of-range indexes throw. */
  bit(index: number): 0 | 1 {
    this.assertIndex(index);
    return this.bits[index] === 1 ? 1 : 0;
  }

  /** Copy with bit `index` set to `value`. */
  setBit(index: number, value: 0 | 1 | boolean): Genome {
    this.assertIndex(index);
    const next = this.bits.slice();
    next[index] = value ? 1 : 0;
    return new Genome(next);
  }

  /**
   * Copy with every listed position flipped exactly once. Repeated positions
   * are flipped once all the same.
   */
  flip(positions: Iterable<number>): Genome {
    const next = this.bits.slice();
    const done = new Set<number>();
    for (const index of positions) {
      this.assertIndex(index);
      if (done.has(index)) continue;
      done.add(index);
      next[index] ^= 1;
    }
    return new Genome(next);
  }

  /**
   * Read `width` bits starting at `offset` as an unsigned big-endian integer
   * (the bit at `offset` is the most significant).
   */
  readUint(offset: number, width: number): number {
    if (!Number.isInteger(width) || width < 0 || width > 31) {
      throw new RangeError(`Field width must be an integer in [0, 31], got ${width}`);
    }
    if (width === 0) return 0;
    this.assertIndex(offset);
    this.assertIndex(offset + width - 1);
    let value = 0;
    for (let i = offset; i < offset + width; i++) value = value * 2 + this.bits[i];
    return value;
  }

  /** Number of positions where the two genomes differ. Lengths must match. */
  distance(other: Genome): number {
    if (other.length !== this.length) {
      throw new RangeError(
        `Cannot compare genomes of length ${this.length} and ${other.length}`
      );
    }
    let diff = 0;
    for (let i = 0; i < this.bits.length; i++) {
      if (this.bits[i] !== other.bits[i]) diff++;
    }
    return diff;
  }

  /** Bit-for-bit equality. */
  equals(other: Genome): boolean {
    return other.length === this.length && this.distance(other) === 0;
  }

  /** Number of set bits. */
  popcount(): number {
    let count = 0;
    for (const b of this.bits) count += b;
    return count;
  }

  /** Bits as an array of 0/1 numbers. */
  toArray(): Array<0 | 1> {
    return Array.from(this.bits, (b) => (b === 1 ? 1 : 0));
  }

  /** `'0'`/`'1'` text, position 0 first. */
  toString(): string {
    let text = '';
    for (const b of this.bits) text += b === 1 ? '1' : '0';
    return text;
  }

  toJSON(): string {
    return this.toString();
  }

  private assertIndex(index: number): void {
    if (!Number.isInteger(index) || index < 0 || index >= this.bits.length) {
      throw new RangeError(
        `Bit index ${index} outside genome of length ${this.bits.length}`
      );
    }
  }
}

function assertLength(length: number): void {
  if (!Number.isInteger(length) || length < 0) {
    throw new RangeError(`Genome length must be a non-negative integer, got ${length}`);
  }
}
