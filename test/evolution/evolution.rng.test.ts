import {
  createStream,
  describeSeed,
  parseSeed,
  seedKey,
} from '../../src/evolution/evolution.rng';
import { SeedParseError } from '../../src/errors';

/** First `n` values of a stream. */
function take(rng: () => number, n: number): number[] {
  return Array.from({ length: n }, () => rng());
}

describe('Random streams', () => {
  it('should replay the same sequence for the same seed and path', () => {
    // Arrange
    // Act
    const first = take(createStream(42, 0, 3, 17), 5);
    const second = take(createStream(42, 0, 3, 17), 5);
    // Assert
    expect(second).toEqual(first);
  });

  it('should give different paths different sequences', () => {
    // Arrange
    // Act
    const a = take(createStream(42, 0, 3, 17), 5);
    const b = take(createStream(42, 0, 3, 18), 5);
    // Assert
    expect(b).not.toEqual(a);
  });

  it('should keep numeric and string seeds apart', () => {
    // Arrange
    // Act
    const numeric = take(createStream(42), 3);
    const text = take(createStream('42'), 3);
    // Assert
    expect(seedKey(42)).toBe('#42');
    expect(seedKey('42')).toBe('42');
    expect(text).not.toEqual(numeric);
  });

  it('should stay within [0, 1)', () => {
    // Arrange
    const values = take(createStream('bounds'), 200);
    // Act
    const outside = values.filter((v) => v < 0 || v >= 1);
    // Assert
    expect(outside).toEqual([]);
  });
});

describe('parseSeed', () => {
  describe('when the text has a \\x prefix', () => {
    it('should read a hexadecimal 32-bit integer', () => {
      // Arrange
      // Act
      // Assert
      expect(parseSeed('\\x1F')).toBe(31);
      expect(parseSeed('\\xFFFFFFFF')).toBe(-1);
    });

    it('should reject anything but 1 to 8 hex digits', () => {
      // Arrange
      // Act
      // Assert
      expect(() => parseSeed('\\xZZ')).toThrow(SeedParseError);
      expect(() => parseSeed('\\x123456789')).toThrow(SeedParseError);
    });
  });

  describe('when the text has a \\d prefix', () => {
    it('should read a signed decimal integer', () => {
      // Arrange
      // Act
      // Assert
      expect(parseSeed('\\d1234')).toBe(1234);
      expect(parseSeed('\\d-5')).toBe(-5);
    });

    it('should reject values outside the 32-bit range', () => {
      // Arrange
      // Act
      const parse = () => parseSeed('\\d99999999999');
      // Assert
      expect(parse).toThrow('Cannot parse seed "\\d99999999999": value does not fit in a 32-bit signed integer');
    });
  });

  it('should use other text as a string seed', () => {
    // Arrange
    // Act
    const seed = parseSeed('  hello world ');
    // Assert
    expect(seed).toBe('hello world');
  });

  it('should fall back to the current date for blank text', () => {
    // Arrange
    const fixed = new Date(2020, 0, 2, 3, 4, 5);
    // Act
    const seed = parseSeed('   ', () => fixed);
    // Assert
    expect(seed).toBe(fixed.toString());
  });
});

describe('describeSeed', () => {
  it('should show integers in decimal and hex', () => {
    // Arrange
    // Act
    // Assert
    expect(describeSeed(42)).toBe('42 (0x0000002A)');
    expect(describeSeed(-1)).toBe('-1 (0xFFFFFFFF)');
  });

  it('should quote string seeds', () => {
    // Arrange
    // Act
    // Assert
    expect(describeSeed('abc')).toBe('"abc"');
  });
});
