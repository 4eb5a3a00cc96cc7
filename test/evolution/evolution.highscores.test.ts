import { HighScoreLedger } from '../../src/evolution/evolution.highscores';

describe('HighScoreLedger', () => {
  it('should reject a capacity below 1', () => {
    // Arrange
    // Act
    const build = () => new HighScoreLedger(0);
    // Assert
    expect(build).toThrow(RangeError);
  });

  it('should keep entries sorted by descending fitness with ranks from 1', () => {
    // Arrange
    const ledger = new HighScoreLedger(3);
    // Act
    ledger.record(1, 0, 10);
    ledger.record(1, 1, 30);
    ledger.record(2, 0, 20);
    // Assert
    expect(ledger.entries()).toEqual([
      { rank: 1, generation: 1, individualId: 1, fitness: 30 },
      { rank: 2, generation: 2, individualId: 0, fitness: 20 },
      { rank: 3, generation: 1, individualId: 0, fitness: 10 },
    ]);
  });

  describe('when the ledger is full', () => {
    it('should not admit a score below every entry', () => {
      // Arrange
      const ledger = new HighScoreLedger(3);
      [10, 30, 20].forEach((fitness, gen) => ledger.record(gen + 1, 0, fitness));
      // Act
      const entry = ledger.record(4, 0, 5);
      // Assert
      expect(entry).toBeUndefined();
      expect(ledger.size).toBe(3);
    });

    it('should evict the lowest entry for a better score', () => {
      // Arrange
      const ledger = new HighScoreLedger(3);
      [10, 30, 20].forEach((fitness, gen) => ledger.record(gen + 1, 0, fitness));
      // Act
      const entry = ledger.record(4, 1, 25);
      // Assert
      expect(entry).toEqual({ rank: 2, generation: 4, individualId: 1, fitness: 25 });
      expect(ledger.entries().map((e) => e.fitness)).toEqual([30, 25, 20]);
    });

    it('should never grow past capacity', () => {
      // Arrange
      const ledger = new HighScoreLedger(5);
      // Act
      for (let gen = 1; gen <= 10; gen++) ledger.record(gen, 0, gen);
      // Assert
      expect(ledger.size).toBe(5);
      expect(ledger.entries().map((e) => e.fitness)).toEqual([10, 9, 8, 7, 6]);
      expect(ledger.entries().map((e) => e.rank)).toEqual([1, 2, 3, 4, 5]);
    });
  });

  describe('ties', () => {
    it('should rank the earlier generation first', () => {
      // Arrange
      const ledger = new HighScoreLedger();
      // Act
      ledger.record(2, 5, 10);
      ledger.record(1, 7, 10);
      // Assert
      expect(ledger.best()).toEqual({ rank: 1, generation: 1, individualId: 7, fitness: 10 });
    });

    it('should rank the lower id first within a generation', () => {
      // Arrange
      const ledger = new HighScoreLedger();
      // Act
      ledger.record(3, 9, 10);
      ledger.record(3, 4, 10);
      // Assert
      expect(ledger.entries().map((e) => e.individualId)).toEqual([4, 9]);
    });

    it('should not let a later tie displace an earlier entry at capacity', () => {
      // Arrange
      const ledger = new HighScoreLedger(1);
      ledger.record(1, 0, 50);
      // Act
      const entry = ledger.record(2, 0, 50);
      // Assert
      expect(entry).toBeUndefined();
      expect(ledger.best()?.generation).toBe(1);
    });
  });

  it('should describe entries as ranked lines', () => {
    // Arrange
    const ledger = new HighScoreLedger();
    ledger.record(4, 2, 123.456);
    ledger.record(1, 0, 7);
    // Act
    const lines = ledger.describe();
    // Assert
    expect(lines).toEqual(['1. Generation 4, 123.46 m', '2. Generation 1, 7.00 m']);
  });

  it('should empty on reset', () => {
    // Arrange
    const ledger = new HighScoreLedger();
    ledger.record(1, 0, 1);
    // Act
    ledger.reset();
    // Assert
    expect(ledger.size).toBe(0);
    expect(ledger.best()).toBeUndefined();
  });
});
