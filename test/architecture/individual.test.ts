import Genome from '../../src/architecture/genome';
import Individual, { assignFitness, ORIGINS } from '../../src/architecture/individual';

describe('Individual', () => {
  it('should expose the origin of its lineage', () => {
    // Arrange
    const genome = Genome.zeros(4);
    // Act
    const cloned = new Individual(0, genome, { origin: 'cloned', source: 7 });
    const bred = new Individual(1, genome, { origin: 'bred', parents: [2, 5] });
    const random = new Individual(2, genome, { origin: 'random' });
    // Assert
    expect([cloned.origin, bred.origin, random.origin]).toEqual(['cloned', 'bred', 'random']);
  });

  describe('evaluated', () => {
    it('should be false until a fitness is assigned', () => {
      // Arrange
      const individual = new Individual(0, Genome.zeros(4), { origin: 'random' });
      // Act
      const before = individual.evaluated;
      assignFitness(individual, 0);
      // Assert
      expect(before).toBe(false);
      expect(individual.evaluated).toBe(true);
      expect(individual.fitness).toBe(0);
    });
  });

  describe('fitness', () => {
    it('should not be writable through the instance', () => {
      // Arrange
      const individual = new Individual(0, Genome.zeros(4), { origin: 'random' });
      // Act
      const written = Reflect.set(individual, 'fitness', Number.NaN);
      // Assert
      expect(written).toBe(false);
      expect(individual.fitness).toBeUndefined();
      expect(individual.evaluated).toBe(false);
    });
  });

  it('should list origins in assembly order', () => {
    // Arrange
    // Act
    // Assert
    expect(ORIGINS).toEqual(['cloned', 'random', 'bred']);
  });
});
