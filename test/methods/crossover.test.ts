import Genome from '../../src/architecture/genome';
import { crossover, pointCrossover, uniformCrossover } from '../../src/methods/crossover';
import { createStream } from '../../src/evolution/evolution.rng';
import { constantRng, sequenceRng } from '../utils/test-helpers';

describe('Crossover Methods', () => {
  const a = Genome.zeros(6);
  const b = Genome.ones(6);

  describe('POINT', () => {
    it('should be the point crossover implementation', () => {
      // Arrange
      // Act
      // Assert
      expect(crossover.POINT.name).toBe('POINT');
      expect(crossover.POINT.fn).toBe(pointCrossover);
    });

    describe('when rate is 0', () => {
      it('should copy parent A', () => {
        // Arrange
        const rng = createStream('point-zero');
        // Act
        const child = pointCrossover(a, b, 0, rng);
        // Assert
        expect(child.toString()).toBe('000000');
      });
    });

    describe('when rate is 1', () => {
      it('should alternate strands starting on A', () => {
        // Arrange
        const rng = constantRng(0.5);
        // Act
        const child = pointCrossover(a, b, 1, rng);
        // Assert
        expect(child.toString()).toBe('010101');
      });
    });

    it('should switch strands only where the draw falls below the rate', () => {
      // Arrange
      const rng = sequenceRng([0.9, 0.1, 0.9, 0.1]);
      // Act
      const child = pointCrossover(Genome.zeros(5), Genome.ones(5), 0.5, rng);
      // Assert
      expect(child.toString()).toBe('00110');
    });

    it('should return the parent when crossed with itself', () => {
      // Arrange
      const parent = Genome.random(32, createStream('point-self'));
      // Act
      const child = pointCrossover(parent, parent, 0.7, createStream('point-self', 'rng'));
      // Assert
      expect(child.equals(parent)).toBe(true);
    });

    it('should reject parents of different lengths', () => {
      // Arrange
      // Act
      const cross = () => pointCrossover(Genome.zeros(3), Genome.zeros(4), 0.5, constantRng(0));
      // Assert
      expect(cross).toThrow(RangeError);
    });
  });

  describe('UNIFORM', () => {
    it('should be the uniform crossover implementation', () => {
      // Arrange
      // Act
      // Assert
      expect(crossover.UNIFORM.name).toBe('UNIFORM');
      expect(crossover.UNIFORM.fn).toBe(uniformCrossover);
    });

    it('should copy A at rate 0 and B at rate 1', () => {
      // Arrange
      const rng = createStream('uniform-bounds');
      // Act
      const atZero = uniformCrossover(a, b, 0, rng);
      const atOne = uniformCrossover(a, b, 1, rng);
      // Assert
      expect(atZero.toString()).toBe('000000');
      expect(atOne.toString()).toBe('111111');
    });

    it('should take each bit from B when its draw falls below the rate', () => {
      // Arrange
      const rng = sequenceRng([0.2, 0.8, 0.2, 0.8]);
      // Act
      const child = uniformCrossover(Genome.zeros(4), Genome.ones(4), 0.5, rng);
      // Assert
      expect(child.toString()).toBe('1010');
    });
  });

  describe('when parents agree on a position', () => {
    it('should keep that bit in the offspring for both methods', () => {
      // Arrange
      const p1 = Genome.random(64, createStream('agree', 1));
      const p2 = Genome.random(64, createStream('agree', 2));
      // Act
      const children = [
        pointCrossover(p1, p2, 0.5, createStream('agree', 'point')),
        uniformCrossover(p1, p2, 0.5, createStream('agree', 'uniform')),
      ];
      // Assert
      for (const child of children) {
        for (let i = 0; i < 64; i++) {
          if (p1.bit(i) === p2.bit(i)) expect(child.bit(i)).toBe(p1.bit(i));
        }
      }
    });
  });
});
