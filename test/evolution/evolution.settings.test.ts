import path from 'path';
import { ConfigurationError } from '../../src/errors';
import {
  DEFAULT_SETTINGS,
  loadSettings,
  validateSettings,
} from '../../src/evolution/evolution.settings';

/** Run `fn` and return the ConfigurationError it throws. */
function configurationError(fn: () => unknown): ConfigurationError {
  try {
    fn();
  } catch (err) {
    if (err instanceof ConfigurationError) return err;
    throw err;
  }
  throw new Error('expected a ConfigurationError');
}

describe('Evolution settings', () => {
  describe('defaults', () => {
    it('should fill every field', () => {
      // Arrange
      // Act
      const settings = validateSettings({});
      // Assert
      expect(settings).toEqual({
        populationSize: 20,
        numClones: 2,
        numRandom: 2,
        crossoverRate: 0.4,
        mutationFlipCount: 3,
        highScoreCapacity: 20,
        selection: { name: 'TOURNAMENT', size: 3, probability: 0.75 },
      });
      expect(DEFAULT_SETTINGS).toEqual(settings);
    });

    it('should treat undefined input as empty', () => {
      // Arrange
      // Act
      const settings = validateSettings(undefined);
      // Assert
      expect(settings).toEqual(DEFAULT_SETTINGS);
    });

    it('should default the power of POWER selection', () => {
      // Arrange
      // Act
      const settings = validateSettings({ selection: { name: 'POWER' } });
      // Assert
      expect(settings.selection).toEqual({ name: 'POWER', power: 4 });
    });
  });

  describe('quotas', () => {
    it('should accept clones plus randoms equal to the population', () => {
      // Arrange
      // Act
      const settings = validateSettings({ populationSize: 4, numClones: 2, numRandom: 2 });
      // Assert
      expect(settings.populationSize).toBe(4);
    });

    it('should reject clones plus randoms above the population', () => {
      // Arrange
      // Act
      const error = configurationError(() =>
        validateSettings({ populationSize: 4, numClones: 3, numRandom: 2 })
      );
      // Assert
      expect(error.issues).toEqual([
        'numClones: numClones (3) + numRandom (2) exceeds populationSize (4)',
      ]);
      expect(error.message).toBe(
        'Invalid evolution settings: numClones: numClones (3) + numRandom (2) exceeds populationSize (4)'
      );
    });

    it('should reject a tournament larger than the population', () => {
      // Arrange
      // Act
      const error = configurationError(() =>
        validateSettings({ selection: { name: 'TOURNAMENT', size: 30 } })
      );
      // Assert
      expect(error.issues).toEqual([
        'selection.size: tournament size (30) exceeds populationSize (20)',
      ]);
    });
  });

  describe('field checks', () => {
    it('should reject a crossover rate above 1', () => {
      // Arrange
      // Act
      const error = configurationError(() => validateSettings({ crossoverRate: 1.5 }));
      // Assert
      expect(error.issues).toHaveLength(1);
      expect(error.issues[0]).toMatch(/^crossoverRate: /);
    });

    it('should reject a fractional population size', () => {
      // Arrange
      // Act
      const error = configurationError(() => validateSettings({ populationSize: 2.5 }));
      // Assert
      expect(error.issues[0]).toMatch(/^populationSize: /);
    });

    it('should reject unknown keys', () => {
      // Arrange
      // Act
      const validate = () => validateSettings({ populationSize: 10, mutationRate: 0.1 });
      // Assert
      expect(validate).toThrow(ConfigurationError);
    });
  });

  describe('loadSettings', () => {
    const fixtures = path.join(__dirname, '..', 'fixtures');

    it('should read and validate a JSON file', () => {
      // Arrange
      const file = path.join(fixtures, 'settings.json');
      // Act
      const settings = loadSettings(file);
      // Assert
      expect(settings).toEqual({
        populationSize: 10,
        numClones: 1,
        numRandom: 1,
        crossoverRate: 0.5,
        mutationFlipCount: 2,
        highScoreCapacity: 20,
        selection: { name: 'RANK_PROPORTIONATE' },
      });
    });

    it('should report a missing file', () => {
      // Arrange
      const file = path.join(fixtures, 'no-such-settings.json');
      // Act
      const error = configurationError(() => loadSettings(file));
      // Assert
      expect(error.message.startsWith(`Cannot read settings file ${file}`)).toBe(true);
    });

    it('should report malformed JSON', () => {
      // Arrange
      const file = path.join(fixtures, 'invalid-settings.json');
      // Act
      const error = configurationError(() => loadSettings(file));
      // Assert
      expect(error.message.startsWith(`Settings file ${file} is not valid JSON`)).toBe(true);
    });
  });
});
