import GenerationManager from './evolution';
import Genome from './architecture/genome';
import Individual from './architecture/individual';

export { GenerationManager, Genome, Individual };
export type { Rng } from './architecture/genome';
export type { IndividualOrigin, Lineage } from './architecture/individual';
export { ORIGINS } from './architecture/individual';
export * from './architecture/vehicle';
export * from './methods/methods';
export * from './errors';
export { config } from './config';
export type { EvolutionConfig } from './config';
export {
  BUILTIN_OPERATORS,
  OperatorRegistry,
  breed,
} from './evolution/evolution.operators';
export type { GeneticOperators, BreedOutcome } from './evolution/evolution.operators';
export {
  loadOperatorModule,
  operatorsFromModule,
} from './evolution/evolution.loader';
export type { OperatorLoadResult } from './evolution/evolution.loader';
export { HighScoreLedger } from './evolution/evolution.highscores';
export type { HighScoreEntry } from './evolution/evolution.highscores';
export {
  DEFAULT_SETTINGS,
  loadSettings,
  settingsSchema,
  validateSettings,
} from './evolution/evolution.settings';
export type {
  EvolutionSettings,
  EvolutionSettingsInput,
} from './evolution/evolution.settings';
export { createStream, parseSeed, describeSeed } from './evolution/evolution.rng';
export type { Seed } from './evolution/evolution.rng';
export { rankIndividuals, selectParent } from './evolution/evolution.selection';
export { assembleNextGeneration, buildIndividual } from './evolution/evolution.evolve';
export type { AssemblyContext } from './evolution/evolution.evolve';
export { historyToCSV, historyToJSONL } from './evolution/evolution.telemetry';
export type { EvolutionStateJSON } from './evolution/evolution.export';
export type {
  EvolutionCallbacks,
  EvolutionOptions,
  GenerationPhase,
  GenerationSummary,
} from './evolution/evolution.types';

export default GenerationManager;
