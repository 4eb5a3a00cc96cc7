import type Genome from './architecture/genome';
import Individual, { assignFitness } from './architecture/individual';
import { decode, GENOME_LENGTH, VehicleDefinition } from './architecture/vehicle';
import { IncompleteGenerationError, InvalidFitnessReportError } from './errors';
import {
  assembleNextGeneration,
  AssemblyContext,
  AssemblyResult,
  createInitialPopulation,
} from './evolution/evolution.evolve';
import {
  EvolutionStateJSON,
  parseState,
  serializeState,
} from './evolution/evolution.export';
import { HighScoreEntry, HighScoreLedger } from './evolution/evolution.highscores';
import { loadOperatorModule } from './evolution/evolution.loader';
import { BUILTIN_OPERATORS, GeneticOperators } from './evolution/evolution.operators';
import { describeSeed, Seed } from './evolution/evolution.rng';
import { rankIndividuals } from './evolution/evolution.selection';
import {
  EvolutionSettings,
  EvolutionSettingsInput,
  validateSettings,
} from './evolution/evolution.settings';
import {
  historyToCSV,
  historyToJSONL,
  summarizeGeneration,
} from './evolution/evolution.telemetry';
import type {
  EvolutionCallbacks,
  EvolutionOptions,
  GenerationPhase,
  GenerationSummary,
} from './evolution/evolution.types';
import { info, warn } from './utils/log';

/**
 * Owns the population of one evolutionary run and moves it from generation
 * to generation.
 *
 * Lifecycle:
 * 1. The harness reads {@link GenerationManager.phenotypes} and simulates every vehicle.
 * 2. It reports each distance through {@link GenerationManager.reportFitness}.
 * 3. Once every individual has a fitness, {@link GenerationManager.advance} ranks
 *    them, records the champion and assembles the next generation.
 *
 * The whole run is a function of the seed, the settings, the operators and
 * the reported fitness values: replaying the same reports reproduces every
 * generation bit for bit.
 *
 * @example
 * const manager = new GenerationManager({ populationSize: 20 }, { seed: 42 });
 * manager.phenotypes().forEach((def, id) => manager.reportFitness(id, simulate(def)));
 * manager.advance();
 */
export default class GenerationManager {
  /** Validated settings; fixed for the lifetime of the manager. */
  readonly settings: EvolutionSettings;
  private _seed: Seed;
  /** Bumped by `newPopulation()` so a restart under the same seed differs. */
  private _epoch = 0;
  private _generation = 1;
  private _phase: GenerationPhase = 'evaluating';
  private _population: Individual[];
  private _operators: GeneticOperators;
  private readonly _ledger: HighScoreLedger;
  private _history: GenerationSummary[] = [];
  /** Operator failures recovered while assembling the current generation. */
  private _assemblyFailures = 0;
  private readonly _callbacks: EvolutionCallbacks;

  /**
   * @param settings Raw or validated settings; validated again here.
   * @param options Seed, operators and presentation callbacks.
   * @throws {ConfigurationError} when the settings are invalid.
   */
  constructor(settings: EvolutionSettingsInput = {}, options: EvolutionOptions = {}) {
    this.settings = validateSettings(settings);
    this._seed = options.seed ?? new Date().toString();
    this._operators = options.operators ?? BUILTIN_OPERATORS;
    this._ledger = new HighScoreLedger(this.settings.highScoreCapacity);
    this._callbacks = {
      onGenerationAdvanced: options.onGenerationAdvanced,
      onChampion: options.onChampion,
      onWarning: options.onWarning,
    };
    this._population = createInitialPopulation(this.context(1));
    info(`RNG seed set to ${describeSeed(this._seed)}`);
  }

  /**
   * Validate settings and, when `settings.operatorModule` is set and no
   * operators were passed explicitly, load that module first. A module that
   * fails to load is reported through `onWarning` and the built-ins are used.
   */
  static async create(
    settings: EvolutionSettingsInput = {},
    options: EvolutionOptions = {}
  ): Promise<GenerationManager> {
    const validated = validateSettings(settings);
    let operators = options.operators;
    if (!operators && validated.operatorModule) {
      const loaded = await loadOperatorModule(validated.operatorModule);
      operators = loaded.operators;
      if (loaded.error) {
        const message = `${loaded.error.message}; using built-in operators`;
        warn(message);
        options.onWarning?.(message, loaded.error);
      } else {
        info(`Loaded operator module "${operators.name}"`);
      }
    }
    return new GenerationManager(validated, { ...options, operators });
  }

  /** Current generation number, starting at 1. */
  get generation(): number {
    return this._generation;
  }

  get phase(): GenerationPhase {
    return this._phase;
  }

  get seed(): Seed {
    return this._seed;
  }

  get epoch(): number {
    return this._epoch;
  }

  get operators(): GeneticOperators {
    return this._operators;
  }

  /** Ordered individuals of the current generation (ids 0..P-1). */
  currentPopulation(): readonly Individual[] {
    return this._population;
  }

  /** Individual with the given id in the current generation. */
  individual(id: number): Individual {
    const found = this._population[id];
    if (!Number.isInteger(id) || !found) {
      throw new RangeError(`No individual ${id} in generation ${this._generation}`);
    }
    return found;
  }

  /** Decoded vehicle definitions, index = individual id. */
  phenotypes(): VehicleDefinition[] {
    return this._population.map((ind) => decode(ind.genome));
  }

  /**
   * Attach the distance travelled by individual `id`.
   *
   * @throws {InvalidFitnessReportError} for an unknown id, a second report for
   *         the same id, or a value that is not a finite number.
   */
  reportFitness(id: number, fitness: number): void {
    const target = Number.isInteger(id) ? this._population[id] : undefined;
    if (!target) throw new InvalidFitnessReportError(id, 'no such individual');
    if (!Number.isFinite(fitness)) {
      throw new InvalidFitnessReportError(id, `fitness must be finite, got ${fitness}`);
    }
    if (target.evaluated) throw new InvalidFitnessReportError(id, 'fitness already reported');
    assignFitness(target, fitness);
  }

  /** Ids still waiting for a fitness report, ascending. */
  pendingIds(): number[] {
    return this._population.filter((ind) => !ind.evaluated).map((ind) => ind.id);
  }

  isGenerationComplete(): boolean {
    return this._population.every((ind) => ind.evaluated);
  }

  /**
   * Current generation best first (descending fitness, ties by lowest id).
   *
   * @throws {IncompleteGenerationError} while any fitness is missing.
   */
  rank(): Individual[] {
    this.assertComplete();
    return rankIndividuals(this._population);
  }

  /**
   * Rank the evaluated generation, record its champion, and replace the
   * population with the next generation.
   *
   * Nothing changes when assembly fails: the current generation stays in
   * place and the error propagates. The phase is back to `evaluating` before
   * any callback runs, so callbacks may report fitness for the new generation.
   *
   * @returns The new population.
   * @throws {IncompleteGenerationError} while any fitness is missing.
   * @throws {OperatorFailureError} when an operator and its fallback both fail.
   */
  advance(): readonly Individual[] {
    this.assertComplete();
    this._phase = 'advancing';
    const ranked = rankIndividuals(this._population);
    let result: AssemblyResult;
    try {
      result = assembleNextGeneration(ranked, this.context(this._generation + 1));
    } catch (err) {
      this._phase = 'evaluating';
      throw err;
    }
    this._phase = 'evaluating';

    const summary = summarizeGeneration(this._generation, ranked, this._assemblyFailures);
    this._history.push(summary);
    const champion = ranked[0];
    const entry = this._ledger.record(this._generation, champion.id, summary.best);
    info(
      `Generation ${summary.generation}: best ${summary.best.toFixed(2)} (id ${summary.championId}), mean ${summary.mean.toFixed(2)}`
    );

    this._population = result.population;
    this._generation++;
    this._assemblyFailures = result.failures.length;

    if (result.failures.length) {
      const first = result.failures[0];
      const message = `${result.failures.length} operator failure(s) while assembling generation ${this._generation}; built-in operators used instead. First: ${first.message}`;
      warn(message);
      this._callbacks.onWarning?.(message, first);
    }
    if (entry) this._callbacks.onChampion?.(entry);
    this._callbacks.onGenerationAdvanced?.(this._generation, this._population);
    return this._population;
  }

  /** High-score ledger entries, best first. */
  highScores(): readonly Readonly<HighScoreEntry>[] {
    return this._ledger.entries();
  }

  /** Per-generation summaries of every generation advanced past. */
  history(): readonly GenerationSummary[] {
    return this._history;
  }

  /**
   * Discard the run and start over from generation 1 with a new seed.
   * The population, ledger and history are dropped.
   */
  reseed(seed: Seed): void {
    this._seed = seed;
    this._epoch = 0;
    info(`RNG seed changed to ${describeSeed(seed)}`);
    this.restart();
  }

  /** Discard the run and start over under the same seed with a fresh population. */
  newPopulation(): void {
    this._epoch++;
    info(`New population requested (epoch ${this._epoch})`);
    this.restart();
  }

  /** Swap the operator set; used from the next `advance()` on. */
  useOperators(operators: GeneticOperators): void {
    this._operators = operators;
  }

  /** Serialize the whole run (seed, settings, population, ledger, history). */
  exportState(): EvolutionStateJSON {
    return serializeState({
      seed: this._seed,
      epoch: this._epoch,
      generation: this._generation,
      assemblyFailures: this._assemblyFailures,
      settings: this.settings,
      population: this._population,
      highScores: this._ledger.entries(),
      history: this._history,
    });
  }

  /**
   * Rebuild a manager from exported state. Callbacks and operators are not
   * part of the state and come from `options`.
   *
   * @throws {ConfigurationError} when the state is malformed.
   */
  static fromState(raw: unknown, options: EvolutionOptions = {}): GenerationManager {
    const snapshot = parseState(raw, GENOME_LENGTH);
    const manager = new GenerationManager(snapshot.settings, {
      ...options,
      seed: snapshot.seed,
    });
    manager._epoch = snapshot.epoch;
    manager._generation = snapshot.generation;
    manager._assemblyFailures = snapshot.assemblyFailures;
    manager._population = [...snapshot.population];
    manager._history = [...snapshot.history];
    for (const entry of snapshot.highScores) {
      manager._ledger.record(entry.generation, entry.individualId, entry.fitness);
    }
    return manager;
  }

  /** History as JSON Lines. */
  exportHistoryJSONL(): string {
    return historyToJSONL(this._history);
  }

  /** Most recent `maxEntries` history rows as CSV. */
  exportHistoryCSV(maxEntries?: number): string {
    return historyToCSV(this._history, maxEntries);
  }

  /** Genome of every individual, index = id. */
  genomes(): Genome[] {
    return this._population.map((ind) => ind.genome);
  }

  private context(generation: number): AssemblyContext {
    return {
      seed: this._seed,
      epoch: this._epoch,
      generation,
      settings: this.settings,
      operators: this._operators,
      genomeLength: GENOME_LENGTH,
    };
  }

  private restart(): void {
    this._ledger.reset();
    this._history = [];
    this._generation = 1;
    this._assemblyFailures = 0;
    this._phase = 'evaluating';
    this._population = createInitialPopulation(this.context(1));
  }

  private assertComplete(): void {
    const pending = this.pendingIds();
    if (pending.length) throw new IncompleteGenerationError(this._generation, pending);
  }
}
