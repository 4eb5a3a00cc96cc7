import fs from 'fs';
import { z } from 'zod';
import { ConfigurationError } from '../errors';
import { selection } from '../methods/selection';

/**
 * Evolution settings: schema, defaults and loading.
 *
 * Settings are validated once, when they are loaded, and then passed to the
 * manager as a plain value. Quota violations never reach the generation loop.
 */

const selectionSchema = z.discriminatedUnion('name', [
  z.object({ name: z.literal('FITNESS_PROPORTIONATE') }),
  z.object({
    name: z.literal('POWER'),
    power: z.number().positive().finite().default(selection.POWER.power),
  }),
  z.object({ name: z.literal('RANK_PROPORTIONATE') }),
  z.object({
    name: z.literal('TOURNAMENT'),
    size: z.number().int().min(1).default(selection.TOURNAMENT.size),
    probability: z
      .number()
      .min(0)
      .max(1)
      .default(selection.TOURNAMENT.probability),
  }),
]);

/** Zod schema for {@link EvolutionSettings}; every field has a default. */
export const settingsSchema = z
  .object({
    /** Individuals per generation. */
    populationSize: z.number().int().min(1).default(20),
    /** Top performers copied verbatim into the next generation. */
    numClones: z.number().int().min(0).default(2),
    /** Freshly randomized individuals injected each generation. */
    numRandom: z.number().int().min(0).default(2),
    /** Probability handed to the crossover operator. */
    crossoverRate: z.number().min(0).max(1).default(0.4),
    /** Bits flipped in every bred offspring. */
    mutationFlipCount: z.number().int().min(0).default(3),
    /** Entries kept by the high-score ledger. */
    highScoreCapacity: z.number().int().min(1).default(20),
    /** Parent selection policy for bred individuals. */
    selection: selectionSchema.default({ ...selection.TOURNAMENT }),
    /** Path of a module exporting `crossover` and `mutate`. */
    operatorModule: z.string().min(1).optional(),
  })
  .strict()
  .superRefine((s, ctx) => {
    if (s.numClones + s.numRandom > s.populationSize) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['numClones'],
        message: `numClones (${s.numClones}) + numRandom (${s.numRandom}) exceeds populationSize (${s.populationSize})`,
      });
    }
    if (s.selection.name === 'TOURNAMENT' && s.selection.size > s.populationSize) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['selection', 'size'],
        message: `tournament size (${s.selection.size}) exceeds populationSize (${s.populationSize})`,
      });
    }
  });

/** Validated settings value consumed by the generation manager. */
export type EvolutionSettings = z.output<typeof settingsSchema>;

/** Settings as a caller may write them: every field optional. */
export type EvolutionSettingsInput = z.input<typeof settingsSchema>;

/** Settings with every default applied. */
export const DEFAULT_SETTINGS: EvolutionSettings = settingsSchema.parse({});

/** Render zod issues as `path: message` lines. */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message
  );
}

/**
 * Validate raw settings, filling defaults.
 *
 * @throws {ConfigurationError} listing every failed check.
 */
export function validateSettings(input: unknown): EvolutionSettings {
  const result = settingsSchema.safeParse(input ?? {});
  if (!result.success) {
    throw new ConfigurationError('Invalid evolution settings', formatIssues(result.error));
  }
  return result.data;
}

/**
 * Read and validate a JSON settings file.
 *
 * @throws {ConfigurationError} when the file is unreadable, not JSON, or fails validation.
 */
export function loadSettings(filePath: string): EvolutionSettings {
  let text: string;
  try {
    text = fs.readFileSync(filePath, 'utf8');
  } catch (err) {
    throw new ConfigurationError(
      `Cannot read settings file ${filePath}`,
      [err instanceof Error ? err.message : String(err)]
    );
  }
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new ConfigurationError(
      `Settings file ${filePath} is not valid JSON`,
      [err instanceof Error ? err.message : String(err)]
    );
  }
  return validateSettings(raw);
}
