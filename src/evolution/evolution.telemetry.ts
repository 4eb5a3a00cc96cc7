import type Individual from '../architecture/individual';
import { ORIGINS, IndividualOrigin } from '../architecture/individual';
import type { GenerationSummary } from './evolution.types';

/**
 * Per-generation telemetry: building the summary of an evaluated generation
 * and serializing the history to common data-export formats (JSONL and CSV).
 */

/**
 * Summarize an evaluated generation.
 *
 * @param generation Generation number the individuals belong to.
 * @param ranked Individuals best first, all evaluated.
 * @param operatorFailures Operator failures recovered while assembling it.
 */
export function summarizeGeneration(
  generation: number,
  ranked: readonly Individual[],
  operatorFailures: number
): GenerationSummary {
  const scores = ranked.map((ind) => ind.fitness ?? 0);
  const origins: Record<IndividualOrigin, number> = { bred: 0, cloned: 0, random: 0 };
  for (const ind of ranked) origins[ind.origin]++;
  return {
    generation,
    best: scores.length ? scores[0] : 0,
    mean: scores.length ? scores.reduce((a, b) => a + b, 0) / scores.length : 0,
    worst: scores.length ? scores[scores.length - 1] : 0,
    championId: ranked.length ? ranked[0].id : 0,
    origins,
    operatorFailures,
  };
}

/**
 * Serialize summaries to JSON Lines, one summary per line.
 * Useful for streaming run history into line-based log processors.
 */
export function historyToJSONL(history: readonly GenerationSummary[]): string {
  return history.map((entry) => JSON.stringify(entry)).join('\n');
}

/** CSV column order; origin counts are flattened as `origins.<tag>`. */
export const HISTORY_HEADERS: readonly string[] = [
  'generation',
  'best',
  'mean',
  'worst',
  'championId',
  ...ORIGINS.map((origin) => `origins.${origin}`),
  'operatorFailures',
];

/** Format one CSV cell; non-finite numbers become empty cells. */
function cell(value: number): string {
  return Number.isFinite(value) ? String(value) : '';
}

/**
 * Serialize the most recent `maxEntries` summaries to CSV (header row first).
 * Returns an empty string when there is no history.
 */
export function historyToCSV(
  history: readonly GenerationSummary[],
  maxEntries = 500
): string {
  const recent = history.slice(-maxEntries);
  if (!recent.length) return '';
  const lines = [HISTORY_HEADERS.join(',')];
  for (const entry of recent) {
    lines.push(
      [
        entry.generation,
        entry.best,
        entry.mean,
        entry.worst,
        entry.championId,
        ...ORIGINS.map((origin) => entry.origins[origin]),
        entry.operatorFailures,
      ]
        .map(cell)
        .join(',')
    );
  }
  return lines.join('\n');
}
