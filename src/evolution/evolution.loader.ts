import path from 'path';
import { ConfigurationError } from '../errors';
import type { CrossoverFn } from '../methods/crossover';
import type { MutationFn } from '../methods/mutation';
import { BUILTIN_OPERATORS, GeneticOperators } from './evolution.operators';

/**
 * Operator module loading.
 *
 * An operator module exports `crossover(a, b, rate, rng)` and
 * `mutate(genome, flipCount, rng)`, either as named exports or on a default
 * export object. A module that cannot be imported, or lacks either function,
 * is a non-fatal configuration error: the caller gets the built-ins back
 * together with the error to report.
 */

/** Outcome of {@link loadOperatorModule}. */
export interface OperatorLoadResult {
  readonly operators: GeneticOperators;
  /** Set when the module was rejected and the built-ins are used instead. */
  readonly error?: ConfigurationError;
}

/** Turn a user token into something `import()` resolves: relative paths are taken from `baseDir`. */
export function resolveModuleSpec(spec: string, baseDir: string = process.cwd()): string {
  if (spec.startsWith('.') || path.isAbsolute(spec)) return path.resolve(baseDir, spec);
  return spec;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function pickFunction(mod: Record<string, unknown>, key: string): unknown {
  if (typeof mod[key] === 'function') return mod[key];
  const fallback = mod.default;
  if (isRecord(fallback) && typeof fallback[key] === 'function') return fallback[key];
  return undefined;
}

function isCrossover(value: unknown): value is CrossoverFn {
  return typeof value === 'function';
}

function isMutation(value: unknown): value is MutationFn {
  return typeof value === 'function';
}

/** Display name for an operator module: its file name without extension. */
export function moduleDisplayName(spec: string): string {
  return path.basename(spec).replace(/\.[cm]?[jt]s$/, '');
}

/**
 * Build operators from an already imported module namespace.
 * Exposed separately so embedders with their own module system can reuse the checks.
 */
export function operatorsFromModule(mod: unknown, name: string): OperatorLoadResult {
  if (!isRecord(mod)) {
    return {
      operators: BUILTIN_OPERATORS,
      error: new ConfigurationError(`Operator module "${name}" did not export an object`),
    };
  }
  const crossover = pickFunction(mod, 'crossover');
  const mutate = pickFunction(mod, 'mutate');
  const missing: string[] = [];
  if (!isCrossover(crossover)) missing.push('missing function "crossover"');
  if (!isMutation(mutate)) missing.push('missing function "mutate"');
  if (!isCrossover(crossover) || !isMutation(mutate)) {
    return {
      operators: BUILTIN_OPERATORS,
      error: new ConfigurationError(`Operator module "${name}" is incomplete`, missing),
    };
  }
  return { operators: { name, crossover, mutate } };
}

/**
 * Import an operator module by path or package name.
 * Never rejects; failures come back in `error` with the built-ins as operators.
 */
export async function loadOperatorModule(
  spec: string,
  baseDir?: string
): Promise<OperatorLoadResult> {
  const resolved = resolveModuleSpec(spec, baseDir);
  const name = moduleDisplayName(spec);
  let mod: unknown;
  try {
    mod = await import(resolved);
  } catch (err) {
    return {
      operators: BUILTIN_OPERATORS,
      error: new ConfigurationError(`Cannot load operator module "${spec}"`, [
        err instanceof Error ? err.message : String(err),
      ]),
    };
  }
  return operatorsFromModule(mod, name);
}
