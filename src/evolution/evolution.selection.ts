import type Individual from '../architecture/individual';
import type { Rng } from '../architecture/genome';
import type { SelectionMethod } from '../methods/selection';
import { onceWarn } from '../utils/log';

/**
 * Ranking and parent selection.
 *
 * Both functions are pure: ranking returns a new array and selection reads
 * the ranked pool plus the caller's random stream, nothing else.
 */

/**
 * Order individuals best first: descending fitness, ties broken by lowest id.
 * Unevaluated individuals sort last.
 *
 * Example:
 * rankIndividuals(pop).map(i => i.id); // fitness [10, 30, 30, 5] → [1, 2, 0, 3]
 */
export function rankIndividuals(individuals: readonly Individual[]): Individual[] {
  return [...individuals].sort((a, b) => {
    const fa = a.fitness ?? -Infinity;
    const fb = b.fitness ?? -Infinity;
    if (fa !== fb) return fb > fa ? 1 : -1;
    return a.id - b.id;
  });
}

/** Uniform index into a pool of `size` entries. */
function pickIndex(size: number, rng: Rng): number {
  return Math.min(size - 1, Math.floor(rng() * size));
}

/**
 * Select a parent from a ranked pool (best first).
 *
 * Supported strategies (via `method.name`):
 * - 'TOURNAMENT'           : sample `size` competitors, take the best with probability p
 * - 'POWER'                : biased power-law index (exploits the top ranks)
 * - 'RANK_PROPORTIONATE'   : linear rank weights n, n-1, …, 1
 * - 'FITNESS_PROPORTIONATE': roulette wheel over (shifted) fitness
 *
 * @param ranked Pool ordered by {@link rankIndividuals}; must not be empty.
 * @param method Selection policy from the settings.
 * @param rng The breeding individual's own stream.
 */
export function selectParent(
  ranked: readonly Individual[],
  method: SelectionMethod,
  rng: Rng
): Individual {
  const n = ranked.length;
  if (n === 0) throw new RangeError('Cannot select a parent from an empty pool');

  switch (method.name) {
    case 'POWER': {
      const index = Math.floor(Math.pow(rng(), method.power) * n);
      return ranked[Math.min(n - 1, index)];
    }

    case 'RANK_PROPORTIONATE': {
      // weights n, n-1, ..., 1 sum to n(n+1)/2
      const total = (n * (n + 1)) / 2;
      const threshold = rng() * total;
      let cumulative = 0;
      for (let r = 0; r < n; r++) {
        cumulative += n - r;
        if (threshold < cumulative) return ranked[r];
      }
      return ranked[n - 1];
    }

    case 'FITNESS_PROPORTIONATE': {
      // Shift so the worst individual sits at zero.
      const worst = ranked.reduce((min, ind) => Math.min(min, ind.fitness ?? 0), 0);
      const weights = ranked.map((ind) => (ind.fitness ?? 0) - worst);
      const total = weights.reduce((sum, w) => sum + w, 0);
      const draw = rng();
      if (total <= 0) {
        onceWarn(
          'selection:zero-fitness',
          'FITNESS_PROPORTIONATE selection found no positive fitness; picking parents uniformly'
        );
        return ranked[pickIndex(n, () => draw)];
      }
      if (!Number.isFinite(total)) {
        onceWarn(
          'selection:fitness-overflow',
          'FITNESS_PROPORTIONATE selection total overflowed; picking parents uniformly'
        );
        return ranked[pickIndex(n, () => draw)];
      }
      const threshold = draw * total;
      let cumulative = 0;
      for (let i = 0; i < n; i++) {
        cumulative += weights[i];
        if (threshold < cumulative) return ranked[i];
      }
      return ranked[n - 1];
    }

    case 'TOURNAMENT': {
      const size = Math.max(1, method.size);
      // Competitors are ranked positions; the lowest position is the fittest.
      const competitors: number[] = [];
      for (let i = 0; i < size; i++) competitors.push(pickIndex(n, rng));
      competitors.sort((a, b) => a - b);
      for (let i = 0; i < competitors.length - 1; i++) {
        if (rng() < method.probability) return ranked[competitors[i]];
      }
      return ranked[competitors[competitors.length - 1]];
    }
  }
}
