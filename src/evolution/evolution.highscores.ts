/**
 * Bounded, sorted record of the best distances seen during a run.
 */

/** One ledger row. Only `rank` changes after insertion. */
export interface HighScoreEntry {
  /** 1-based position in the ledger. */
  rank: number;
  readonly generation: number;
  readonly individualId: number;
  readonly fitness: number;
}

/** Descending fitness; ties go to the earlier generation, then the lower id. */
function compareEntries(a: HighScoreEntry, b: HighScoreEntry): number {
  if (a.fitness !== b.fitness) return b.fitness > a.fitness ? 1 : -1;
  if (a.generation !== b.generation) return a.generation - b.generation;
  return a.individualId - b.individualId;
}

export class HighScoreLedger {
  private rows: HighScoreEntry[] = [];

  constructor(readonly capacity: number = 20) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`High-score capacity must be a positive integer, got ${capacity}`);
    }
  }

  /**
   * Insert an entry, re-sort, evict everything beyond capacity and renumber.
   *
   * @returns The inserted entry when it made the cut, otherwise `undefined`.
   */
  record(generation: number, individualId: number, fitness: number): HighScoreEntry | undefined {
    const entry: HighScoreEntry = { rank: 0, generation, individualId, fitness };
    this.rows.push(entry);
    this.rows.sort(compareEntries);
    if (this.rows.length > this.capacity) this.rows.length = this.capacity;
    this.rows.forEach((row, i) => (row.rank = i + 1));
    return this.rows.includes(entry) ? entry : undefined;
  }

  /** Drop every entry (the run was discarded). */
  reset(): void {
    this.rows = [];
  }

  /** Entries best first. */
  entries(): readonly Readonly<HighScoreEntry>[] {
    return this.rows;
  }

  best(): Readonly<HighScoreEntry> | undefined {
    return this.rows[0];
  }

  get size(): number {
    return this.rows.length;
  }

  /** `"1. Generation 4, 123.45 m"` lines, as shown in the high-score list. */
  describe(): string[] {
    return this.rows.map(
      (row) => `${row.rank}. Generation ${row.generation}, ${row.fitness.toFixed(2)} m`
    );
  }
}
