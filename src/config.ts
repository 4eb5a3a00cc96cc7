/**
 * Global library configuration contract & default instance.
 *
 * These flags tune how the library talks to the console. They do not hold any
 * evolution settings: population sizes, quotas and rates travel in an explicit
 * {@link EvolutionSettings} value handed to each `GenerationManager`.
 *
 * USAGE PATTERN
 * ------------
 *   import { config } from 'vehicle-evolution';
 *   config.warnings = true; // print operator failures & other warnings
 *   config.verbose = true;  // print seed changes and generation summaries
 *
 * Adjust BEFORE constructing a manager so the first generation is logged too.
 */
export interface EvolutionConfig {
  /**
   * Emit operator failures, fallback notices and one-time warnings to stderr.
   * Presentation callbacks receive the warnings whether or not this is set.
   * Default: false
   */
  warnings: boolean;

  /**
   * Emit informational lines (seed changes, generation summaries, operator
   * module loading) to stdout.
   * Default: false
   */
  verbose: boolean;
}

/**
 * Singleton mutable configuration object consumed throughout the library.
 * Modify properties directly; do NOT reassign the binding (imports retain reference).
 */
export const config: EvolutionConfig = {
  warnings: false, // runtime warnings
  verbose: false, // informational lines
};
