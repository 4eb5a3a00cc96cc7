import { config } from '../config';

/** Prefix stamped on every console line the library writes. */
const PREFIX = '[evolution]';

// One-time warning keys already printed during this process.
const seen = new Set<string>();

/** Print an informational line when `config.verbose` is on. */
export function info(message: string): void {
  if (!config.verbose) return;
  // eslint-disable-next-line no-console
  console.info(`${PREFIX} ${message}`);
}

/** Print a warning when `config.warnings` is on. */
export function warn(message: string): void {
  if (!config.warnings) return;
  // eslint-disable-next-line no-console
  console.warn(`${PREFIX} ${message}`);
}

/** Print a warning at most once per `key` for the lifetime of the process. */
export function onceWarn(key: string, message: string): void {
  if (seen.has(key)) return;
  seen.add(key);
  warn(message);
}
