/**
 * Minimal structured logger for @pytrim/engine.
 *
 * Respects PYTRIM_LOG_LEVEL env var (debug | info | warn | error | silent).
 * Writes to stderr so stdout stays clean for diffs and piped output.
 * The level is read on every call so the CLI's --verbose / --quiet take
 * effect after import.
 */

const LEVELS = { debug: 0, info: 1, warn: 2, error: 3, silent: 4 } as const;
type Level = keyof typeof LEVELS;

function isLevel(raw: string): raw is Level {
  return Object.prototype.hasOwnProperty.call(LEVELS, raw);
}

function currentLevel(): number {
  const raw = process.env.PYTRIM_LOG_LEVEL?.toLowerCase();
  if (!raw || !isLevel(raw)) return LEVELS.info;
  return LEVELS[raw];
}

function write(threshold: number, msg: string): void {
  if (currentLevel() <= threshold) process.stderr.write(`[pytrim] ${msg}\n`);
}

export const logger = {
  debug(msg: string) { write(LEVELS.debug, msg); },
  info(msg: string)  { write(LEVELS.info, msg); },
  warn(msg: string)  { write(LEVELS.warn, msg); },
  error(msg: string) { write(LEVELS.error, msg); },
};
