/**
 * Config loader: reads and validates `.pytrim.yml` configuration files.
 * Uses Zod for schema validation; bad values warn and fall back to defaults.
 */

import { readFileSync, existsSync } from "node:fs";
import { resolve, join } from "node:path";
import yaml from "js-yaml";
import { z } from "zod";
import { EMPTY_BLOCK_POLICIES, isEmptyBlockPolicy, type EmptyBlockPolicy } from "./transform/empty-block-resolver.js";

export const CONFIG_FILE = ".pytrim.yml";

/* ------------------------------------------------------------------ */
/*  Types                                                              */
/* ------------------------------------------------------------------ */

export interface PytrimConfig {
  /** Dotted call paths to remove: ["print", "logging.debug"] */
  functions: string[];
  /** What happens to blocks emptied by removal */
  empty_blocks: EmptyBlockPolicy;
  remove_comments: boolean;
  /** Descend into subdirectories when given a directory */
  recursive: boolean;
  /** Copy each file aside before writing it */
  backup: boolean;
  /** Backup directory; null means the OS temp dir */
  backup_dir: string | null;
  /** Glob patterns of files/dirs to skip */
  ignore: string[];
  /** Keep shebang and encoding lines when stripping comments */
  keep_directives: boolean;
  /** Regular expressions; matching comments survive stripping */
  keep_comments: string[];
}

export const DEFAULT_CONFIG: PytrimConfig = {
  functions: ["print"],
  empty_blocks: "pass",
  remove_comments: false,
  recursive: false,
  backup: true,
  backup_dir: null,
  ignore: [],
  keep_directives: false,
  keep_comments: [],
};

const KNOWN_KEYS: readonly string[] = Object.keys(DEFAULT_CONFIG);

/* ------------------------------------------------------------------ */
/*  Zod schema                                                         */
/* ------------------------------------------------------------------ */

const pytrimConfigSchema = z.object({
  // A single comma-separated string is accepted as well as a list
  functions: z.union([z.array(z.string()), z.string()]).optional(),
  empty_blocks: z.string().optional(),
  remove_comments: z.boolean().optional(),
  recursive: z.boolean().optional(),
  backup: z.boolean().optional(),
  backup_dir: z.string().nullable().optional(),
  ignore: z.array(z.string()).optional(),
  keep_directives: z.boolean().optional(),
  keep_comments: z.array(z.string()).optional(),
}).passthrough();

/* ------------------------------------------------------------------ */
/*  Helpers                                                            */
/* ------------------------------------------------------------------ */

function warn(message: string): void {
  process.stderr.write(`[pytrim] Warning: ${message}\n`);
}

export function didYouMean(input: string, valid: readonly string[]): string | null {
  let best: string | null = null;
  let bestDist = Infinity;

  for (const candidate of valid) {
    const dist = levenshtein(input.toLowerCase(), candidate.toLowerCase());
    if (dist < bestDist && dist <= 3) {
      bestDist = dist;
      best = candidate;
    }
  }

  return best;
}

function levenshtein(a: string, b: string): number {
  const m = a.length;
  const n = b.length;
  const dp: number[][] = Array.from({ length: m + 1 }, () => new Array<number>(n + 1).fill(0));

  for (let i = 0; i <= m; i++) dp[i][0] = i;
  for (let j = 0; j <= n; j++) dp[0][j] = j;

  for (let i = 1; i <= m; i++) {
    for (let j = 1; j <= n; j++) {
      dp[i][j] = a[i - 1] === b[j - 1]
        ? dp[i - 1][j - 1]
        : 1 + Math.min(dp[i - 1][j], dp[i][j - 1], dp[i - 1][j - 1]);
    }
  }

  return dp[m][n];
}

/** Split `"print, logging.debug"` style lists; blanks are dropped. */
export function splitNameList(raw: string): string[] {
  return raw.split(",").map((s) => s.trim()).filter((s) => s !== "");
}

/**
 * Compile `keep_comments` patterns. Invalid expressions are reported and
 * skipped.
 */
export function compileKeepPatterns(patterns: string[]): RegExp[] {
  const compiled: RegExp[] = [];
  for (const pattern of patterns) {
    try {
      compiled.push(new RegExp(pattern));
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      warn(`ignoring keep_comments pattern '${pattern}': ${reason}`);
    }
  }
  return compiled;
}

/* ------------------------------------------------------------------ */
/*  Loader                                                             */
/* ------------------------------------------------------------------ */

/**
 * Load `.pytrim.yml` from the given directory.
 * Returns the parsed config merged with defaults, or null if no config file exists.
 */
export function loadConfig(dir: string): PytrimConfig | null {
  const configPath = resolve(join(dir, CONFIG_FILE));

  if (!existsSync(configPath)) return null;

  let raw: string;
  try {
    raw = readFileSync(configPath, "utf-8");
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    warn(`could not read ${CONFIG_FILE}: ${reason}. Using defaults.`);
    return { ...DEFAULT_CONFIG };
  }

  let parsed: unknown;
  try {
    parsed = yaml.load(raw);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    warn(`could not parse ${CONFIG_FILE}: ${reason}. Using defaults.`);
    return { ...DEFAULT_CONFIG };
  }

  if (!parsed || typeof parsed !== "object") return { ...DEFAULT_CONFIG };

  const result = pytrimConfigSchema.safeParse(parsed);
  if (!result.success) {
    for (const issue of result.error.issues) {
      warn(`config validation error: ${issue.path.join(".")}: ${issue.message}`);
    }
    return { ...DEFAULT_CONFIG };
  }

  const data = result.data;

  for (const key of Object.keys(data)) {
    if (!KNOWN_KEYS.includes(key)) {
      const suggestion = didYouMean(key, KNOWN_KEYS);
      const hint = suggestion ? `; did you mean '${suggestion}'?` : "";
      warn(`unknown config key '${key}'${hint}`);
    }
  }

  const config: PytrimConfig = { ...DEFAULT_CONFIG };

  if (data.functions !== undefined) {
    const names = typeof data.functions === "string"
      ? splitNameList(data.functions)
      : data.functions.map((s) => s.trim()).filter((s) => s !== "");
    if (names.length > 0) config.functions = names;
  }

  if (data.empty_blocks !== undefined) {
    if (isEmptyBlockPolicy(data.empty_blocks)) {
      config.empty_blocks = data.empty_blocks;
    } else {
      const suggestion = didYouMean(data.empty_blocks, EMPTY_BLOCK_POLICIES);
      const hint = suggestion ? `; did you mean '${suggestion}'?` : "";
      warn(
        `invalid empty_blocks '${data.empty_blocks}'${hint}. Using default '${DEFAULT_CONFIG.empty_blocks}'.`,
      );
    }
  }

  if (data.remove_comments !== undefined) config.remove_comments = data.remove_comments;
  if (data.recursive !== undefined) config.recursive = data.recursive;
  if (data.backup !== undefined) config.backup = data.backup;
  if (data.backup_dir !== undefined) config.backup_dir = data.backup_dir;
  if (data.ignore !== undefined) config.ignore = data.ignore;
  if (data.keep_directives !== undefined) config.keep_directives = data.keep_directives;
  if (data.keep_comments !== undefined) config.keep_comments = data.keep_comments;

  return config;
}
