/**
 * Python file discovery for directory runs.
 *
 * Walks the directory (one level unless `recursive`), skipping hidden
 * directories, caches, virtualenvs and build output. Results are sorted by
 * relative path so runs are reproducible.
 */

import { readdirSync, statSync } from "node:fs";
import { join, relative, extname, sep } from "node:path";
import { logger } from "./logger.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface DiscoveredFile {
  /** Relative to the walk root, always `/`-separated. */
  relativePath: string;
  absolutePath: string;
  sizeBytes: number;
}

export interface DiscoverOptions {
  recursive?: boolean;
  /** Glob patterns to ignore (from .pytrim.yml) */
  ignore?: string[];
}

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

export const PYTHON_EXTENSION = ".py";

const SKIP_DIRS = new Set([
  "node_modules", "__pycache__", "venv", "env",
  "site-packages", "build", "dist",
]);

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

export function isPythonFile(filePath: string): boolean {
  return extname(filePath) === PYTHON_EXTENSION;
}

function globToRegExp(pattern: string): RegExp {
  let out = "";
  for (let i = 0; i < pattern.length; i++) {
    const ch = pattern[i];
    if (ch === "*" && pattern[i + 1] === "*") {
      // `**/` also matches zero directories
      if (pattern[i + 2] === "/") {
        out += "(?:.*/)?";
        i += 2;
      } else {
        out += ".*";
        i += 1;
      }
    } else if (ch === "*") {
      out += "[^/]*";
    } else if (ch === "?") {
      out += "[^/]";
    } else {
      out += ch.replace(/[.+^${}()|[\]\\]/g, "\\$&");
    }
  }
  return new RegExp(`^${out}$`);
}

/**
 * Simple glob matcher for ignore patterns.
 * Supports: directory names, path prefixes ("tests/"), `*` and `**` globs.
 */
export function matchesIgnore(relPath: string, patterns: string[]): boolean {
  const segments = relPath.split("/");
  const basename = segments[segments.length - 1];

  for (const pattern of patterns) {
    // Exact directory or file name (e.g., "migrations")
    if (segments.includes(pattern)) return true;

    // Path prefix (e.g., "tests/", "scripts/legacy")
    const cleanPattern = pattern.replace(/\/$/, "");
    if (relPath.startsWith(cleanPattern + "/") || relPath === cleanPattern) return true;

    if (pattern.includes("*") || pattern.includes("?")) {
      const re = globToRegExp(pattern);
      // Patterns without a slash match the file name at any depth
      if (re.test(pattern.includes("/") ? relPath : basename)) return true;
    }
  }
  return false;
}

// ---------------------------------------------------------------------------
// Walk
// ---------------------------------------------------------------------------

/**
 * Discover the `.py` files under `targetPath`.
 * Unreadable directories and entries are logged and skipped.
 */
export function discoverFiles(targetPath: string, opts?: DiscoverOptions): DiscoveredFile[] {
  const recursive = opts?.recursive ?? false;
  const ignorePatterns = opts?.ignore ?? [];
  const files: DiscoveredFile[] = [];

  function walk(dir: string): void {
    let entries;
    try {
      entries = readdirSync(dir, { withFileTypes: true });
    } catch (err) {
      logger.warn(`Cannot read directory ${dir}: ${err instanceof Error ? err.message : String(err)}`);
      return;
    }

    for (const entry of entries) {
      if (entry.name.startsWith(".")) continue;
      const abs = join(dir, entry.name);
      const rel = relative(targetPath, abs).split(sep).join("/");

      if (entry.isDirectory()) {
        if (!recursive || SKIP_DIRS.has(entry.name)) continue;
        if (matchesIgnore(rel, ignorePatterns)) continue;
        walk(abs);
      } else if (entry.isFile()) {
        if (!isPythonFile(entry.name)) continue;
        if (matchesIgnore(rel, ignorePatterns)) continue;

        try {
          files.push({ relativePath: rel, absolutePath: abs, sizeBytes: statSync(abs).size });
        } catch (err) {
          logger.debug(`Skipping ${rel}: ${err instanceof Error ? err.message : String(err)}`);
        }
      }
    }
  }

  walk(targetPath);
  return files.sort((a, b) => (a.relativePath < b.relativePath ? -1 : a.relativePath > b.relativePath ? 1 : 0));
}
