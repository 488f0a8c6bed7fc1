import { resolve, join, dirname, basename, extname } from "node:path";
import { readFileSync, writeFileSync, mkdirSync, existsSync, statSync, copyFileSync, constants } from "node:fs";
import { tmpdir } from "node:os";
import {
  createEngine,
  discoverFiles,
  isPythonFile,
  loadConfig,
  compileKeepPatterns,
  parseEmptyBlockPolicy,
  parseTargetNames,
  ConfigurationError,
  DEFAULT_CONFIG,
  logger,
  type Engine,
  type EmptyBlockPolicy,
  type CommentStripOptions,
} from "@pytrim/engine";
import {
  BOLD,
  CYAN,
  RESET,
  emptySummary,
  formatDiff,
  formatSummary,
  supportsColor,
  type CleanSummary,
} from "../formatter.js";

/** Flags from the command line. Unset fields fall back to `.pytrim.yml`, then defaults. */
export interface CleanOptions {
  path: string;
  functions?: string[];
  emptyBlocks?: string;
  removeComments?: boolean;
  recursive?: boolean;
  dryRun?: boolean;
  backup?: boolean;
  backupDir?: string;
  keepDirectives?: boolean;
  noColor?: boolean;
}

interface Settings {
  functions: string[];
  emptyBlocks: EmptyBlockPolicy;
  removeComments: boolean;
  recursive: boolean;
  dryRun: boolean;
  backup: boolean;
  backupDir: string;
  ignore: string[];
  comments: CommentStripOptions;
}

// A byte order mark is kept in the text so it is written back
const UTF8 = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true });

function reasonOf(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/* ------------------------------------------------------------------ */
/*  Backup                                                             */
/* ------------------------------------------------------------------ */

function pad(n: number): string {
  return String(n).padStart(2, "0");
}

/** Local time as `YYYYMMDD_HHMMSS`. */
export function backupTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

/**
 * Copy `filePath` into `backupDir` as `<stem>_<YYYYMMDD_HHMMSS><ext>`, adding
 * `_1`, `_2`, ... when that name is taken. Returns the backup path; throws
 * when the copy fails.
 */
export function createBackup(filePath: string, backupDir: string, now: Date = new Date()): string {
  const ext = extname(filePath);
  const stem = basename(filePath, ext);
  const stamp = backupTimestamp(now);

  mkdirSync(backupDir, { recursive: true });

  let candidate = join(backupDir, `${stem}_${stamp}${ext}`);
  for (let n = 1; existsSync(candidate); n++) {
    candidate = join(backupDir, `${stem}_${stamp}_${n}${ext}`);
  }

  copyFileSync(filePath, candidate, constants.COPYFILE_EXCL);
  return candidate;
}

/* ------------------------------------------------------------------ */
/*  Settings                                                           */
/* ------------------------------------------------------------------ */

function resolveSettings(options: CleanOptions, configDir: string): Settings {
  const config = loadConfig(configDir) ?? DEFAULT_CONFIG;

  const configBackupDir = config.backup_dir ? resolve(configDir, config.backup_dir) : null;

  return {
    functions: options.functions ?? config.functions,
    emptyBlocks: parseEmptyBlockPolicy(options.emptyBlocks ?? config.empty_blocks),
    removeComments: options.removeComments ?? config.remove_comments,
    recursive: options.recursive ?? config.recursive,
    dryRun: options.dryRun ?? false,
    backup: options.backup ?? config.backup,
    backupDir: options.backupDir ? resolve(options.backupDir) : configBackupDir ?? tmpdir(),
    ignore: config.ignore,
    comments: {
      preserveDirectives: options.keepDirectives ?? config.keep_directives,
      keepPatterns: compileKeepPatterns(config.keep_comments),
    },
  };
}

/* ------------------------------------------------------------------ */
/*  Per-file processing                                                */
/* ------------------------------------------------------------------ */

function processFile(
  engine: Engine,
  displayPath: string,
  absolutePath: string,
  settings: Settings,
  summary: CleanSummary,
  noColor: boolean,
): void {
  summary.filesProcessed++;

  const fail = (reason: string): void => {
    summary.failures.push({ file: displayPath, reason });
    logger.error(`${displayPath}: ${reason}`);
  };

  let bytes: Buffer;
  try {
    bytes = readFileSync(absolutePath);
  } catch (err) {
    fail(`read failed: ${reasonOf(err)}`);
    return;
  }

  // Undecodable bytes fail the file rather than being replaced on rewrite
  let content: string;
  try {
    content = UTF8.decode(bytes);
  } catch (err) {
    fail(`decode failed: ${reasonOf(err)}`);
    return;
  }

  const result = engine.transform(content, {
    targetNames: settings.functions,
    emptyBlockPolicy: settings.emptyBlocks,
    removeComments: settings.removeComments,
    comments: settings.comments,
  });

  if (!result.ok) {
    fail(result.error.message);
    return;
  }

  const { text, changed, stats } = result.value;
  summary.callsRemoved += stats.callsRemoved;
  summary.commentsRemoved += stats.commentsRemoved;
  summary.placeholdersInserted += stats.placeholdersInserted;
  summary.constructsRemoved += stats.constructsRemoved;
  if (stats.commentsRemoved > 0) summary.filesWithCommentsRemoved++;

  if (stats.emptyBlocksKept > 0) {
    logger.warn(`${displayPath}: ${stats.emptyBlocksKept} empty block(s) kept; the file may no longer parse`);
  }

  if (!changed) {
    logger.debug(`${displayPath}: unchanged`);
    return;
  }

  if (settings.dryRun) {
    process.stdout.write(formatDiff(displayPath, content, text, { noColor }) + "\n");
    summary.filesModified++;
    return;
  }

  // Skip the file when its backup cannot be made
  if (settings.backup) {
    try {
      const backupPath = createBackup(absolutePath, settings.backupDir);
      summary.backups.push(backupPath);
      logger.debug(`${displayPath}: backup at ${backupPath}`);
    } catch (err) {
      fail(`backup failed: ${reasonOf(err)}`);
      return;
    }
  }

  try {
    writeFileSync(absolutePath, text);
  } catch (err) {
    fail(`write failed: ${reasonOf(err)}`);
    return;
  }

  summary.filesModified++;
  logger.info(`${displayPath}: ${stats.callsRemoved} call(s), ${stats.commentsRemoved} comment(s) removed`);
}

/* ------------------------------------------------------------------ */
/*  Main                                                               */
/* ------------------------------------------------------------------ */

/**
 * Clean one `.py` file or the `.py` files of a directory. Failures are
 * collected per file and never stop the run; the caller exits non-zero when
 * `failures` is not empty.
 */
export async function runClean(options: CleanOptions): Promise<CleanSummary> {
  const summary = emptySummary();
  const targetPath = resolve(options.path);
  const stderrPlain = options.noColor ?? !supportsColor(process.stderr);
  const stdoutPlain = options.noColor ?? !supportsColor(process.stdout);

  if (!existsSync(targetPath)) {
    summary.failures.push({ file: options.path, reason: "does not exist" });
    logger.error(`${options.path} does not exist`);
    return summary;
  }

  const isDirectory = statSync(targetPath).isDirectory();
  const configDir = isDirectory ? targetPath : dirname(targetPath);

  let settings: Settings;
  try {
    settings = resolveSettings(options, configDir);
    parseTargetNames(settings.functions);
  } catch (err) {
    if (!(err instanceof ConfigurationError)) throw err;
    summary.failures.push({ file: options.path, reason: err.message });
    logger.error(err.message);
    return summary;
  }

  const header = stderrPlain ? "pytrim" : `${BOLD}${CYAN}pytrim${RESET}`;
  process.stderr.write(`${header} ${isDirectory ? "directory" : "file"} ${targetPath}\n`);

  const engine = await createEngine();

  if (isDirectory) {
    const files = discoverFiles(targetPath, { recursive: settings.recursive, ignore: settings.ignore });
    if (files.length === 0) logger.info("No Python files found.");
    for (const file of files) {
      processFile(engine, file.relativePath, file.absolutePath, settings, summary, stdoutPlain);
    }
  } else if (isPythonFile(targetPath)) {
    processFile(engine, options.path, targetPath, settings, summary, stdoutPlain);
  } else {
    summary.failures.push({ file: options.path, reason: "not a Python (.py) file" });
    logger.error(`${options.path} is not a Python (.py) file`);
  }

  process.stderr.write(
    formatSummary(
      summary,
      { dryRun: settings.dryRun, backupDir: settings.backup ? settings.backupDir : null },
      { noColor: stderrPlain },
    ),
  );

  return summary;
}
