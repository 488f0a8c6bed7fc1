import { structuredPatch } from "diff";

// ANSI escape codes
export const RESET = "\x1b[0m";
export const BOLD = "\x1b[1m";
export const DIM = "\x1b[2m";
export const RED = "\x1b[31m";
export const GREEN = "\x1b[32m";
export const YELLOW = "\x1b[33m";
export const CYAN = "\x1b[36m";

export interface FormatOptions {
  noColor?: boolean;
}

function paint(options: FormatOptions): (color: string, text: string) => string {
  return (color, text) => (options.noColor ? text : `${color}${text}${RESET}`);
}

/** Whether output to `stream` should carry ANSI colors. */
export function supportsColor(stream: NodeJS.WriteStream): boolean {
  return Boolean(stream.isTTY) && process.env.NO_COLOR === undefined;
}

/* ------------------------------------------------------------------ */
/*  Diff                                                               */
/* ------------------------------------------------------------------ */

/**
 * Unified diff of one file, two lines of context. Returns an empty string
 * when nothing changed.
 */
export function formatDiff(filePath: string, before: string, after: string, options: FormatOptions = {}): string {
  if (before === after) return "";

  const c = paint(options);
  const patch = structuredPatch(filePath, filePath, before, after, "", "", { context: 2 });
  const out: string[] = [c(BOLD + CYAN, `--- ${filePath}`), c(BOLD + CYAN, `+++ ${filePath}`)];

  for (const hunk of patch.hunks) {
    out.push(c(CYAN, `@@ -${hunk.oldStart},${hunk.oldLines} +${hunk.newStart},${hunk.newLines} @@`));
    for (const line of hunk.lines) {
      if (line.startsWith("-")) out.push(c(RED, line));
      else if (line.startsWith("+")) out.push(c(GREEN, line));
      else if (line.startsWith("\\")) out.push(c(DIM, line));
      else out.push(line);
    }
  }

  return out.join("\n") + "\n";
}

/* ------------------------------------------------------------------ */
/*  Summary                                                            */
/* ------------------------------------------------------------------ */

export interface FileFailure {
  file: string;
  reason: string;
}

export interface CleanSummary {
  filesProcessed: number;
  filesModified: number;
  callsRemoved: number;
  commentsRemoved: number;
  filesWithCommentsRemoved: number;
  placeholdersInserted: number;
  constructsRemoved: number;
  backups: string[];
  failures: FileFailure[];
}

export function emptySummary(): CleanSummary {
  return {
    filesProcessed: 0,
    filesModified: 0,
    callsRemoved: 0,
    commentsRemoved: 0,
    filesWithCommentsRemoved: 0,
    placeholdersInserted: 0,
    constructsRemoved: 0,
    backups: [],
    failures: [],
  };
}

function plural(n: number, word: string): string {
  return `${n} ${word}${n === 1 ? "" : "s"}`;
}

export function formatSummary(
  summary: CleanSummary,
  context: { dryRun: boolean; backupDir: string | null },
  options: FormatOptions = {},
): string {
  const c = paint(options);
  const lines: string[] = [
    "",
    c(BOLD, "Summary:"),
    `  Files processed:             ${summary.filesProcessed}`,
    `  Files modified:              ${summary.filesModified}`,
    `  Function calls removed:      ${summary.callsRemoved}`,
    `  Files with comments removed: ${summary.filesWithCommentsRemoved}`,
  ];

  if (summary.placeholdersInserted > 0 || summary.constructsRemoved > 0) {
    lines.push(c(DIM, `  ${plural(summary.placeholdersInserted, "placeholder")} inserted, ${plural(summary.constructsRemoved, "block")} removed`));
  }

  if (summary.failures.length > 0) {
    lines.push(c(RED, `  Failures:                    ${summary.failures.length}`));
    for (const failure of summary.failures) {
      lines.push(c(RED, `    ${failure.file}: ${failure.reason}`));
    }
  }

  if (context.dryRun) {
    lines.push("", c(YELLOW, "This was a dry run. No files were modified."));
  } else if (summary.backups.length > 0 && context.backupDir) {
    lines.push(c(DIM, `  Backups saved to ${context.backupDir}`));
  }

  return lines.join("\n") + "\n";
}
