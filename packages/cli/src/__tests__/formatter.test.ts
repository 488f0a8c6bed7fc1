import { describe, it, expect } from "vitest";
import { emptySummary, formatDiff, formatSummary } from "../formatter.js";

describe("formatDiff", () => {
  it("returns nothing for identical text", () => {
    expect(formatDiff("a.py", "x = 1\n", "x = 1\n")).toBe("");
  });

  it("renders a unified diff with context", () => {
    const diff = formatDiff("a.py", "x = 1\nprint(x)\ny = 2\n", "x = 1\ny = 2\n", { noColor: true });
    expect(diff).toBe(["--- a.py", "+++ a.py", "@@ -1,3 +1,2 @@", " x = 1", "-print(x)", " y = 2", ""].join("\n"));
  });

  it("colors removed lines red", () => {
    const diff = formatDiff("a.py", "print(x)\ny = 2\n", "y = 2\n");
    expect(diff.split("\n")).toContain("\x1b[31m-print(x)\x1b[0m");
  });
});

describe("formatSummary", () => {
  it("lists counts and failures, and notes a dry run", () => {
    const summary = {
      ...emptySummary(),
      filesProcessed: 2,
      filesModified: 1,
      callsRemoved: 3,
      failures: [{ file: "bad.py", reason: "Invalid syntax at line 1, column 7" }],
    };

    expect(formatSummary(summary, { dryRun: true, backupDir: "/tmp" }, { noColor: true })).toBe(
      [
        "",
        "Summary:",
        "  Files processed:             2",
        "  Files modified:              1",
        "  Function calls removed:      3",
        "  Files with comments removed: 0",
        "  Failures:                    1",
        "    bad.py: Invalid syntax at line 1, column 7",
        "",
        "This was a dry run. No files were modified.",
        "",
      ].join("\n"),
    );
  });

  it("mentions the backup directory after a real run", () => {
    const summary = { ...emptySummary(), filesProcessed: 1, filesModified: 1, backups: ["/bak/a_20240102_030405.py"] };

    const text = formatSummary(summary, { dryRun: false, backupDir: "/bak" }, { noColor: true });

    expect(text.endsWith("  Backups saved to /bak\n")).toBe(true);
  });

  it("reports placeholders and removed blocks", () => {
    const summary = { ...emptySummary(), placeholdersInserted: 1, constructsRemoved: 2 };

    const text = formatSummary(summary, { dryRun: false, backupDir: null }, { noColor: true });

    expect(text.split("\n")).toContain("  1 placeholder inserted, 2 blocks removed");
  });
});
