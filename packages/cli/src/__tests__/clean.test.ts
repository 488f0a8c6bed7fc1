import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { mkdirSync, writeFileSync, readFileSync, readdirSync, existsSync, rmSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { runClean, createBackup, backupTimestamp, type CleanOptions } from "../commands/clean.js";

const TEST_DIR = join(tmpdir(), `pytrim-clean-test-${Date.now()}`);
const SRC_DIR = join(TEST_DIR, "src");
const BACKUP_DIR = join(TEST_DIR, "backups");

function setupTestDir(files: Record<string, string>): void {
  mkdirSync(SRC_DIR, { recursive: true });
  for (const [name, content] of Object.entries(files)) {
    const filePath = join(SRC_DIR, name);
    mkdirSync(join(filePath, ".."), { recursive: true });
    writeFileSync(filePath, content);
  }
}

function readTestFile(name: string): string {
  return readFileSync(join(SRC_DIR, name), "utf-8");
}

function clean(overrides: Partial<CleanOptions> = {}) {
  return runClean({ path: SRC_DIR, backupDir: BACKUP_DIR, noColor: true, ...overrides });
}

let output: string[] = [];

function printed(): string {
  return output.join("");
}

describe("clean command", () => {
  beforeEach(() => {
    process.env.PYTRIM_LOG_LEVEL = "silent";
    output = [];
    vi.spyOn(process.stdout, "write").mockImplementation((chunk) => {
      output.push(String(chunk));
      return true;
    });
    vi.spyOn(process.stderr, "write").mockImplementation(() => true);
  });

  afterEach(() => {
    if (existsSync(TEST_DIR)) {
      rmSync(TEST_DIR, { recursive: true, force: true });
    }
    delete process.env.PYTRIM_LOG_LEVEL;
    vi.restoreAllMocks();
  });

  it("cleans a file in place and backs up the original", async () => {
    const original = "x = 1\nprint(x)\n";
    setupTestDir({ "app.py": original });

    const summary = await clean({ path: join(SRC_DIR, "app.py") });

    expect(readTestFile("app.py")).toBe("x = 1\n");
    expect(summary).toMatchObject({ filesProcessed: 1, filesModified: 1, callsRemoved: 1, failures: [] });

    const backups = readdirSync(BACKUP_DIR);
    expect(backups).toHaveLength(1);
    expect(backups[0]).toMatch(/^app_\d{8}_\d{6}\.py$/);
    expect(readFileSync(join(BACKUP_DIR, backups[0]), "utf-8")).toBe(original);
  });

  it("--dry-run prints a diff and writes nothing", async () => {
    const original = "x = 1\nprint(x)\n";
    setupTestDir({ "app.py": original });

    const summary = await clean({ dryRun: true });

    expect(readTestFile("app.py")).toBe(original);
    expect(existsSync(BACKUP_DIR)).toBe(false);
    expect(summary.filesModified).toBe(1);
    expect(printed().split("\n")).toContain("-print(x)");
  });

  it("--no-backup writes without a backup", async () => {
    setupTestDir({ "app.py": "print(1)\nx = 2\n" });

    const summary = await clean({ backup: false });

    expect(readTestFile("app.py")).toBe("x = 2\n");
    expect(summary.backups).toEqual([]);
    expect(existsSync(BACKUP_DIR)).toBe(false);
  });

  it("leaves unchanged files alone", async () => {
    setupTestDir({ "app.py": "x = 1\n" });

    const summary = await clean();

    expect(summary).toMatchObject({ filesProcessed: 1, filesModified: 0 });
    expect(existsSync(BACKUP_DIR)).toBe(false);
  });

  it("processes only top-level .py files unless recursive", async () => {
    setupTestDir({ "a.py": "print(1)\n", "notes.txt": "print(1)\n", "pkg/b.py": "print(2)\n" });

    const flat = await clean({ backup: false });
    expect(flat.filesProcessed).toBe(1);
    expect(readTestFile("pkg/b.py")).toBe("print(2)\n");
    expect(readTestFile("notes.txt")).toBe("print(1)\n");

    const deep = await clean({ backup: false, recursive: true });
    expect(deep.filesProcessed).toBe(2);
    expect(readTestFile("pkg/b.py")).toBe("");
  });

  it("reports a file that does not parse and keeps going", async () => {
    setupTestDir({ "bad.py": "def f(:\n    print(1)\n", "good.py": "print(1)\ny = 2\n" });

    const summary = await clean({ backup: false });

    expect(readTestFile("bad.py")).toBe("def f(:\n    print(1)\n");
    expect(readTestFile("good.py")).toBe("y = 2\n");
    expect(summary.failures).toHaveLength(1);
    expect(summary.failures[0].file).toBe("bad.py");
    expect(summary.filesModified).toBe(1);
  });

  it("fails a file that is not valid UTF-8 and leaves its bytes alone", async () => {
    setupTestDir({});
    const latin1 = Buffer.from("# -*- coding: latin-1 -*-\ns = '\xe9t\xe9'\nprint(s)\n", "latin1");
    writeFileSync(join(SRC_DIR, "legacy.py"), latin1);

    const summary = await clean({ backup: false });

    expect(readFileSync(join(SRC_DIR, "legacy.py")).equals(latin1)).toBe(true);
    expect(summary.filesModified).toBe(0);
    expect(summary.failures).toHaveLength(1);
    expect(summary.failures[0].file).toBe("legacy.py");
    expect(summary.failures[0].reason.startsWith("decode failed:")).toBe(true);
  });

  it("fails when the path does not exist", async () => {
    const summary = await clean({ path: join(TEST_DIR, "missing") });
    expect(summary.failures).toEqual([{ file: join(TEST_DIR, "missing"), reason: "does not exist" }]);
  });

  it("fails on a file that is not Python", async () => {
    setupTestDir({ "notes.txt": "print(1)\n" });

    const summary = await clean({ path: join(SRC_DIR, "notes.txt") });

    expect(summary.failures[0].reason).toBe("not a Python (.py) file");
    expect(readTestFile("notes.txt")).toBe("print(1)\n");
  });

  it("rejects an unknown empty-block mode before touching files", async () => {
    setupTestDir({ "app.py": "print(1)\n" });

    const summary = await clean({ emptyBlocks: "delete" });

    expect(summary.failures).toEqual([
      { file: SRC_DIR, reason: "Unknown empty-block policy 'delete' (expected one of: pass, remove, keep)" },
    ]);
    expect(readTestFile("app.py")).toBe("print(1)\n");
  });

  it("rejects a malformed function name", async () => {
    setupTestDir({ "app.py": "print(1)\n" });

    const summary = await clean({ functions: ["log..debug"] });

    expect(summary.failures).toHaveLength(1);
    expect(summary.filesProcessed).toBe(0);
  });

  it("skips a file whose backup fails", async () => {
    setupTestDir({ "app.py": "print(1)\nx = 1\n" });
    writeFileSync(join(TEST_DIR, "not-a-dir"), "");

    const summary = await clean({ backupDir: join(TEST_DIR, "not-a-dir") });

    expect(readTestFile("app.py")).toBe("print(1)\nx = 1\n");
    expect(summary.failures).toHaveLength(1);
    expect(summary.failures[0].reason.startsWith("backup failed:")).toBe(true);
  });

  it("reads settings from .pytrim.yml", async () => {
    setupTestDir({
      ".pytrim.yml": "functions: [log]\nremove_comments: true\nbackup: false\n",
      "app.py": "log('a')  # trace\nprint('b')\n",
    });

    const summary = await clean({ backupDir: undefined });

    expect(readTestFile("app.py")).toBe("print('b')\n");
    expect(summary).toMatchObject({ callsRemoved: 1, filesWithCommentsRemoved: 0 });
  });

  it("lets flags override .pytrim.yml", async () => {
    setupTestDir({
      ".pytrim.yml": "empty_blocks: remove\nbackup: false\n",
      "app.py": "if x:\n    print(x)\n",
    });

    await clean({ emptyBlocks: "pass" });

    expect(readTestFile("app.py")).toBe("if x:\n    pass\n");
  });

  it("removes comments when asked", async () => {
    setupTestDir({ "app.py": "# header\nx = 1  # note\n" });

    const summary = await clean({ removeComments: true, backup: false });

    expect(readTestFile("app.py")).toBe("x = 1\n");
    expect(summary).toMatchObject({ commentsRemoved: 2, filesWithCommentsRemoved: 1, filesModified: 1 });
  });
});

describe("backups", () => {
  afterEach(() => {
    if (existsSync(TEST_DIR)) {
      rmSync(TEST_DIR, { recursive: true, force: true });
    }
  });

  it("formats the timestamp as YYYYMMDD_HHMMSS in local time", () => {
    expect(backupTimestamp(new Date(2024, 0, 2, 3, 4, 5))).toBe("20240102_030405");
  });

  it("adds a numeric suffix when the name is taken", () => {
    setupTestDir({ "app.py": "x = 1\n" });
    const when = new Date(2024, 0, 2, 3, 4, 5);

    const first = createBackup(join(SRC_DIR, "app.py"), BACKUP_DIR, when);
    const second = createBackup(join(SRC_DIR, "app.py"), BACKUP_DIR, when);

    expect(first).toBe(join(BACKUP_DIR, "app_20240102_030405.py"));
    expect(second).toBe(join(BACKUP_DIR, "app_20240102_030405_1.py"));
  });
});
