import { splitNameList } from "@pytrim/engine";
import { runClean, type CleanOptions } from "./commands/clean.js";

export const VERSION = "0.1.0";

export function printHelp(): void {
  process.stdout.write(`
\x1b[36mpytrim\x1b[0m: remove debug calls and comments from Python code
\x1b[2mv${VERSION}\x1b[0m

\x1b[1mUSAGE\x1b[0m
  pytrim <path> [options]           Clean a .py file or the .py files in a directory

\x1b[1mOPTIONS\x1b[0m
  -f, --functions <list>       Comma-separated call names to remove (default: print)
                               Dotted names match exactly: logging.debug
  -c, --remove-comments        Also remove comments (docstrings are kept)
  -r, --recursive              Process subdirectories
  -d, --dry-run                Print a diff instead of writing files
  -n, --no-backup              Do not back up files before writing them
  -e, --empty-blocks <mode>    Emptied blocks: pass (default), remove, keep
  --backup-dir <dir>           Where backups go (default: the OS temp dir)
  --keep-directives            Keep the shebang and encoding lines when removing comments
  --verbose                    Set log level to debug
  --quiet                      Only report errors
  -h, --help                   Show this help
  -v, --version                Print version

\x1b[1mCONFIG\x1b[0m
  A .pytrim.yml next to the target supplies defaults; flags override it.

\x1b[1mEXAMPLES\x1b[0m
  pytrim app.py                                     Remove print() calls
  pytrim src -r -f print,logging.debug -c           Calls and comments, whole tree
  pytrim src -r --dry-run                           Preview changes as a diff
  pytrim app.py -e remove                           Drop blocks that end up empty

\x1b[1mENVIRONMENT\x1b[0m
  PYTRIM_LOG_LEVEL             Log level: debug, info, warn, error, silent

`);
}

const SHORT_FLAGS: Record<string, string> = {
  f: "functions",
  c: "remove-comments",
  r: "recursive",
  d: "dry-run",
  n: "no-backup",
  e: "empty-blocks",
  h: "help",
  v: "version",
};

const BOOLEAN_FLAGS = new Set([
  "remove-comments", "recursive", "dry-run", "no-backup",
  "keep-directives", "verbose", "quiet", "help", "version",
]);

const KNOWN_FLAGS = new Set([
  ...BOOLEAN_FLAGS,
  "functions", "empty-blocks", "backup-dir",
]);

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export function parseArgs(argv: string[]): { args: Record<string, string>; positional: string[] } {
  const args: Record<string, string> = {};
  const positional: string[] = [];

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    let key: string;
    let inline: string | undefined;

    if (arg.startsWith("--")) {
      // `--functions=print,log` carries its value after the first `=`
      const eq = arg.indexOf("=");
      key = eq === -1 ? arg.slice(2) : arg.slice(2, eq);
      if (eq !== -1) inline = arg.slice(eq + 1);
    } else if (arg.startsWith("-") && arg.length > 1) {
      const long = SHORT_FLAGS[arg.slice(1)];
      if (!long) throw new UsageError(`unknown flag ${arg}`);
      key = long;
    } else {
      positional.push(arg);
      continue;
    }

    if (!KNOWN_FLAGS.has(key)) {
      throw new UsageError(`unknown flag --${key}`);
    }

    if (BOOLEAN_FLAGS.has(key)) {
      if (inline !== undefined) throw new UsageError(`--${key} does not take a value`);
      args[key] = "true";
    } else if (inline !== undefined) {
      if (inline === "") throw new UsageError(`--${key} requires a value`);
      args[key] = inline;
    } else {
      if (i + 1 >= argv.length || argv[i + 1].startsWith("-")) {
        throw new UsageError(`--${key} requires a value`);
      }
      args[key] = argv[++i];
    }
  }

  // Handle --verbose / --quiet
  if (args["verbose"] === "true") {
    process.env.PYTRIM_LOG_LEVEL = "debug";
  } else if (args["quiet"] === "true") {
    process.env.PYTRIM_LOG_LEVEL = "error";
  }

  return { args, positional };
}

/** Map parsed flags onto clean options; flags left out stay undefined. */
export function toCleanOptions(args: Record<string, string>, path: string): CleanOptions {
  const flag = (name: string): true | undefined => (args[name] === "true" ? true : undefined);

  return {
    path,
    functions: args["functions"] !== undefined ? splitNameList(args["functions"]) : undefined,
    emptyBlocks: args["empty-blocks"],
    removeComments: flag("remove-comments"),
    recursive: flag("recursive"),
    dryRun: flag("dry-run"),
    backup: args["no-backup"] === "true" ? false : undefined,
    backupDir: args["backup-dir"],
    keepDirectives: flag("keep-directives"),
  };
}

/** Run the CLI and return the process exit code. */
export async function main(argv: string[]): Promise<number> {
  if (argv.length === 0 || argv.includes("--help") || argv.includes("-h")) {
    printHelp();
    return argv.length === 0 ? 2 : 0;
  }

  if (argv.includes("--version") || argv.includes("-v")) {
    process.stdout.write(`pytrim v${VERSION}\n`);
    return 0;
  }

  let parsed: ReturnType<typeof parseArgs>;
  try {
    parsed = parseArgs(argv);
  } catch (err) {
    if (!(err instanceof UsageError)) throw err;
    process.stderr.write(`[pytrim] Error: ${err.message}\n`);
    return 2;
  }

  const { args, positional } = parsed;
  if (positional.length !== 1) {
    process.stderr.write(`[pytrim] Error: expected exactly one path, got ${positional.length}\n`);
    return 2;
  }

  const summary = await runClean(toCleanOptions(args, positional[0]));
  return summary.failures.length > 0 ? 1 : 0;
}
