/**
 * Engine facade: text → parse → rewrite/resolve → render → strip comments → text.
 *
 * Grammar loading is the only asynchronous step and happens once in
 * `createEngine()`. Each `transform` call is synchronous, owns its tree and
 * never returns partial output.
 */

import { stripComments, type CommentStripOptions } from "./comments/comment-stripper.js";
import { SerializationError, TransformError } from "./errors.js";
import { logger } from "./logger.js";
import { PythonParser } from "./parser/python-parser.js";
import { render } from "./serializer/render.js";
import { parseTargetNames } from "./transform/call-matcher.js";
import { parseEmptyBlockPolicy } from "./transform/empty-block-resolver.js";
import { rewriteTree, type RewriteStats } from "./transform/statement-rewriter.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface TransformOptions {
  /** Dotted call paths to remove, e.g. `print`, `logging.debug`. */
  targetNames: Iterable<string>;
  /** `pass`, `remove` or `keep`. Validated before parsing. */
  emptyBlockPolicy: string;
  removeComments: boolean;
  comments?: CommentStripOptions;
}

export interface TransformStats extends RewriteStats {
  commentsRemoved: number;
}

export interface TransformOutput {
  text: string;
  changed: boolean;
  stats: TransformStats;
}

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export interface Engine {
  transform(source: string, options: TransformOptions): Result<TransformOutput, TransformError>;
}

// ---------------------------------------------------------------------------
// Pipeline
// ---------------------------------------------------------------------------

function runPipeline(parser: PythonParser, source: string, options: TransformOptions): TransformOutput {
  // Configuration problems surface before any parsing work
  const policy = parseEmptyBlockPolicy(options.emptyBlockPolicy);
  const targets = parseTargetNames(options.targetNames);

  const tree = parser.parse(source);
  const { tree: rewritten, stats } = rewriteTree(tree, targets, policy);
  let text = render(rewritten);

  // Under `keep` the output is allowed not to parse
  if (policy !== "keep" && text !== source) {
    const error = parser.check(text);
    if (error) {
      throw new SerializationError(`Rendered output no longer parses: ${error.message}`);
    }
  }

  let commentsRemoved = 0;
  if (options.removeComments) {
    const stripped = stripComments(text, options.comments);
    text = stripped.text;
    commentsRemoved = stripped.removed.length;
  }

  return { text, changed: text !== source, stats: { ...stats, commentsRemoved } };
}

/** Load the Python grammar and return a ready engine. */
export async function createEngine(): Promise<Engine> {
  const parser = await PythonParser.create();

  return {
    transform(source, options) {
      try {
        return { ok: true, value: runPipeline(parser, source, options) };
      } catch (err) {
        if (err instanceof TransformError) {
          logger.debug(`Transform failed (${err.kind}): ${err.message}`);
          return { ok: false, error: err };
        }
        throw err;
      }
    },
  };
}
