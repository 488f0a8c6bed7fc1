// ---------------------------------------------------------------------------
// @pytrim/engine
//
// Removes call statements and comments from Python source while keeping it
// valid. Used by the pytrim CLI.
// ---------------------------------------------------------------------------

// Engine
export {
  createEngine,
  type Engine,
  type Result,
  type TransformOptions,
  type TransformOutput,
  type TransformStats,
} from "./engine.js";

// Errors
export {
  TransformError,
  ParseError,
  SerializationError,
  ConfigurationError,
  type TransformErrorKind,
} from "./errors.js";

// Parser
export { PythonParser } from "./parser/python-parser.js";
export type {
  Span,
  Expression,
  Block,
  Clause,
  ClauseRole,
  Construct,
  MatchStatement,
  Statement,
  SourceTree,
} from "./parser/source-tree.js";

// Transform
export {
  parseTargetNames,
  matchesTarget,
  namePath,
  type TargetNameSet,
} from "./transform/call-matcher.js";
export {
  EMPTY_BLOCK_POLICIES,
  isEmptyBlockPolicy,
  parseEmptyBlockPolicy,
  type EmptyBlockPolicy,
} from "./transform/empty-block-resolver.js";
export { rewriteTree, type RewriteStats } from "./transform/statement-rewriter.js";

// Serializer
export { render, PLACEHOLDER_TEXT } from "./serializer/render.js";
export { applyEdits, type TextEdit } from "./text-edits.js";

// Comments
export {
  stripComments,
  scanSource,
  type CommentStripOptions,
  type LexicalSpan,
  type StripResult,
} from "./comments/comment-stripper.js";

// Config
export {
  loadConfig,
  compileKeepPatterns,
  splitNameList,
  didYouMean,
  CONFIG_FILE,
  DEFAULT_CONFIG,
  type PytrimConfig,
} from "./config.js";

// Discovery
export {
  discoverFiles,
  isPythonFile,
  matchesIgnore,
  PYTHON_EXTENSION,
  type DiscoveredFile,
  type DiscoverOptions,
} from "./discovery.js";

// Logger
export { logger } from "./logger.js";
