/**
 * Serializer.
 *
 * Renders a rewritten `SourceTree` back to text by turning its excisions and
 * placeholders into edits on the original source and applying them
 * bottom-to-top, so untouched code keeps its exact formatting and comments.
 */

import { SerializationError } from "../errors.js";
import { applyEdits, type TextEdit } from "../text-edits.js";
import { assertNever, type Block, type SourceTree, type Span, type Statement } from "../parser/source-tree.js";

export const PLACEHOLDER_TEXT = "pass";

// ---------------------------------------------------------------------------
// Line helpers
// ---------------------------------------------------------------------------

const SEPARATOR_ONLY = /^[ \t]*;[ \t]*$/;
const LEADING_SEPARATOR = /^[ \t]*;[ \t]*/;
const TRAILING_SEPARATOR = /[ \t]*;[ \t]*$/;

function lineStartOf(source: string, index: number): number {
  return index <= 0 ? 0 : source.lastIndexOf("\n", index - 1) + 1;
}

/** Index of the `\n` ending the line that contains `index`, or source length. */
function lineEndOf(source: string, index: number): number {
  const nl = source.indexOf("\n", index);
  return nl === -1 ? source.length : nl;
}

function isBlankOrComment(text: string): boolean {
  const trimmed = text.trim();
  return trimmed === "" || trimmed.startsWith("#");
}

/** `[start, end)` covering whole lines, terminator included. */
function wholeLines(source: string, lineStart: number, lineEnd: number): TextEdit {
  const end = lineEnd < source.length ? lineEnd + 1 : lineEnd;
  return { start: lineStart, end, text: "" };
}

/** Merge spans separated only by `;` on the same line (`a(); b()`). */
function mergeSeparated(source: string, spans: Span[]): Span[] {
  const sorted = [...spans].sort((a, b) => a.start - b.start);
  const merged: Span[] = [];
  for (const span of sorted) {
    const last = merged[merged.length - 1];
    if (last && SEPARATOR_ONLY.test(source.slice(last.end, span.start))) {
      last.end = span.end;
    } else {
      merged.push({ ...span });
    }
  }
  return merged;
}

// ---------------------------------------------------------------------------
// Edits
// ---------------------------------------------------------------------------

/**
 * Delete a statement. A statement alone on its line takes the whole line
 * (and any trailing comment) with it; one sharing a line with other
 * statements takes only itself and one `;` separator.
 */
export function statementDeletion(source: string, span: Span): TextEdit {
  const lineStart = lineStartOf(source, span.start);
  const lineEnd = lineEndOf(source, span.end);
  const prefix = source.slice(lineStart, span.start);
  const suffix = source.slice(span.end, lineEnd);
  const following = LEADING_SEPARATOR.exec(suffix);

  if (prefix.trim() === "") {
    if (following && !isBlankOrComment(suffix.slice(following[0].length))) {
      return { start: span.start, end: span.end + following[0].length, text: "" };
    }
    if (!isBlankOrComment(suffix.replace(LEADING_SEPARATOR, ""))) {
      throw new SerializationError(`Unexpected code after statement at offset ${span.end}`);
    }
    return wholeLines(source, lineStart, lineEnd);
  }

  const preceding = TRAILING_SEPARATOR.exec(prefix);
  if (preceding) {
    return { start: lineStart + preceding.index, end: span.end, text: "" };
  }
  if (following) {
    return { start: span.start, end: span.end + following[0].length, text: "" };
  }
  // Sole statement of a one-line suite (`if x: print(x)`)
  return { start: span.start, end: span.end, text: "" };
}

/** Delete a clause (`elif` / `else` / `finally` ...), which always starts its own line. */
export function clauseDeletion(source: string, span: Span): TextEdit {
  const lineStart = lineStartOf(source, span.start);
  const lineEnd = lineEndOf(source, span.end);
  if (source.slice(lineStart, span.start).trim() !== "") {
    throw new SerializationError(`Clause at offset ${span.start} does not start its line`);
  }
  if (!isBlankOrComment(source.slice(span.end, lineEnd))) {
    throw new SerializationError(`Unexpected code after clause at offset ${span.end}`);
  }
  return wholeLines(source, lineStart, lineEnd);
}

function collectBlock(source: string, block: Block, edits: TextEdit[]): void {
  for (const span of mergeSeparated(source, block.excised)) {
    edits.push(statementDeletion(source, span));
  }
  for (const statement of block.statements) {
    collectStatement(source, statement, edits);
  }
}

function collectStatement(source: string, statement: Statement, edits: TextEdit[]): void {
  switch (statement.kind) {
    case "placeholder":
      edits.push({ start: statement.span.start, end: statement.span.end, text: PLACEHOLDER_TEXT });
      return;
    case "expression":
    case "opaque":
      return;
    case "if":
    case "for":
    case "while":
    case "try":
    case "with":
    case "match":
    case "function":
    case "class":
      for (const clause of statement.clauses) collectBlock(source, clause.body, edits);
      for (const span of statement.droppedClauses) edits.push(clauseDeletion(source, span));
      return;
    default:
      assertNever(statement);
  }
}

export function collectEdits(tree: SourceTree): TextEdit[] {
  const edits: TextEdit[] = [];
  collectBlock(tree.source, tree.body, edits);
  return edits;
}

/** Render a rewritten tree to text. An untouched tree renders to its source verbatim. */
export function render(tree: SourceTree): string {
  return applyEdits(tree.source, collectEdits(tree));
}
