/**
 * Comment stripper.
 *
 * Works on text, never on the tree: comment placement is not part of the
 * structural model. A small Python lexer classifies every comment and string
 * literal span; comments are then deleted while strings and docstrings stay
 * byte-for-byte intact.
 */

import { applyEdits, type TextEdit } from "../text-edits.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type LexicalKind = "comment" | "string" | "docstring";

export interface LexicalSpan {
  kind: LexicalKind;
  start: number;
  end: number;
}

export interface CommentStripOptions {
  /** Leave an empty line where a comment-only line was. */
  preserveBlankLines?: boolean;
  /** Keep a line-1 shebang and a PEP 263 encoding declaration. */
  preserveDirectives?: boolean;
  /** Comments matching any of these are kept (e.g. /noqa/). */
  keepPatterns?: RegExp[];
}

export interface StripResult {
  text: string;
  removed: LexicalSpan[];
}

// ---------------------------------------------------------------------------
// Lexer
// ---------------------------------------------------------------------------

const STRING_PREFIXES = new Set(["r", "u", "b", "f", "br", "rb", "fr", "rf"]);
const IDENT_CHAR = /[A-Za-z0-9_\u0080-\uffff]/;
const OPENERS = "([{";
const CLOSERS = ")]}";
const ENCODING_DECLARATION = /^[ \t\f]*#.*?coding[:=][ \t]*[-\w.]+/;

/** End of a string literal whose opening quote is at `quoteIndex`. */
function stringEnd(source: string, quoteIndex: number): number {
  const quote = source[quoteIndex];
  const triple = source.startsWith(quote.repeat(3), quoteIndex);
  let i = quoteIndex + (triple ? 3 : 1);

  while (i < source.length) {
    const ch = source[i];
    if (ch === "\\") {
      i += source.startsWith("\r\n", i + 1) ? 3 : 2;
      continue;
    }
    if (triple) {
      if (source.startsWith(quote.repeat(3), i)) return i + 3;
    } else {
      if (ch === quote) return i + 1;
      // Unterminated single-quoted string: stop at the line end
      if (ch === "\n") return i;
    }
    i++;
  }
  return source.length;
}

/** Index where a comment starting at `start` ends, line terminator excluded. */
function commentEnd(source: string, start: number): number {
  let end = source.indexOf("\n", start);
  if (end === -1) return source.length;
  if (source[end - 1] === "\r") end--;
  return end;
}

/**
 * Tracks logical lines so a string can be recognised as a docstring: the
 * sole expression of the first statement of the module or of a `def` /
 * `class` body.
 */
class DocstringTracker {
  private expectDocstring = true;
  private tokens = 0;
  private words: string[] = [];
  private lastToken = "";
  private headerColonSeen = false;
  private candidate: LexicalSpan | null = null;

  constructor(private readonly depth: () => number) {}

  private isHeader(): boolean {
    const [first, second] = this.words;
    return first === "def" || first === "class" || (first === "async" && second === "def");
  }

  string(span: LexicalSpan): void {
    const opensBody = this.tokens === 0 ? this.expectDocstring : this.headerColonSeen && this.lastToken === ":";
    this.candidate = opensBody ? span : null;
    this.push("<string>");
  }

  word(word: string): void {
    if (this.tokens < 2) this.words.push(word);
    this.candidate = null;
    this.push(word);
  }

  symbol(symbol: string): void {
    if (symbol === ";" && this.depth() === 0) {
      this.confirm();
    } else {
      this.candidate = null;
    }
    if (symbol === ":" && this.depth() === 0 && this.isHeader()) this.headerColonSeen = true;
    this.push(symbol);
  }

  endLogicalLine(): void {
    this.confirm();
    if (this.tokens > 0) {
      this.expectDocstring = this.isHeader() && this.lastToken === ":";
    }
    this.tokens = 0;
    this.words = [];
    this.lastToken = "";
    this.headerColonSeen = false;
  }

  private confirm(): void {
    if (this.candidate) this.candidate.kind = "docstring";
    this.candidate = null;
  }

  private push(token: string): void {
    this.tokens++;
    this.lastToken = token;
  }
}

/**
 * Classify every comment, string and docstring span in `source`, in order.
 * A `#` inside any string literal, including triple-quoted ones, is part of
 * the string.
 */
export function scanSource(source: string): LexicalSpan[] {
  const spans: LexicalSpan[] = [];
  let depth = 0;
  const tracker = new DocstringTracker(() => depth);
  let i = 0;

  while (i < source.length) {
    const ch = source[i];

    if (ch === "#") {
      const end = commentEnd(source, i);
      spans.push({ kind: "comment", start: i, end });
      i = end;
      continue;
    }

    if (ch === "\\" && (source[i + 1] === "\n" || source.startsWith("\r\n", i + 1))) {
      i += source[i + 1] === "\n" ? 2 : 3;
      continue;
    }

    if (ch === "\n") {
      if (depth === 0) tracker.endLogicalLine();
      i++;
      continue;
    }

    if (ch === '"' || ch === "'") {
      const span: LexicalSpan = { kind: "string", start: i, end: stringEnd(source, i) };
      spans.push(span);
      tracker.string(span);
      i = span.end;
      continue;
    }

    if (IDENT_CHAR.test(ch)) {
      let end = i;
      while (end < source.length && IDENT_CHAR.test(source[end])) end++;
      const word = source.slice(i, end);
      const next = source[end];
      if ((next === '"' || next === "'") && STRING_PREFIXES.has(word.toLowerCase())) {
        const span: LexicalSpan = { kind: "string", start: i, end: stringEnd(source, end) };
        spans.push(span);
        tracker.string(span);
        i = span.end;
        continue;
      }
      tracker.word(word);
      i = end;
      continue;
    }

    if (/\s/.test(ch)) {
      i++;
      continue;
    }

    if (OPENERS.includes(ch)) depth++;
    else if (CLOSERS.includes(ch)) depth = Math.max(0, depth - 1);
    tracker.symbol(ch);
    i++;
  }

  tracker.endLogicalLine();
  return spans;
}

// ---------------------------------------------------------------------------
// Stripping
// ---------------------------------------------------------------------------

function lineStartOf(source: string, index: number): number {
  return index <= 0 ? 0 : source.lastIndexOf("\n", index - 1) + 1;
}

function isDirective(source: string, span: LexicalSpan): boolean {
  if (span.start === 0 && source.startsWith("#!")) return true;
  const lineStart = lineStartOf(source, span.start);
  const onFirstTwoLines = lineStart === 0 || lineStartOf(source, lineStart - 1) === 0;
  return onFirstTwoLines && ENCODING_DECLARATION.test(source.slice(lineStart, span.end));
}

function removalFor(source: string, span: LexicalSpan, preserveBlankLines: boolean): TextEdit {
  const lineStart = lineStartOf(source, span.start);
  const before = source.slice(lineStart, span.start);

  if (before.trim() === "") {
    if (preserveBlankLines) return { start: lineStart, end: span.end, text: "" };
    // Comment-only line: drop it with its terminator
    let end = span.end;
    if (source[end] === "\r") end++;
    if (source[end] === "\n") end++;
    return { start: lineStart, end, text: "" };
  }

  // Trailing comment: drop it and the whitespace before it, keep the code
  const padding = before.length - before.trimEnd().length;
  return { start: span.start - padding, end: span.end, text: "" };
}

/**
 * Delete every comment from `source`. String literals and docstrings are
 * preserved verbatim; code before a trailing comment keeps its line
 * terminator.
 */
export function stripComments(source: string, options: CommentStripOptions = {}): StripResult {
  const keepPatterns = options.keepPatterns ?? [];
  const removed: LexicalSpan[] = [];
  const edits: TextEdit[] = [];

  for (const span of scanSource(source)) {
    if (span.kind !== "comment") continue;
    const text = source.slice(span.start, span.end);
    if (options.preserveDirectives && isDirective(source, span)) continue;
    if (keepPatterns.some((pattern) => pattern.test(text))) continue;

    removed.push(span);
    edits.push(removalFor(source, span, options.preserveBlankLines ?? false));
  }

  return { text: applyEdits(source, edits), removed };
}
