/**
 * Structural model of one Python file.
 *
 * Built by the parser adapter from the tree-sitter CST and consumed by the
 * rewriter, resolver and serializer. Every node keeps the `[start, end)` span
 * it occupied in the original source; the serializer turns removals and
 * placeholders back into text edits against those spans.
 */

// ---------------------------------------------------------------------------
// Spans
// ---------------------------------------------------------------------------

export interface Span {
  start: number;
  end: number;
}

// ---------------------------------------------------------------------------
// Expressions
// ---------------------------------------------------------------------------

export interface CallExpression {
  kind: "call";
  span: Span;
  callee: Expression;
  /** Argument list span, parentheses included. Never inspected. */
  argumentsSpan: Span;
}

export interface NameExpression {
  kind: "name";
  span: Span;
  id: string;
}

export interface AttributeExpression {
  kind: "attribute";
  span: Span;
  object: Expression;
  attribute: string;
}

export interface OtherExpression {
  kind: "other";
  span: Span;
}

export type Expression =
  | CallExpression
  | NameExpression
  | AttributeExpression
  | OtherExpression;

// ---------------------------------------------------------------------------
// Blocks and clauses
// ---------------------------------------------------------------------------

export interface Block {
  span: Span;
  statements: Statement[];
  /** Spans of statements excised from this block, in source order. */
  excised: Span[];
  /** Set when removal left the block with no statements at all. */
  emptied: boolean;
}

/**
 * Role of a clause inside its construct. `primary` is the body introduced by
 * the construct's own keyword (`if`, `for`, `while`, `try`, `with`, `def`,
 * `class`). A `match` has only `case` clauses.
 */
export type ClauseRole = "primary" | "elif" | "else" | "except" | "finally" | "case";

export interface Clause {
  role: ClauseRole;
  span: Span;
  body: Block;
}

// ---------------------------------------------------------------------------
// Statements
// ---------------------------------------------------------------------------

interface ConstructBase {
  span: Span;
  clauses: Clause[];
  /** Spans of clauses dropped from this construct. */
  droppedClauses: Span[];
}

export interface ExpressionStatement {
  kind: "expression";
  span: Span;
  expression: Expression;
}

export interface IfStatement extends ConstructBase {
  kind: "if";
}

export interface ForStatement extends ConstructBase {
  kind: "for";
}

export interface WhileStatement extends ConstructBase {
  kind: "while";
}

export interface TryStatement extends ConstructBase {
  kind: "try";
}

export interface WithStatement extends ConstructBase {
  kind: "with";
}

export interface MatchStatement extends ConstructBase {
  kind: "match";
}

export interface FunctionDefinition extends ConstructBase {
  kind: "function";
  name: string;
}

export interface ClassDefinition extends ConstructBase {
  kind: "class";
  name: string;
}

/** A `pass` inserted where an emptied block needs a statement. */
export interface PlaceholderStatement {
  kind: "placeholder";
  /** Span of the removed statement the placeholder takes the place of. */
  span: Span;
}

/** Any statement kind the transform never looks inside. */
export interface OpaqueStatement {
  kind: "opaque";
  span: Span;
  type: string;
}

export type Construct =
  | IfStatement
  | ForStatement
  | WhileStatement
  | TryStatement
  | WithStatement
  | MatchStatement
  | FunctionDefinition
  | ClassDefinition;

export type Statement =
  | ExpressionStatement
  | Construct
  | PlaceholderStatement
  | OpaqueStatement;

export interface SourceTree {
  source: string;
  body: Block;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

export function assertNever(value: never): never {
  throw new Error(`Unhandled node: ${JSON.stringify(value)}`);
}
