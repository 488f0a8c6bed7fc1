/**
 * Python parser adapter.
 *
 * Uses web-tree-sitter (WASM) with the Python grammar shipped by
 * tree-sitter-wasms, and lowers the concrete syntax tree into the
 * `SourceTree` model. Only the statement kinds the transform cares about get
 * their own variant; everything else is carried as an opaque span.
 */

import path from "node:path";
import { createRequire } from "node:module";
import Parser from "web-tree-sitter";
import { ParseError } from "../errors.js";
import { logger } from "../logger.js";
import type {
  Block,
  Clause,
  ClauseRole,
  Expression,
  SourceTree,
  Span,
  Statement,
} from "./source-tree.js";

// Use createRequire to resolve the WASM grammar from tree-sitter-wasms
const require = createRequire(import.meta.url);

// `Parser.init()` replaces the CommonJS module exports, which some ESM
// loaders reflect in the default binding; keep the class itself.
const TreeSitter = Parser;

type SyntaxNode = Parser.SyntaxNode;

const PYTHON_WASM = "tree-sitter-python.wasm";

/** Extras that can appear among a block's named children. */
const NON_STATEMENT_TYPES = new Set(["comment", "line_continuation"]);

/** Python 2 statement forms the grammar still accepts. */
const PYTHON2_STATEMENTS = new Set(["print_statement", "exec_statement"]);

const CLAUSE_ROLES = new Map<string, ClauseRole>([
  ["elif_clause", "elif"],
  ["else_clause", "else"],
  ["except_clause", "except"],
  ["except_group_clause", "except"],
  ["finally_clause", "finally"],
]);

// ---------------------------------------------------------------------------
// Grammar loading
// ---------------------------------------------------------------------------

let languagePromise: Promise<Parser.Language> | null = null;

function loadPythonLanguage(): Promise<Parser.Language> {
  if (!languagePromise) {
    languagePromise = (async () => {
      await TreeSitter.init();
      const wasmPackagePath = require.resolve("tree-sitter-wasms/package.json");
      const wasmPath = path.join(path.dirname(wasmPackagePath), "out", PYTHON_WASM);
      logger.debug(`Loading Python grammar from ${wasmPath}`);
      return TreeSitter.Language.load(wasmPath);
    })().catch((err: unknown) => {
      languagePromise = null;
      throw err;
    });
  }
  return languagePromise;
}

// ---------------------------------------------------------------------------
// Tree lowering
// ---------------------------------------------------------------------------

class TreeBuilder {
  constructor(private readonly source: string) {}

  /** Node span with trailing whitespace trimmed off. */
  span(node: SyntaxNode): Span {
    return this.range(node.startIndex, node.endIndex);
  }

  range(start: number, end: number): Span {
    let trimmed = end;
    while (trimmed > start && /\s/.test(this.source[trimmed - 1])) trimmed--;
    return { start, end: trimmed };
  }

  block(node: SyntaxNode): Block {
    return {
      span: this.span(node),
      statements: node.namedChildren
        .filter((child) => !NON_STATEMENT_TYPES.has(child.type))
        .map((child) => this.statement(child)),
      excised: [],
      emptied: false,
    };
  }

  statement(node: SyntaxNode): Statement {
    switch (node.type) {
      case "expression_statement":
        return { kind: "expression", span: this.span(node), expression: this.statementExpression(node) };
      case "if_statement":
        return this.construct(node, "consequence", (clauses) => ({ kind: "if", ...clauses }));
      case "for_statement":
        return this.construct(node, "body", (clauses) => ({ kind: "for", ...clauses }));
      case "while_statement":
        return this.construct(node, "body", (clauses) => ({ kind: "while", ...clauses }));
      case "try_statement":
        return this.construct(node, "body", (clauses) => ({ kind: "try", ...clauses }));
      case "with_statement":
        return this.construct(node, "body", (clauses) => ({ kind: "with", ...clauses }));
      case "match_statement":
        return this.match(node);
      case "function_definition":
      case "class_definition":
        return this.definition(node, node);
      case "decorated_definition": {
        const definition = node.childForFieldName("definition");
        if (!definition) return this.opaque(node);
        return this.definition(definition, node);
      }
      default:
        return this.opaque(node);
    }
  }

  private opaque(node: SyntaxNode): Statement {
    return { kind: "opaque", span: this.span(node), type: node.type };
  }

  private definition(node: SyntaxNode, outer: SyntaxNode): Statement {
    const name = node.childForFieldName("name")?.text ?? "";
    if (node.type === "function_definition") {
      return this.construct(node, "body", (clauses) => ({ kind: "function", name, ...clauses }), outer);
    }
    if (node.type === "class_definition") {
      return this.construct(node, "body", (clauses) => ({ kind: "class", name, ...clauses }), outer);
    }
    return this.opaque(outer);
  }

  /**
   * Collect the primary clause (keyword through its body) and every trailing
   * `elif` / `else` / `except` / `finally` clause of a compound statement.
   */
  private construct(
    node: SyntaxNode,
    bodyField: "body" | "consequence",
    make: (parts: { span: Span; clauses: Clause[]; droppedClauses: Span[] }) => Statement,
    outer: SyntaxNode = node,
  ): Statement {
    const body = node.childForFieldName(bodyField);
    if (!body) return this.opaque(outer);

    const clauses: Clause[] = [
      { role: "primary", span: this.range(outer.startIndex, body.endIndex), body: this.block(body) },
    ];

    for (const child of node.namedChildren) {
      const role = CLAUSE_ROLES.get(child.type);
      if (!role) continue;
      const suite = suiteOf(child);
      if (!suite) return this.opaque(outer);
      clauses.push({ role, span: this.span(child), body: this.block(suite) });
    }

    return make({ span: this.span(outer), clauses, droppedClauses: [] });
  }

  /** `match` has no body of its own, only `case` clauses. */
  private match(node: SyntaxNode): Statement {
    const container = node.childForFieldName("body") ?? node;
    const clauses: Clause[] = [];

    for (const child of container.namedChildren) {
      if (child.type !== "case_clause") continue;
      const suite = suiteOf(child);
      if (!suite) return this.opaque(node);
      clauses.push({ role: "case", span: this.span(child), body: this.block(suite) });
    }

    if (clauses.length === 0) return this.opaque(node);
    return { kind: "match", span: this.span(node), clauses, droppedClauses: [] };
  }

  private statementExpression(node: SyntaxNode): Expression {
    const children = node.namedChildren.filter((child) => !NON_STATEMENT_TYPES.has(child.type));
    // `a(), b()` is a tuple, `x = f()` an assignment: neither is a bare call
    if (children.length !== 1) return { kind: "other", span: this.span(node) };
    return this.expression(children[0]);
  }

  expression(node: SyntaxNode): Expression {
    const span = this.span(node);
    switch (node.type) {
      case "call": {
        const callee = node.childForFieldName("function");
        const args = node.childForFieldName("arguments");
        if (!callee || !args) return { kind: "other", span };
        return { kind: "call", span, callee: this.expression(callee), argumentsSpan: this.span(args) };
      }
      case "identifier":
        return { kind: "name", span, id: node.text };
      case "attribute": {
        const object = node.childForFieldName("object");
        const attribute = node.childForFieldName("attribute");
        if (!object || !attribute) return { kind: "other", span };
        return { kind: "attribute", span, object: this.expression(object), attribute: attribute.text };
      }
      case "parenthesized_expression": {
        // `(print)(x)` calls `print`
        const inner = node.namedChildren.filter((child) => !NON_STATEMENT_TYPES.has(child.type));
        if (inner.length !== 1) return { kind: "other", span };
        return this.expression(inner[0]);
      }
      default:
        return { kind: "other", span };
    }
  }
}

function suiteOf(clause: SyntaxNode): SyntaxNode | null {
  return (
    clause.childForFieldName("body") ??
    clause.childForFieldName("consequence") ??
    clause.namedChildren.find((child) => child.type === "block") ??
    null
  );
}

function errorAt(node: SyntaxNode, message: string): ParseError {
  return new ParseError(message, node.startPosition.row + 1, node.startPosition.column + 1);
}

/**
 * First syntax error in document order, if any. Besides ERROR and MISSING
 * nodes this covers what the grammar recovers from silently: a suite with
 * no statements, and Python 2 `print` / `exec` statements.
 */
function findSyntaxError(node: SyntaxNode): ParseError | null {
  if (node.type === "ERROR") return errorAt(node, "Invalid syntax");
  if (node.isMissing()) return errorAt(node, `Missing ${node.type}`);
  if (PYTHON2_STATEMENTS.has(node.type)) return errorAt(node, "Invalid syntax");
  if (node.type === "block" && !node.namedChildren.some((child) => !NON_STATEMENT_TYPES.has(child.type))) {
    return errorAt(node, "Expected an indented block");
  }

  for (const child of node.children) {
    const found = findSyntaxError(child);
    if (found) return found;
  }
  return node.hasError() ? errorAt(node, "Invalid syntax") : null;
}

// ---------------------------------------------------------------------------
// Parser
// ---------------------------------------------------------------------------

export class PythonParser {
  private constructor(private readonly parser: Parser) {}

  /** Load the grammar (once per process) and create a parser. */
  static async create(): Promise<PythonParser> {
    const language = await loadPythonLanguage();
    const parser = new TreeSitter();
    parser.setLanguage(language);
    return new PythonParser(parser);
  }

  /**
   * Parse Python source into a `SourceTree`.
   * Throws `ParseError` on the first syntax error.
   */
  parse(source: string): SourceTree {
    const tree = this.parser.parse(source);
    try {
      const error = findSyntaxError(tree.rootNode);
      if (error) throw error;
      return { source, body: new TreeBuilder(source).block(tree.rootNode) };
    } finally {
      tree.delete();
    }
  }

  /** Returns the first syntax error in `source`, or null when it parses cleanly. */
  check(source: string): ParseError | null {
    const tree = this.parser.parse(source);
    try {
      return findSyntaxError(tree.rootNode);
    } finally {
      tree.delete();
    }
  }

  /** Lower a single expression for tests and tooling. */
  parseExpression(source: string): Expression {
    const statement = this.parse(source).body.statements[0];
    if (statement?.kind !== "expression") {
      throw new ParseError("Not an expression statement", 1, 1);
    }
    return statement.expression;
  }
}
