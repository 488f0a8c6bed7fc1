/**
 * Statement rewriter.
 *
 * Walks every block depth-first and drops expression statements that are
 * nothing but a call to a target name. Calls nested inside other statements
 * (assignments, conditions, arguments) are never touched. Each construct is
 * handed to the empty-block resolver as soon as its clauses are done, so the
 * parent block sees the resolved result.
 */

import { assertNever, type Block, type Clause, type Construct, type SourceTree, type Statement } from "../parser/source-tree.js";
import { matchesTarget, type TargetNameSet } from "./call-matcher.js";
import { resolveConstruct, type EmptyBlockPolicy, type ResolutionStats } from "./empty-block-resolver.js";

export interface RewriteStats extends ResolutionStats {
  callsRemoved: number;
}

export interface RewriteResult {
  tree: SourceTree;
  stats: RewriteStats;
}

function withClauses<T extends Construct>(construct: T, clauses: Clause[]): T {
  return { ...construct, clauses };
}

class StatementRewriter {
  readonly stats: RewriteStats = {
    callsRemoved: 0,
    placeholdersInserted: 0,
    constructsRemoved: 0,
    clausesRemoved: 0,
    emptyBlocksKept: 0,
  };

  constructor(
    private readonly targets: TargetNameSet,
    private readonly policy: EmptyBlockPolicy,
  ) {}

  block(block: Block): Block {
    const statements: Statement[] = [];
    const excised = [...block.excised];

    for (const statement of block.statements) {
      const rewritten = this.statement(statement);
      if (rewritten) statements.push(rewritten);
      else excised.push(statement.span);
    }

    const removedAny = excised.length > block.excised.length;
    return { span: block.span, statements, excised, emptied: removedAny && statements.length === 0 };
  }

  /** Returns the statement to keep, or null when it is removed. */
  private statement(statement: Statement): Statement | null {
    switch (statement.kind) {
      case "expression":
        if (matchesTarget(statement.expression, this.targets)) {
          this.stats.callsRemoved++;
          return null;
        }
        return statement;
      case "if":
      case "for":
      case "while":
      case "try":
      case "with":
      case "match":
      case "function":
      case "class":
        return this.construct(statement);
      case "placeholder":
      case "opaque":
        return statement;
      default:
        return assertNever(statement);
    }
  }

  private construct<T extends Construct>(construct: T): T | null {
    const clauses = construct.clauses.map((clause) => ({ ...clause, body: this.block(clause.body) }));
    return resolveConstruct(withClauses(construct, clauses), this.policy, this.stats);
  }
}

/**
 * Remove matched call statements from `tree` and resolve emptied blocks.
 * The input tree is left untouched. The module body itself may end up empty.
 */
export function rewriteTree(tree: SourceTree, targets: TargetNameSet, policy: EmptyBlockPolicy): RewriteResult {
  const rewriter = new StatementRewriter(targets, policy);
  if (targets.size === 0) return { tree, stats: rewriter.stats };
  const body = rewriter.block(tree.body);
  return { tree: { source: tree.source, body }, stats: rewriter.stats };
}
