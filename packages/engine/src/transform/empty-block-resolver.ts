/**
 * Empty-block resolver.
 *
 * Runs on a construct right after the rewriter has processed its clauses and
 * decides what happens to each clause whose block the removal emptied:
 *
 *   pass    one placeholder `pass` goes into every emptied block
 *   remove  the construct disappears once all of its clauses are empty;
 *           otherwise removable clauses are dropped and the rest get a
 *           placeholder (see `isDroppable`)
 *   keep    emptied blocks are left as they are (output may not parse)
 *
 * A construct removed here is excised from the parent block by the rewriter,
 * which may empty that block in turn. That is the cascade: it stops at the
 * first block that keeps a statement, or at the module body.
 */

import { ConfigurationError } from "../errors.js";
import { assertNever, type Clause, type Construct, type Statement } from "../parser/source-tree.js";

export const EMPTY_BLOCK_POLICIES = ["pass", "remove", "keep"] as const;
export type EmptyBlockPolicy = (typeof EMPTY_BLOCK_POLICIES)[number];

export interface ResolutionStats {
  placeholdersInserted: number;
  constructsRemoved: number;
  clausesRemoved: number;
  emptyBlocksKept: number;
}

export function isEmptyBlockPolicy(raw: string): raw is EmptyBlockPolicy {
  return EMPTY_BLOCK_POLICIES.some((policy) => policy === raw);
}

export function parseEmptyBlockPolicy(raw: string): EmptyBlockPolicy {
  if (isEmptyBlockPolicy(raw)) return raw;
  throw new ConfigurationError(
    `Unknown empty-block policy '${raw}' (expected one of: ${EMPTY_BLOCK_POLICIES.join(", ")})`,
  );
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function withPlaceholder(clause: Clause, stats: ResolutionStats): Clause {
  const [anchor, ...rest] = clause.body.excised;
  if (!anchor) return clause;

  stats.placeholdersInserted++;
  const placeholder: Statement = { kind: "placeholder", span: anchor };
  return {
    ...clause,
    body: { ...clause.body, statements: [placeholder], excised: rest, emptied: false },
  };
}

/**
 * Whether an emptied clause can go without changing which code runs.
 * `trailing` is true when every clause after this one is being dropped.
 */
function isDroppable(clause: Clause, trailing: boolean, hasHandler: boolean): boolean {
  switch (clause.role) {
    case "else":
      return true;
    case "elif":
      return trailing;
    case "finally":
      // `try` needs at least one `except` or a `finally`
      return hasHandler;
    case "primary":
    case "except":
    case "case":
      // dropping a `case` would let its subject fall through to later cases
      return false;
    default:
      return assertNever(clause.role);
  }
}

function isDefinition(construct: Construct): boolean {
  return construct.kind === "function" || construct.kind === "class";
}

function removeEmptied<T extends Construct>(construct: T, stats: ResolutionStats): T | null {
  const allEmpty = construct.clauses.every((clause) => clause.body.statements.length === 0);
  if (allEmpty && !isDefinition(construct)) {
    stats.constructsRemoved++;
    return null;
  }

  const hasHandler = construct.clauses.some((clause) => clause.role === "except");
  const kept: Clause[] = [];
  const dropped = [...construct.droppedClauses];
  let trailing = true;

  for (let i = construct.clauses.length - 1; i >= 0; i--) {
    const clause = construct.clauses[i];
    if (!clause.body.emptied) {
      trailing = false;
      kept.unshift(clause);
    } else if (isDroppable(clause, trailing, hasHandler)) {
      dropped.push(clause.span);
      stats.clausesRemoved++;
    } else {
      trailing = false;
      kept.unshift(withPlaceholder(clause, stats));
    }
  }

  dropped.sort((a, b) => a.start - b.start);
  return { ...construct, clauses: kept, droppedClauses: dropped };
}

// ---------------------------------------------------------------------------
// Resolver
// ---------------------------------------------------------------------------

/**
 * Apply `policy` to the emptied clauses of `construct`.
 * Returns the construct to keep, or null when it must be removed.
 */
export function resolveConstruct<T extends Construct>(
  construct: T,
  policy: EmptyBlockPolicy,
  stats: ResolutionStats,
): T | null {
  const emptied = construct.clauses.filter((clause) => clause.body.emptied).length;
  if (emptied === 0) return construct;

  switch (policy) {
    case "keep":
      stats.emptyBlocksKept += emptied;
      return construct;
    case "pass":
      return {
        ...construct,
        clauses: construct.clauses.map((clause) => (clause.body.emptied ? withPlaceholder(clause, stats) : clause)),
      };
    case "remove":
      return removeEmptied(construct, stats);
    default:
      return assertNever(policy);
  }
}
