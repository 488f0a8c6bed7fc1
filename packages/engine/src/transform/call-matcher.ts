/**
 * Call matcher: decides whether an expression is a call to one of the
 * configured target names.
 */

import { ConfigurationError } from "../errors.js";
import { assertNever, type Expression } from "../parser/source-tree.js";

/** Dotted name paths, stored joined ("logging.info"). */
export type TargetNameSet = ReadonlySet<string>;

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

/**
 * Build a target set from names like `print` or `logging.info`.
 * Whitespace around names is ignored and blanks are skipped; a name with an
 * empty or non-identifier segment is rejected.
 */
export function parseTargetNames(names: Iterable<string>): TargetNameSet {
  const targets = new Set<string>();
  for (const raw of names) {
    const name = raw.trim();
    if (name === "") continue;
    const segments = name.split(".").map((s) => s.trim());
    const bad = segments.find((s) => !IDENTIFIER.test(s));
    if (bad !== undefined) {
      throw new ConfigurationError(`Invalid function name '${name}': segment '${bad}' is not an identifier`);
    }
    targets.add(segments.join("."));
  }
  return targets;
}

/**
 * Callee name path of an expression: `a` → ["a"], `a.b.c` → ["a", "b", "c"].
 * Subscripts, call results and other forms have no path.
 */
export function namePath(expression: Expression): string[] | null {
  switch (expression.kind) {
    case "name":
      return [expression.id];
    case "attribute": {
      const base = namePath(expression.object);
      return base ? [...base, expression.attribute] : null;
    }
    case "call":
    case "other":
      return null;
    default:
      return assertNever(expression);
  }
}

/** True when `expression` is a call whose callee path is exactly in `targets`. */
export function matchesTarget(expression: Expression, targets: TargetNameSet): boolean {
  if (expression.kind !== "call" || targets.size === 0) return false;
  const path = namePath(expression.callee);
  return path !== null && targets.has(path.join("."));
}
