import { describe, it, expect } from "vitest";
import { matchesTarget, namePath, parseTargetNames } from "../call-matcher.js";
import { ConfigurationError } from "../../errors.js";
import type { Expression } from "../../parser/source-tree.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const AT = { start: 0, end: 0 };

function name(id: string): Expression {
  return { kind: "name", span: AT, id };
}

function attr(object: Expression, attribute: string): Expression {
  return { kind: "attribute", span: AT, object, attribute };
}

function call(callee: Expression): Expression {
  return { kind: "call", span: AT, callee, argumentsSpan: AT };
}

function dotted(path: string): Expression {
  const [first, ...rest] = path.split(".");
  return rest.reduce<Expression>((object, attribute) => attr(object, attribute), name(first));
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe("parseTargetNames", () => {
  it("trims names and skips blanks", () => {
    expect([...parseTargetNames([" print ", "", "logging.info"])]).toEqual(["print", "logging.info"]);
  });

  it("collapses duplicates", () => {
    expect(parseTargetNames(["print", "print"]).size).toBe(1);
  });

  it("rejects an empty segment", () => {
    expect(() => parseTargetNames(["logging..info"])).toThrow(ConfigurationError);
  });

  it("rejects a segment that is not an identifier", () => {
    expect(() => parseTargetNames(["2print"])).toThrow(
      "Invalid function name '2print': segment '2print' is not an identifier",
    );
  });
});

describe("namePath", () => {
  it("returns one segment for a bare name", () => {
    expect(namePath(name("print"))).toEqual(["print"]);
  });

  it("returns the full attribute chain left to right", () => {
    expect(namePath(dotted("a.b.c"))).toEqual(["a", "b", "c"]);
  });

  it("has no path for a call result", () => {
    expect(namePath(attr(call(name("get_logger")), "info"))).toBeNull();
  });

  it("has no path for other expressions", () => {
    expect(namePath({ kind: "other", span: AT })).toBeNull();
  });
});

describe("matchesTarget", () => {
  const targets = parseTargetNames(["print", "logging.info"]);

  it("matches a bare call", () => {
    expect(matchesTarget(call(name("print")), targets)).toBe(true);
  });

  it("matches a dotted call exactly", () => {
    expect(matchesTarget(call(dotted("logging.info")), targets)).toBe(true);
  });

  it("does not match an attribute whose last segment is a target", () => {
    expect(matchesTarget(call(dotted("obj.print")), targets)).toBe(false);
    expect(matchesTarget(call(dotted("logging.print")), targets)).toBe(false);
  });

  it("does not match a prefix or suffix of a dotted target", () => {
    expect(matchesTarget(call(name("info")), targets)).toBe(false);
    expect(matchesTarget(call(dotted("root.logging.info")), targets)).toBe(false);
  });

  it("is case-sensitive", () => {
    expect(matchesTarget(call(name("Print")), targets)).toBe(false);
  });

  it("ignores expressions that are not calls", () => {
    expect(matchesTarget(name("print"), targets)).toBe(false);
  });

  it("never matches with an empty target set", () => {
    expect(matchesTarget(call(name("print")), parseTargetNames([]))).toBe(false);
  });
});
