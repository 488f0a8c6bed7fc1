import { describe, it, expect } from "vitest";
import { scanSource, stripComments } from "../comment-stripper.js";

function kinds(source: string): string[] {
  return scanSource(source).map((span) => `${span.kind}:${source.slice(span.start, span.end)}`);
}

describe("scanSource", () => {
  it("classifies module and function docstrings apart from other strings", () => {
    const source = [
      '"""Module doc."""',
      "def f():",
      '    """Func doc."""',
      '    return "s"',
      "",
    ].join("\n");

    expect(kinds(source)).toEqual([
      'docstring:"""Module doc."""',
      'docstring:"""Func doc."""',
      'string:"s"',
    ]);
  });

  it("treats a string that is not first in its body as a plain string", () => {
    const source = 'x = 1\n"""not a docstring"""\n';
    expect(kinds(source)).toEqual(['string:"""not a docstring"""']);
  });

  it("recognises a class docstring after a base list", () => {
    const source = "class A(Base):\n    'doc'\n";
    expect(kinds(source)).toEqual(["docstring:'doc'"]);
  });

  it("does not mistake an expression starting with a string for a docstring", () => {
    const source = 'def f():\n    "a".join(x)\n';
    expect(kinds(source)).toEqual(['string:"a"']);
  });

  it("keeps a # inside any string out of the comments", () => {
    const source = "a = '#x'\nb = r\"#y\"\nc = f'{a}#z'  # real\n";
    expect(kinds(source)).toEqual(["string:'#x'", 'string:r"#y"', "string:f'{a}#z'", "comment:# real"]);
  });
});

describe("stripComments", () => {
  it("removes a trailing comment and the whitespace before it", () => {
    expect(stripComments("x = 1  # set x\n").text).toBe("x = 1\n");
  });

  it("removes a comment-only line with its terminator", () => {
    expect(stripComments("# header\nx = 1\n").text).toBe("x = 1\n");
  });

  it("removes an indented comment-only line", () => {
    expect(stripComments("def f():\n    # later\n    return 1\n").text).toBe("def f():\n    return 1\n");
  });

  it("removes a final comment with no line terminator", () => {
    expect(stripComments("x = 1\n# end").text).toBe("x = 1\n");
  });

  it("keeps CRLF line endings", () => {
    expect(stripComments("x = 1 # c\r\n# d\r\ny = 2\r\n").text).toBe("x = 1\r\ny = 2\r\n");
  });

  it("leaves strings that contain # untouched", () => {
    const source = 's = "# not a comment"  # real\n';
    expect(stripComments(source).text).toBe('s = "# not a comment"\n');
  });

  it("leaves triple-quoted text untouched", () => {
    const source = 'x = """\n# inside\n"""\n';
    const result = stripComments(source);
    expect(result.text).toBe(source);
    expect(result.removed).toEqual([]);
  });

  it("follows an escaped newline inside a string", () => {
    const source = 's = "a\\\n# b"\n';
    expect(stripComments(source).text).toBe(source);
  });

  it("preserves docstrings", () => {
    const source = 'def f():\n    """Doc # with hash."""  # drop\n    return 1\n';
    expect(stripComments(source).text).toBe('def f():\n    """Doc # with hash."""\n    return 1\n');
  });

  it("reports removed comment spans", () => {
    const source = "a = 1  # one\n# two\n";
    expect(stripComments(source).removed).toEqual([
      { kind: "comment", start: 7, end: 12 },
      { kind: "comment", start: 13, end: 18 },
    ]);
  });

  describe("options", () => {
    it("leaves a blank line for each comment-only line with preserveBlankLines", () => {
      expect(stripComments("# header\nx = 1\n", { preserveBlankLines: true }).text).toBe("\nx = 1\n");
    });

    it("keeps the shebang and encoding declaration with preserveDirectives", () => {
      const source = "#!/usr/bin/env python\n# -*- coding: utf-8 -*-\n# note\nx = 1\n";
      expect(stripComments(source, { preserveDirectives: true }).text).toBe(
        "#!/usr/bin/env python\n# -*- coding: utf-8 -*-\nx = 1\n",
      );
    });

    it("removes directives by default", () => {
      const source = "#!/usr/bin/env python\n# -*- coding: utf-8 -*-\nx = 1\n";
      expect(stripComments(source).text).toBe("x = 1\n");
    });

    it("does not treat a coding comment on line 3 as a directive", () => {
      const source = "x = 1\ny = 2\n# coding: latin-1\n";
      expect(stripComments(source, { preserveDirectives: true }).text).toBe("x = 1\ny = 2\n");
    });

    it("keeps comments matching keepPatterns", () => {
      const result = stripComments("x = 1  # noqa: E501\ny = 2  # drop\n", { keepPatterns: [/noqa/] });
      expect(result.text).toBe("x = 1  # noqa: E501\ny = 2\n");
      expect(result.removed).toHaveLength(1);
    });
  });
});
