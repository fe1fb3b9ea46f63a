/**
 * Tests for inline suppression directives.
 */

import {
  filterSuppressedFindings,
  isSuppressed,
  parseSuppressionDirectives,
} from "../src/core/suppression";

describe("parseSuppressionDirectives", () => {
  it("should parse file, line and next-line directives", () => {
    const source = [
      "# smellscan-ignore-file DEEP_NESTING",
      "# smellscan-ignore-next-line LONG_METHOD, TOO_MANY_PARAMETERS",
      "def f(a, b, c, d, e, f):  # smellscan-ignore-line ALL",
    ].join("\n");

    expect(parseSuppressionDirectives(source)).toEqual([
      { scope: "file", allSmells: false, smells: ["DEEP_NESTING"], line: 1 },
      { scope: "next-line", allSmells: false, smells: ["LONG_METHOD", "TOO_MANY_PARAMETERS"], line: 2 },
      { scope: "line", allSmells: true, smells: [], line: 3 },
    ]);
  });

  it("should ignore unknown smell types", () => {
    expect(parseSuppressionDirectives("# smellscan-ignore-line GOD_CLASS")).toEqual([]);
    expect(parseSuppressionDirectives("# smellscan-ignore-line GOD_CLASS,LONG_METHOD")).toEqual([
      { scope: "line", allSmells: false, smells: ["LONG_METHOD"], line: 1 },
    ]);
  });

  it("should accept ALL followed by an explanation", () => {
    expect(parseSuppressionDirectives("# smellscan-ignore-file ALL generated code")).toEqual([
      { scope: "file", allSmells: true, smells: [], line: 1 },
    ]);
  });

  it("should not widen to ALL when the explanation contains the word", () => {
    const directives = parseSuppressionDirectives("# smellscan-ignore-line LONG_METHOD not all callers");

    expect(directives).toEqual([{ scope: "line", allSmells: false, smells: ["LONG_METHOD"], line: 1 }]);
    expect(isSuppressed("LONG_METHOD", 1, directives)).toBe(true);
    expect(isSuppressed("TOO_MANY_PARAMETERS", 1, directives)).toBe(false);
  });

  it("should handle CRLF line endings", () => {
    const directives = parseSuppressionDirectives("x = 1\r\n# smellscan-ignore-next-line LONG_METHOD\r\ndef f(): pass");
    expect(directives.map((d) => d.line)).toEqual([2]);
  });
});

describe("isSuppressed", () => {
  const directives = parseSuppressionDirectives(
    ["# smellscan-ignore-next-line LONG_METHOD", "def f():", "    pass"].join("\n")
  );

  it("should suppress the named smell on the next line only", () => {
    expect(isSuppressed("LONG_METHOD", 2, directives)).toBe(true);
    expect(isSuppressed("LONG_METHOD", 3, directives)).toBe(false);
    expect(isSuppressed("DEEP_NESTING", 2, directives)).toBe(false);
  });

  it("should only suppress custom smell types through ALL", () => {
    const all = parseSuppressionDirectives("# smellscan-ignore-file ALL");
    expect(isSuppressed("TOO_MANY_RETURNS", 10, all)).toBe(true);
    expect(isSuppressed("TOO_MANY_RETURNS", 2, directives)).toBe(false);
  });
});

describe("filterSuppressedFindings", () => {
  it("should keep findings without matching directives", () => {
    const findings = [
      { smellType: "LONG_METHOD", location: { line: 2 } },
      { smellType: "LONG_METHOD", location: { line: 9 } },
    ];
    const directives = parseSuppressionDirectives("\n# smellscan-ignore-line LONG_METHOD");

    expect(filterSuppressedFindings(findings, directives)).toEqual([{ smellType: "LONG_METHOD", location: { line: 9 } }]);
    expect(filterSuppressedFindings(findings, [])).toBe(findings);
  });
});
