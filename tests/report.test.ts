/**
 * Tests for report rendering and CI gating.
 */

import { FileAnalysisResult } from "../src/analysis/orchestration";
import { Finding } from "../src/analysis/detectors";
import {
  flattenFindings,
  formatJsonReport,
  formatTextReport,
  hasFindingsAtOrAbove,
  subjectOf,
  summarize,
} from "../src/report";

const longMethod: Finding = {
  smellType: "LONG_METHOD",
  severity: "high",
  location: { line: 12, column: 5 },
  subjectName: "render",
  className: "Page",
  message: "Function is 130 lines long (threshold: 50)",
  details: { line_count: 130, threshold: 50, high_above: 100 },
};

const wideFunction: Finding = {
  smellType: "TOO_MANY_PARAMETERS",
  severity: "medium",
  location: { line: 1, column: 1 },
  subjectName: "configure",
  message: "Function has 6 parameters (threshold: 5)",
  details: { param_count: 6, threshold: 5, high_above: 7 },
};

function fileResult(filePath: string, findings: Finding[]): FileAnalysisResult {
  return { filePath, parseSuccess: true, findings, suppressedCount: 0, analysisTimeMs: 1 };
}

const results = [
  fileResult("app/page.py", [longMethod, wideFunction]),
  fileResult("app/empty.py", []),
  fileResult("app/setup.py", [wideFunction]),
];

describe("summarize", () => {
  it("should count findings by severity and smell type", () => {
    expect(summarize(results)).toEqual({
      filesWithFindings: 2,
      totalFindings: 3,
      bySeverity: { low: 0, medium: 2, high: 1 },
      bySmellType: { LONG_METHOD: 1, TOO_MANY_PARAMETERS: 2 },
    });
  });
});

describe("subjectOf", () => {
  it("should qualify methods with their class", () => {
    expect(subjectOf(longMethod)).toBe("Page.render");
    expect(subjectOf(wideFunction)).toBe("configure");
  });
});

describe("formatTextReport", () => {
  const lines = formatTextReport(results).split("\n");

  it("should start with a summary header", () => {
    expect(lines.slice(0, 6)).toEqual([
      "=".repeat(80),
      "CODE SMELL DETECTION REPORT",
      "=".repeat(80),
      "Files with findings: 2",
      "Total code smells found: 3",
      "=".repeat(80),
    ]);
  });

  it("should list each finding under its file", () => {
    const start = lines.indexOf("📄 File: app/page.py");
    expect(lines.slice(start, start + 8)).toEqual([
      "📄 File: app/page.py",
      "   Found 2 smell(s)",
      "",
      "   🔴 LONG_METHOD [high]",
      "      Function: Page.render",
      "      Location: Line 12, Column 5",
      "      Message: Function is 130 lines long (threshold: 50)",
      "",
    ]);
  });

  it("should leave out files without findings", () => {
    expect(lines).not.toContain("📄 File: app/empty.py");
    expect(lines).toContain("   🟡 TOO_MANY_PARAMETERS [medium]");
  });
});

describe("formatJsonReport", () => {
  it("should emit a flat list tagged with file paths", () => {
    const parsed: unknown = JSON.parse(formatJsonReport(results));

    expect(parsed).toEqual(flattenFindings(results));
    expect(flattenFindings(results).map((f) => `${f.file}:${f.subjectName}`)).toEqual([
      "app/page.py:render",
      "app/page.py:configure",
      "app/setup.py:configure",
    ]);
  });
});

describe("hasFindingsAtOrAbove", () => {
  it("should gate on the minimum severity", () => {
    expect(hasFindingsAtOrAbove(results, "high")).toBe(true);
    expect(hasFindingsAtOrAbove([fileResult("a.py", [wideFunction])], "high")).toBe(false);
    expect(hasFindingsAtOrAbove([fileResult("a.py", [wideFunction])], "medium")).toBe(true);
    expect(hasFindingsAtOrAbove([], "low")).toBe(false);
  });
});
