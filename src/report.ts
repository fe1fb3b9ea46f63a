/**
 * Report rendering and CI gating over file analysis results.
 */

import { FileAnalysisResult } from "./analysis/orchestration";
import { Finding, SEVERITY_ORDER, Severity } from "./analysis/detectors/types";

const RULE = "=".repeat(80);

const SEVERITY_MARKERS: Record<Severity, string> = {
  low: "🟢",
  medium: "🟡",
  high: "🔴",
};

export interface ReportSummary {
  filesWithFindings: number;
  totalFindings: number;
  bySeverity: Record<Severity, number>;
  bySmellType: Record<string, number>;
}

/**
 * A finding flattened with the file it belongs to.
 */
export interface ReportedFinding extends Finding {
  file: string;
}

export function summarize(results: FileAnalysisResult[]): ReportSummary {
  const summary: ReportSummary = {
    filesWithFindings: 0,
    totalFindings: 0,
    bySeverity: { low: 0, medium: 0, high: 0 },
    bySmellType: {},
  };

  for (const result of results) {
    if (result.findings.length > 0) {
      summary.filesWithFindings++;
    }
    for (const finding of result.findings) {
      summary.totalFindings++;
      summary.bySeverity[finding.severity]++;
      summary.bySmellType[finding.smellType] = (summary.bySmellType[finding.smellType] ?? 0) + 1;
    }
  }

  return summary;
}

/**
 * Qualified subject name, e.g. "OrderService.process".
 */
export function subjectOf(finding: Finding): string {
  return finding.className ? `${finding.className}.${finding.subjectName}` : finding.subjectName;
}

/**
 * Human-readable report of all findings, grouped by file.
 */
export function formatTextReport(results: FileAnalysisResult[]): string {
  const summary = summarize(results);
  const lines: string[] = [
    RULE,
    "CODE SMELL DETECTION REPORT",
    RULE,
    `Files with findings: ${summary.filesWithFindings}`,
    `Total code smells found: ${summary.totalFindings}`,
    RULE,
  ];

  for (const result of results) {
    if (result.findings.length === 0) continue;

    lines.push("", `📄 File: ${result.filePath}`, `   Found ${result.findings.length} smell(s)`, "");

    for (const finding of result.findings) {
      lines.push(
        `   ${SEVERITY_MARKERS[finding.severity]} ${finding.smellType} [${finding.severity}]`,
        `      Function: ${subjectOf(finding)}`,
        `      Location: Line ${finding.location.line}, Column ${finding.location.column}`,
        `      Message: ${finding.message}`,
        ""
      );
    }
  }

  return lines.join("\n");
}

/**
 * Findings of all files as one flat list.
 */
export function flattenFindings(results: FileAnalysisResult[]): ReportedFinding[] {
  return results.flatMap((result) => result.findings.map((finding) => ({ file: result.filePath, ...finding })));
}

export function formatJsonReport(results: FileAnalysisResult[]): string {
  return JSON.stringify(flattenFindings(results), null, 2);
}

/**
 * CI gate: true when any finding is at or above the given severity.
 */
export function hasFindingsAtOrAbove(results: FileAnalysisResult[], severity: Severity): boolean {
  const minimum = SEVERITY_ORDER[severity];
  return results.some((result) => result.findings.some((finding) => SEVERITY_ORDER[finding.severity] >= minimum));
}
