/**
 * Inline suppression directives for smellscan.
 *
 * Directives live in comments of the analyzed source:
 * - smellscan-ignore-file ALL|SMELL_TYPE[,SMELL_TYPE...]
 * - smellscan-ignore-line ALL|SMELL_TYPE[,SMELL_TYPE...]
 * - smellscan-ignore-next-line ALL|SMELL_TYPE[,SMELL_TYPE...]
 *
 * Findings are reported on the line of the `def` keyword, so a line or
 * next-line directive has to sit on or directly above that line.
 */

import { SmellType, isValidSmellType } from "../analysis/rules";

export type SuppressionScope = "file" | "line" | "next-line";

export interface SuppressionDirective {
  scope: SuppressionScope;
  /** True when the directive names ALL */
  allSmells: boolean;
  /** Smell types named by the directive (empty when allSmells is true) */
  smells: SmellType[];
  /** 1-based line of the directive */
  line: number;
}

/**
 * Parse all suppression directives from source code.
 */
export function parseSuppressionDirectives(source: string): SuppressionDirective[] {
  const directives: SuppressionDirective[] = [];
  const lines = source.split(/\r?\n/);

  for (let i = 0; i < lines.length; i++) {
    const lineNumber = i + 1;

    // Fresh regex per line: a shared /g regex carries lastIndex across lines
    const directiveRegex = /smellscan-ignore-(file|next-line|line)\s+([A-Z0-9_,\s]+)/gi;

    let match: RegExpExecArray | null;
    while ((match = directiveRegex.exec(lines[i])) !== null) {
      const scope = toScope(match[1].toLowerCase());
      if (!scope) continue;

      const tokens = match[2]
        .split(/[,\s]+/)
        .map((s) => s.trim())
        .filter((s) => s.length > 0);

      // ALL only counts as the first token; later words are free-form explanation
      if (tokens.length > 0 && tokens[0].toUpperCase() === "ALL") {
        directives.push({ scope, allSmells: true, smells: [], line: lineNumber });
        continue;
      }

      // Unknown ids are ignored
      const smells = tokens.filter(isValidSmellType);

      if (smells.length > 0) {
        directives.push({ scope, allSmells: false, smells, line: lineNumber });
      }
    }
  }

  return directives;
}

function toScope(value: string): SuppressionScope | null {
  switch (value) {
    case "file":
    case "line":
    case "next-line":
      return value;
    default:
      return null;
  }
}

/**
 * Check if a smell type is suppressed at a given 1-based line.
 * Ids outside the built-in set can only be suppressed with ALL.
 */
export function isSuppressed(
  smellType: string,
  line: number,
  directives: SuppressionDirective[]
): boolean {
  for (const directive of directives) {
    const matchesSmell =
      directive.allSmells || (isValidSmellType(smellType) && directive.smells.includes(smellType));
    if (!matchesSmell) {
      continue;
    }

    switch (directive.scope) {
      case "file":
        return true;

      case "line":
        if (directive.line === line) {
          return true;
        }
        break;

      case "next-line":
        if (directive.line + 1 === line) {
          return true;
        }
        break;
    }
  }

  return false;
}

/**
 * Filter findings based on suppression directives.
 */
export function filterSuppressedFindings<T extends { smellType: string; location: { line: number } }>(
  findings: T[],
  directives: SuppressionDirective[]
): T[] {
  if (directives.length === 0) {
    return findings;
  }
  return findings.filter((finding) => !isSuppressed(finding.smellType, finding.location.line, directives));
}
