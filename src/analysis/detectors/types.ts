/**
 * Types for the smell detectors.
 */

import { SyntaxNode } from "../ast/types";
import { NestingOptions } from "../metrics";
import { RequiredDetectorConfig } from "../rules";

/**
 * "low" is part of the taxonomy but not produced by the built-in detectors.
 */
export type Severity = "low" | "medium" | "high";

export const SEVERITY_ORDER: Record<Severity, number> = {
  low: 1,
  medium: 2,
  high: 3,
};

/**
 * Start of the violating definition, both 1-based.
 */
export interface FindingLocation {
  readonly line: number;
  readonly column: number;
}

export interface Finding {
  /** Id of the detector that produced the finding, e.g. "LONG_METHOD" */
  readonly smellType: string;
  readonly severity: Severity;
  readonly location: FindingLocation;
  /** Function or method name, "unknown" when unresolvable */
  readonly subjectName: string;
  /** Enclosing class, set for methods declared directly in a class body */
  readonly className?: string;
  readonly message: string;
  /** Measured metric, threshold and high_above ceiling */
  readonly details: Readonly<Record<string, number>>;
}

/**
 * Settings a detector runs with.
 */
export interface DetectorContext {
  settings: RequiredDetectorConfig;
  nesting: NestingOptions;
}

/**
 * A policy unit mapping one definition node to zero or one finding.
 * Detectors must not keep state between calls.
 */
export interface Detector {
  readonly id: string;
  readonly defaults: RequiredDetectorConfig;
  detect(definition: SyntaxNode, context: DetectorContext): Finding | null;
}
