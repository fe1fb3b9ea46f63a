/**
 * Threshold detectors: measure one metric, compare it to a threshold and
 * rank the overshoot.
 */

import { SyntaxNode } from "../ast/types";
import { nameOf } from "../ast/query";
import { RequiredDetectorConfig } from "../rules";
import { Detector, DetectorContext, Finding, FindingLocation, Severity } from "./types";

export interface ThresholdDetectorDefinition {
  id: string;
  defaults: RequiredDetectorConfig;
  /** Key of the measured value in Finding.details */
  metricKey: string;
  measure(definition: SyntaxNode, context: DetectorContext): number;
  describe(value: number, threshold: number): string;
}

/**
 * Medium up to and including the ceiling, high above it.
 */
export function classifySeverity(value: number, highAbove: number): Severity {
  return value > highAbove ? "high" : "medium";
}

export function locationOf(node: SyntaxNode): FindingLocation {
  return {
    line: node.startPosition.row + 1,
    column: node.startPosition.column + 1,
  };
}

export function createThresholdDetector(definition: ThresholdDetectorDefinition): Detector {
  return {
    id: definition.id,
    defaults: definition.defaults,

    detect(node: SyntaxNode, context: DetectorContext): Finding | null {
      const { threshold, high_above } = context.settings;
      const value = definition.measure(node, context);

      if (value <= threshold) {
        return null;
      }

      return {
        smellType: definition.id,
        severity: classifySeverity(value, high_above),
        location: locationOf(node),
        subjectName: nameOf(node),
        message: definition.describe(value, threshold),
        details: {
          [definition.metricKey]: value,
          threshold,
          high_above,
        },
      };
    },
  };
}
