/**
 * Built-in smell detectors.
 *
 * Registration order is the order findings for one definition are reported in.
 */

import { SyntaxNode } from "../ast/types";
import { lineSpan, maxNestingDepth, NestingOptions, parameterCount } from "../metrics";
import { DEFAULT_DETECTOR_CONFIG, DetectorConfig, mergeDetectorConfig } from "../rules";
import { createThresholdDetector } from "./threshold";
import { Detector, Finding } from "./types";

export { Detector, DetectorContext, Finding, FindingLocation, Severity, SEVERITY_ORDER } from "./types";
export { createThresholdDetector, classifySeverity, locationOf, ThresholdDetectorDefinition } from "./threshold";

export const longMethodDetector = createThresholdDetector({
  id: "LONG_METHOD",
  defaults: DEFAULT_DETECTOR_CONFIG.LONG_METHOD,
  metricKey: "line_count",
  measure: (node) => lineSpan(node),
  describe: (value, threshold) => `Function is ${value} lines long (threshold: ${threshold})`,
});

export const tooManyParametersDetector = createThresholdDetector({
  id: "TOO_MANY_PARAMETERS",
  defaults: DEFAULT_DETECTOR_CONFIG.TOO_MANY_PARAMETERS,
  metricKey: "param_count",
  measure: (node) => parameterCount(node),
  describe: (value, threshold) => `Function has ${value} parameters (threshold: ${threshold})`,
});

export const deepNestingDetector = createThresholdDetector({
  id: "DEEP_NESTING",
  defaults: DEFAULT_DETECTOR_CONFIG.DEEP_NESTING,
  metricKey: "nesting_depth",
  measure: (node, context) => maxNestingDepth(node, context.nesting),
  describe: (value, threshold) => `Function has nesting depth of ${value} (threshold: ${threshold})`,
});

export const DEFAULT_DETECTORS: readonly Detector[] = [
  longMethodDetector,
  tooManyParametersDetector,
  deepNestingDetector,
];

function runDetector(
  detector: Detector,
  node: SyntaxNode,
  overrides: DetectorConfig,
  nesting: NestingOptions = {}
): Finding | null {
  const settings = mergeDetectorConfig(detector.defaults, overrides, detector.id);
  return detector.detect(node, { settings, nesting });
}

/**
 * Report a function longer than threshold lines.
 */
export function detectLongMethod(
  node: SyntaxNode,
  threshold = DEFAULT_DETECTOR_CONFIG.LONG_METHOD.threshold,
  highAbove?: number
): Finding | null {
  return runDetector(longMethodDetector, node, { threshold, high_above: highAbove });
}

/**
 * Report a function with more than threshold parameters.
 */
export function detectTooManyParameters(
  node: SyntaxNode,
  threshold = DEFAULT_DETECTOR_CONFIG.TOO_MANY_PARAMETERS.threshold,
  highAbove?: number
): Finding | null {
  return runDetector(tooManyParametersDetector, node, { threshold, high_above: highAbove });
}

/**
 * Report a function whose control structures nest deeper than threshold.
 */
export function detectDeepNesting(
  node: SyntaxNode,
  threshold = DEFAULT_DETECTOR_CONFIG.DEEP_NESTING.threshold,
  highAbove?: number,
  nesting: NestingOptions = {}
): Finding | null {
  return runDetector(deepNestingDetector, node, { threshold, high_above: highAbove }, nesting);
}
