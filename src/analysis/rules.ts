/**
 * Smell types and default detector settings for smellscan.
 */

import { ConfigError } from "../errors";

/**
 * Built-in smell types.
 * DO NOT rename existing IDs - only extend.
 */
export type SmellType = "LONG_METHOD" | "TOO_MANY_PARAMETERS" | "DEEP_NESTING";

/**
 * Detector settings as written in configuration. Every field is optional.
 */
export interface DetectorConfig {
  enabled?: boolean;
  /** Values strictly above this produce a finding */
  threshold?: number;
  /** Findings with values strictly above this are high severity, otherwise medium */
  high_above?: number;
}

/**
 * Complete (required) detector settings.
 */
export interface RequiredDetectorConfig {
  enabled: boolean;
  threshold: number;
  high_above: number;
}

export const DEFAULT_DETECTOR_CONFIG: Record<SmellType, RequiredDetectorConfig> = {
  LONG_METHOD: { enabled: true, threshold: 50, high_above: 100 },
  TOO_MANY_PARAMETERS: { enabled: true, threshold: 5, high_above: 7 },
  DEEP_NESTING: { enabled: true, threshold: 4, high_above: 5 },
};

/**
 * Built-in smell types in detector registration order.
 */
export const ALL_SMELL_TYPES: SmellType[] = ["LONG_METHOD", "TOO_MANY_PARAMETERS", "DEEP_NESTING"];

/**
 * Check if a string is a built-in SmellType.
 */
export function isValidSmellType(id: string): id is SmellType {
  return Object.prototype.hasOwnProperty.call(DEFAULT_DETECTOR_CONFIG, id);
}

/**
 * Check that a threshold-like value is a non-negative integer.
 */
export function isValidLimit(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value >= 0;
}

/**
 * Merge a partial detector config into a complete one, rejecting invalid limits.
 *
 * @throws ConfigError on a negative or fractional threshold or ceiling
 */
export function mergeDetectorConfig(
  base: RequiredDetectorConfig,
  override: DetectorConfig,
  label = "detector"
): RequiredDetectorConfig {
  const merged: RequiredDetectorConfig = {
    enabled: override.enabled ?? base.enabled,
    threshold: override.threshold ?? base.threshold,
    high_above: override.high_above ?? base.high_above,
  };

  if (!isValidLimit(merged.threshold)) {
    throw new ConfigError(`${label}.threshold must be a non-negative integer (got ${merged.threshold})`);
  }
  if (!isValidLimit(merged.high_above)) {
    throw new ConfigError(`${label}.high_above must be a non-negative integer (got ${merged.high_above})`);
  }

  return merged;
}
