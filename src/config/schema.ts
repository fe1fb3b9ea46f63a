/**
 * Configuration schema types for .smellscan.yml files.
 *
 * A config file placed in the analyzed root customizes detector thresholds,
 * nesting semantics and which files are analyzed.
 */

import { DetectorConfig, SmellType } from "../analysis/rules";
import { NestedDefinitionMode } from "../analysis/metrics";

/**
 * Nesting-depth configuration options.
 */
export interface SmellScanNestingConfig {
  /**
   * Whether nested function and class bodies count toward the enclosing
   * function's depth ("accumulate") or are skipped ("isolate").
   * Default: "accumulate"
   */
  nested_definitions?: NestedDefinitionMode;
}

/**
 * File filtering configuration options.
 */
export interface SmellScanFilesConfig {
  /**
   * Glob patterns, relative to the analyzed root, for files to skip.
   * Example: ["tests/**", "**\/migrations/**"]
   */
  ignore?: string[];
}

/**
 * Detector settings that apply to files matching the patterns.
 */
export interface DetectorOverride {
  patterns: string[];
  detectors: Partial<Record<SmellType, DetectorConfig>>;
}

/**
 * Complete .smellscan.yml configuration schema.
 */
export interface SmellScanConfig {
  /**
   * Config file version. Currently only version 1 is supported.
   */
  version: number;

  /**
   * Detector settings keyed by smell type.
   */
  detectors?: Partial<Record<SmellType, DetectorConfig>>;

  nesting?: SmellScanNestingConfig;

  files?: SmellScanFilesConfig;

  /**
   * Path-specific detector settings.
   * Applied in order; later overrides take precedence.
   */
  overrides?: DetectorOverride[];
}

export interface RequiredNestingConfig {
  nested_definitions: NestedDefinitionMode;
}

export interface RequiredFilesConfig {
  ignore: string[];
}

export const SUPPORTED_CONFIG_VERSION = 1;

export const DEFAULT_NESTING_CONFIG: RequiredNestingConfig = {
  nested_definitions: "accumulate",
};

export const DEFAULT_FILES_CONFIG: RequiredFilesConfig = {
  ignore: [],
};
