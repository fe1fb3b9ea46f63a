/**
 * Configuration loader for smellscan.
 *
 * Loads .smellscan.yml, validates it and resolves detector settings per file.
 * Invalid configuration fails fast with a ConfigError; it never falls back to
 * defaults silently.
 */

import * as fs from "fs";
import * as path from "path";
import * as yaml from "js-yaml";
import { minimatch } from "minimatch";
import {
  ALL_SMELL_TYPES,
  DEFAULT_DETECTOR_CONFIG,
  DetectorConfig,
  RequiredDetectorConfig,
  SmellType,
  isValidLimit,
  isValidSmellType,
  mergeDetectorConfig,
} from "../analysis/rules";
import { NESTED_DEFINITION_MODES, NestedDefinitionMode } from "../analysis/metrics";
import { ConfigError, errorMessage } from "../errors";
import {
  DEFAULT_FILES_CONFIG,
  DEFAULT_NESTING_CONFIG,
  DetectorOverride,
  RequiredNestingConfig,
  SUPPORTED_CONFIG_VERSION,
  SmellScanConfig,
} from "./schema";

/**
 * The loaded and resolved configuration with helper methods.
 */
export interface LoadedConfig {
  /**
   * The validated configuration (or defaults if no file was found).
   */
  raw: SmellScanConfig;

  /**
   * Check if a file should be skipped.
   * @param filePath - File path relative to the analyzed root
   */
  isFileIgnored(filePath: string): boolean;

  /**
   * Effective settings for a detector, optionally for a specific file.
   * Merges defaults -> detectors -> matching overrides in order.
   */
  getDetectorConfig(smellType: SmellType, filePath?: string): RequiredDetectorConfig;

  /**
   * Resolved nesting configuration with all defaults applied.
   */
  nesting: RequiredNestingConfig;
}

/**
 * Config file name searched for in the analyzed root.
 */
export const CONFIG_FILE_NAME = ".smellscan.yml";

const DETECTOR_CONFIG_KEYS = new Set(["enabled", "threshold", "high_above"]);

/**
 * Load configuration from a directory. A missing file yields the defaults.
 *
 * @throws ConfigError when the file exists but is invalid
 */
export function loadConfig(rootDir: string): LoadedConfig {
  const configPath = path.join(rootDir, CONFIG_FILE_NAME);

  if (!fs.existsSync(configPath)) {
    return createDefaultConfig();
  }

  let contents: string;
  try {
    contents = fs.readFileSync(configPath, "utf-8");
  } catch (error) {
    throw new ConfigError(`cannot read file: ${errorMessage(error)}`, configPath);
  }

  return loadConfigFromString(contents, configPath);
}

/**
 * Load configuration from a YAML string. Does not touch the filesystem.
 *
 * @param source - Label used in error messages
 * @throws ConfigError when the YAML is malformed or fails validation
 */
export function loadConfigFromString(yamlContent: string, source = CONFIG_FILE_NAME): LoadedConfig {
  let parsed: unknown;
  try {
    parsed = yaml.load(yamlContent);
  } catch (error) {
    throw new ConfigError(`invalid YAML: ${errorMessage(error)}`, source);
  }

  return buildLoadedConfig(validateConfig(parsed, source));
}

/**
 * Create a default LoadedConfig without any file.
 */
export function createDefaultConfig(): LoadedConfig {
  return buildLoadedConfig({
    version: SUPPORTED_CONFIG_VERSION,
    detectors: {},
    nesting: { ...DEFAULT_NESTING_CONFIG },
    files: { ignore: [...DEFAULT_FILES_CONFIG.ignore] },
    overrides: [],
  });
}

// ============================================================================
// Validation
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Validate parsed YAML into a SmellScanConfig. Unknown top-level keys are
 * ignored; everything the loader reads is checked.
 */
export function validateConfig(parsed: unknown, source = CONFIG_FILE_NAME): SmellScanConfig {
  if (parsed === undefined || parsed === null) {
    return { version: SUPPORTED_CONFIG_VERSION, detectors: {}, nesting: {}, files: {}, overrides: [] };
  }
  if (!isRecord(parsed)) {
    throw new ConfigError("top level must be a mapping", source);
  }

  const version = parsed.version ?? SUPPORTED_CONFIG_VERSION;
  if (version !== SUPPORTED_CONFIG_VERSION) {
    throw new ConfigError(
      `unsupported version ${JSON.stringify(version)} (expected ${SUPPORTED_CONFIG_VERSION})`,
      source
    );
  }

  return {
    version: SUPPORTED_CONFIG_VERSION,
    detectors: validateDetectorMap(parsed.detectors, "detectors", source),
    nesting: validateNesting(parsed.nesting, source),
    files: validateFiles(parsed.files, source),
    overrides: validateOverrides(parsed.overrides, source),
  };
}

function validateDetectorMap(
  value: unknown,
  label: string,
  source: string
): Partial<Record<SmellType, DetectorConfig>> {
  if (value === undefined || value === null) {
    return {};
  }
  if (!isRecord(value)) {
    throw new ConfigError(`${label} must be a mapping of smell types`, source);
  }

  const result: Partial<Record<SmellType, DetectorConfig>> = {};
  for (const [id, entry] of Object.entries(value)) {
    if (!isValidSmellType(id)) {
      throw new ConfigError(`${label}: unknown smell type "${id}"`, source);
    }
    result[id] = validateDetectorConfig(entry, `${label}.${id}`, source);
  }
  return result;
}

function validateDetectorConfig(value: unknown, label: string, source: string): DetectorConfig {
  if (value === undefined || value === null) {
    return {};
  }
  if (!isRecord(value)) {
    throw new ConfigError(`${label} must be a mapping`, source);
  }

  for (const key of Object.keys(value)) {
    if (!DETECTOR_CONFIG_KEYS.has(key)) {
      throw new ConfigError(`${label}: unknown setting "${key}"`, source);
    }
  }

  const config: DetectorConfig = {};

  if (value.enabled !== undefined) {
    if (typeof value.enabled !== "boolean") {
      throw new ConfigError(`${label}.enabled must be true or false`, source);
    }
    config.enabled = value.enabled;
  }

  for (const key of ["threshold", "high_above"] as const) {
    const limit = value[key];
    if (limit === undefined) continue;
    if (!isValidLimit(limit)) {
      throw new ConfigError(
        `${label}.${key} must be a non-negative integer (got ${JSON.stringify(limit)})`,
        source
      );
    }
    config[key] = limit;
  }

  return config;
}

function isNestedDefinitionMode(value: unknown): value is NestedDefinitionMode {
  return NESTED_DEFINITION_MODES.some((mode) => mode === value);
}

function validateNesting(value: unknown, source: string): SmellScanConfig["nesting"] {
  if (value === undefined || value === null) {
    return {};
  }
  if (!isRecord(value)) {
    throw new ConfigError("nesting must be a mapping", source);
  }

  const mode = value.nested_definitions;
  if (mode === undefined) {
    return {};
  }
  if (!isNestedDefinitionMode(mode)) {
    throw new ConfigError(
      `nesting.nested_definitions must be one of ${NESTED_DEFINITION_MODES.join(", ")} (got ${JSON.stringify(mode)})`,
      source
    );
  }
  return { nested_definitions: mode };
}

function validatePatterns(value: unknown, label: string, source: string): string[] {
  if (value === undefined || value === null) {
    return [];
  }
  if (!Array.isArray(value)) {
    throw new ConfigError(`${label} must be a list of glob patterns`, source);
  }

  const patterns: string[] = [];
  for (const pattern of value) {
    if (typeof pattern !== "string") {
      throw new ConfigError(`${label} must only contain strings (got ${JSON.stringify(pattern)})`, source);
    }
    patterns.push(pattern);
  }
  return patterns;
}

function validateFiles(value: unknown, source: string): SmellScanConfig["files"] {
  if (value === undefined || value === null) {
    return {};
  }
  if (!isRecord(value)) {
    throw new ConfigError("files must be a mapping", source);
  }
  return { ignore: validatePatterns(value.ignore, "files.ignore", source) };
}

function validateOverrides(value: unknown, source: string): DetectorOverride[] {
  if (value === undefined || value === null) {
    return [];
  }
  if (!Array.isArray(value)) {
    throw new ConfigError("overrides must be a list", source);
  }

  return value.map((entry: unknown, index: number) => {
    const label = `overrides[${index}]`;
    if (!isRecord(entry)) {
      throw new ConfigError(`${label} must be a mapping`, source);
    }
    return {
      patterns: validatePatterns(entry.patterns, `${label}.patterns`, source),
      detectors: validateDetectorMap(entry.detectors, `${label}.detectors`, source),
    };
  });
}

// ============================================================================
// Resolution
// ============================================================================

/**
 * Check if a file matches any of the given glob patterns.
 */
function matchesAnyPattern(filePath: string, patterns: string[]): boolean {
  const normalizedPath = filePath.replace(/\\/g, "/");
  return patterns.some((pattern) => minimatch(normalizedPath, pattern, { dot: true }));
}

/**
 * Build a LoadedConfig from a validated SmellScanConfig.
 *
 * @throws ConfigError when merged detector settings are invalid
 */
function buildLoadedConfig(rawConfig: SmellScanConfig): LoadedConfig {
  const nesting: RequiredNestingConfig = {
    nested_definitions:
      rawConfig.nesting?.nested_definitions ?? DEFAULT_NESTING_CONFIG.nested_definitions,
  };

  const ignorePatterns = rawConfig.files?.ignore ?? DEFAULT_FILES_CONFIG.ignore;
  const overrides = rawConfig.overrides ?? [];

  // Resolve global settings eagerly so bad values surface at load time
  const globalConfig = new Map<SmellType, RequiredDetectorConfig>();
  for (const smellType of ALL_SMELL_TYPES) {
    globalConfig.set(
      smellType,
      mergeDetectorConfig(
        DEFAULT_DETECTOR_CONFIG[smellType],
        rawConfig.detectors?.[smellType] ?? {},
        `detectors.${smellType}`
      )
    );
  }

  function isFileIgnored(filePath: string): boolean {
    return matchesAnyPattern(filePath, ignorePatterns);
  }

  function getDetectorConfig(smellType: SmellType, filePath?: string): RequiredDetectorConfig {
    let result: RequiredDetectorConfig = {
      ...(globalConfig.get(smellType) ?? DEFAULT_DETECTOR_CONFIG[smellType]),
    };

    if (filePath) {
      for (const override of overrides) {
        const overrideConfig = override.detectors[smellType];
        if (overrideConfig && matchesAnyPattern(filePath, override.patterns)) {
          result = mergeDetectorConfig(result, overrideConfig, smellType);
        }
      }
    }

    return result;
  }

  return {
    raw: rawConfig,
    isFileIgnored,
    getDetectorConfig,
    nesting,
  };
}
