/**
 * Detection orchestration - runs the detector set over parsed trees, files
 * and directories.
 *
 * analyzeTree is the pure core: one tree in, an ordered list of findings out.
 * The file and directory entry points add parsing, suppression directives,
 * configuration and per-file failure isolation around it.
 */

import * as fs from "fs";
import * as path from "path";
import { SyntaxNode, TreeAdapter } from "./ast/types";
import { findDefinitions, methodsOf, nameOf, nodeKey } from "./ast/query";
import { getTreeAdapter, pythonTreeAdapter } from "./ast";
import { DEFAULT_DETECTORS } from "./detectors";
import { Detector, Finding } from "./detectors/types";
import { NestingOptions } from "./metrics";
import { RequiredDetectorConfig, isValidSmellType, mergeDetectorConfig } from "./rules";
import { LoadedConfig, loadConfig } from "../config/loader";
import { filterSuppressedFindings, parseSuppressionDirectives } from "../core/suppression";
import { errorMessage } from "../errors";
import { logger } from "../logger";

/**
 * Options for analyzing one tree.
 */
export interface AnalyzeOptions {
  /**
   * Detectors in run order. Defaults to the built-in set.
   */
  detectors?: readonly Detector[];
  /**
   * Settings for each detector. Defaults to the detector's own defaults.
   */
  getDetectorConfig?: (detector: Detector) => RequiredDetectorConfig;
  nesting?: NestingOptions;
}

/**
 * Result of analyzing a single source unit.
 */
export interface FileAnalysisResult {
  filePath: string;
  /** False when the unit could not be read or parsed */
  parseSuccess: boolean;
  parseError?: string;
  findings: Finding[];
  /** Findings removed by inline suppression directives */
  suppressedCount: number;
  analysisTimeMs: number;
}

export interface FileAnalysisOptions extends AnalyzeOptions {
  /** Parser to use. Defaults to the adapter registered for the file extension. */
  adapter?: TreeAdapter;
}

/**
 * Result of analyzing a directory tree.
 */
export interface DirectoryAnalysisResult {
  /** Files with at least one finding, in path order */
  results: FileAnalysisResult[];
  /** Files that could not be read or parsed */
  failures: FileAnalysisResult[];
  /** Number of files analyzed, failures included */
  filesAnalyzed: number;
  /** Number of files skipped by ignore patterns */
  filesSkipped: number;
}

/** Directory names never descended into. Dot-directories are skipped as well. */
const SKIPPED_DIRECTORIES = new Set(["node_modules", "__pycache__", "venv", "site-packages"]);

/**
 * Run every enabled detector over every function definition in the tree.
 *
 * Findings are ordered by definition (source order), then by detector
 * registration order. The tree is not modified.
 *
 * @throws ConfigError when a detector's settings carry an invalid limit
 */
export function analyzeTree(root: SyntaxNode, options: AnalyzeOptions = {}): Finding[] {
  const detectors = options.detectors ?? DEFAULT_DETECTORS;
  const configFor = options.getDetectorConfig ?? ((detector: Detector) => detector.defaults);
  const nesting = options.nesting ?? {};

  // Settings are validated up front so a bad limit fails before any node is visited
  const active = detectors
    .map((detector) => ({
      detector,
      settings: mergeDetectorConfig(detector.defaults, configFor(detector), detector.id),
    }))
    .filter((entry) => entry.settings.enabled);

  const methodOwners = indexMethodOwners(root);
  const findings: Finding[] = [];

  for (const definition of findDefinitions(root, "function")) {
    const className = methodOwners.get(nodeKey(definition));

    for (const { detector, settings } of active) {
      const finding = detector.detect(definition, { settings, nesting });
      if (finding) {
        findings.push(className ? { ...finding, className } : finding);
      }
    }
  }

  return findings;
}

/**
 * Map each method to the name of the class that declares it.
 */
function indexMethodOwners(root: SyntaxNode): Map<string, string> {
  const owners = new Map<string, string>();
  for (const classNode of findDefinitions(root, "class")) {
    const className = nameOf(classNode);
    for (const method of methodsOf(classNode)) {
      owners.set(nodeKey(method), className);
    }
  }
  return owners;
}

/**
 * Parse and analyze source text, applying its suppression directives.
 * A parser failure yields a failed result instead of an exception.
 */
export function analyzeSource(
  source: string,
  filePath: string,
  options: FileAnalysisOptions = {}
): FileAnalysisResult {
  const startTime = Date.now();
  const adapter = options.adapter ?? getTreeAdapter(filePath) ?? pythonTreeAdapter;

  let root: SyntaxNode;
  try {
    root = adapter.parse(source, filePath).root;
  } catch (error) {
    return failedResult(filePath, error, startTime);
  }

  return finishAnalysis(root, source, filePath, options, startTime);
}

/**
 * Read, parse and analyze one file. An unreadable or unparsable file yields a
 * failed result with no findings; it never throws.
 */
export function analyzeFile(filePath: string, options: FileAnalysisOptions = {}): FileAnalysisResult {
  const startTime = Date.now();
  const adapter = options.adapter ?? getTreeAdapter(filePath) ?? pythonTreeAdapter;

  let root: SyntaxNode;
  let source: string;
  try {
    ({ root, source } = adapter.parseFile(filePath));
  } catch (error) {
    return failedResult(filePath, error, startTime);
  }

  return finishAnalysis(root, source, filePath, options, startTime);
}

function finishAnalysis(
  root: SyntaxNode,
  source: string,
  filePath: string,
  options: AnalyzeOptions,
  startTime: number
): FileAnalysisResult {
  const rawFindings = analyzeTree(root, options);
  const findings = filterSuppressedFindings(rawFindings, parseSuppressionDirectives(source));
  const analysisTimeMs = Date.now() - startTime;

  logger.debug("Analyzed file", { filePath, findings: findings.length, analysisTimeMs });

  return {
    filePath,
    parseSuccess: true,
    findings,
    suppressedCount: rawFindings.length - findings.length,
    analysisTimeMs,
  };
}

function failedResult(filePath: string, error: unknown, startTime: number): FileAnalysisResult {
  const parseError = errorMessage(error);
  logger.warn("Skipping unanalyzable file", { filePath, error: parseError });

  return {
    filePath,
    parseSuccess: false,
    parseError,
    findings: [],
    suppressedCount: 0,
    analysisTimeMs: Date.now() - startTime,
  };
}

/**
 * Analysis options for one file under a loaded configuration.
 *
 * @param relativePath - Path relative to the configured root, used for overrides
 */
export function analysisOptionsFor(
  config: LoadedConfig,
  relativePath?: string,
  detectors: readonly Detector[] = DEFAULT_DETECTORS
): AnalyzeOptions {
  return {
    detectors,
    nesting: { nestedDefinitions: config.nesting.nested_definitions },
    getDetectorConfig: (detector) =>
      isValidSmellType(detector.id)
        ? config.getDetectorConfig(detector.id, relativePath)
        : detector.defaults,
  };
}

/**
 * Recursively collect files a tree adapter can parse, sorted by path.
 */
export function collectSourceFiles(dir: string, fileList: string[] = []): string[] {
  const entries = fs.readdirSync(dir, { withFileTypes: true });
  entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

  for (const entry of entries) {
    const entryPath = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      if (!entry.name.startsWith(".") && !SKIPPED_DIRECTORIES.has(entry.name)) {
        collectSourceFiles(entryPath, fileList);
      }
    } else if (entry.isFile() && getTreeAdapter(entry.name)) {
      fileList.push(entryPath);
    }
  }
  return fileList;
}

/**
 * Analyze every supported file under a directory. Each file is an
 * independent unit: a failure is recorded and the walk continues.
 *
 * @param config - Defaults to the .smellscan.yml found in rootDir
 * @throws when rootDir itself cannot be read, or its config file is invalid
 */
export function analyzeDirectory(
  rootDir: string,
  config: LoadedConfig = loadConfig(rootDir),
  detectors: readonly Detector[] = DEFAULT_DETECTORS
): DirectoryAnalysisResult {
  const result: DirectoryAnalysisResult = {
    results: [],
    failures: [],
    filesAnalyzed: 0,
    filesSkipped: 0,
  };

  for (const filePath of collectSourceFiles(rootDir)) {
    const relativePath = path.relative(rootDir, filePath).split(path.sep).join("/");

    if (config.isFileIgnored(relativePath)) {
      result.filesSkipped++;
      continue;
    }

    const fileResult = analyzeFile(filePath, analysisOptionsFor(config, relativePath, detectors));
    const reported = { ...fileResult, filePath: relativePath };
    result.filesAnalyzed++;

    if (!reported.parseSuccess) {
      result.failures.push(reported);
    } else if (reported.findings.length > 0) {
      result.results.push(reported);
    }
  }

  logger.info("Directory analysis complete", {
    rootDir,
    filesAnalyzed: result.filesAnalyzed,
    filesSkipped: result.filesSkipped,
    failures: result.failures.length,
  });

  return result;
}
