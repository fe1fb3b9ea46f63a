#!/usr/bin/env node
/**
 * Command-line entry point.
 *
 * Usage:
 *   smellscan <file-or-directory> [--json] [--fail-on low|medium|high] [--config <dir>]
 */

import * as fs from "fs";
import * as path from "path";
import { analysisOptionsFor, analyzeDirectory, analyzeFile, FileAnalysisResult } from "./analysis/orchestration";
import { SEVERITY_ORDER, Severity } from "./analysis/detectors/types";
import { LoadedConfig, loadConfig } from "./config/loader";
import { config as env } from "./env";
import { SmellScanError, errorMessage } from "./errors";
import { logger } from "./logger";
import { formatJsonReport, formatTextReport, hasFindingsAtOrAbove } from "./report";

export const EXIT_OK = 0;
export const EXIT_FINDINGS = 1;
export const EXIT_USAGE = 2;

const USAGE = "Usage: smellscan <file-or-directory> [--json] [--fail-on low|medium|high] [--config <dir>]";

export interface CliOptions {
  target: string;
  json: boolean;
  failOn?: Severity;
  configDir?: string;
}

function isSeverity(value: string): value is Severity {
  return Object.prototype.hasOwnProperty.call(SEVERITY_ORDER, value);
}

/**
 * @throws SmellScanError on unknown flags or missing values
 */
export function parseArgs(argv: string[]): CliOptions {
  let target: string | undefined;
  let json = false;
  let failOn: Severity | undefined;
  let configDir: string | undefined;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case "--json":
        json = true;
        break;
      case "--fail-on": {
        const value = argv[++i];
        if (!value || !isSeverity(value)) {
          throw new SmellScanError(`--fail-on expects low, medium or high (got ${value ?? "nothing"})`);
        }
        failOn = value;
        break;
      }
      case "--config": {
        const value = argv[++i];
        if (!value) {
          throw new SmellScanError("--config expects a directory");
        }
        configDir = value;
        break;
      }
      default:
        if (arg.startsWith("--")) {
          throw new SmellScanError(`Unknown option ${arg}`);
        }
        if (target) {
          throw new SmellScanError(`Unexpected argument ${arg}`);
        }
        target = arg;
    }
  }

  if (!target) {
    throw new SmellScanError("Missing file or directory");
  }
  return { target, json, failOn, configDir };
}

function analyzeSingleFile(target: string, config: LoadedConfig, relativePath: string): FileAnalysisResult {
  const result = analyzeFile(target, analysisOptionsFor(config, relativePath));
  if (!result.parseSuccess) {
    throw new SmellScanError(result.parseError ?? `Cannot analyze ${target}`);
  }
  return result;
}

/**
 * Run the CLI and return the process exit code.
 */
export function runCli(argv: string[]): number {
  let options: CliOptions;
  let results: FileAnalysisResult[];

  try {
    options = parseArgs(argv);

    const stat = fs.statSync(options.target, { throwIfNoEntry: false });
    if (!stat || (!stat.isFile() && !stat.isDirectory())) {
      throw new SmellScanError(`${options.target} is not a valid file or directory`);
    }

    const rootDir = stat.isDirectory() ? options.target : path.dirname(options.target);
    const configRoot = options.configDir ?? env.SMELLSCAN_CONFIG_DIR ?? rootDir;
    const config = loadConfig(configRoot);

    if (stat.isDirectory()) {
      results = analyzeDirectory(options.target, config).results;
    } else {
      // Overrides and ignores match paths relative to the config root
      const relativePath = path.relative(configRoot, options.target).split(path.sep).join("/");
      results = config.isFileIgnored(relativePath) ? [] : [analyzeSingleFile(options.target, config, relativePath)];
    }
  } catch (error) {
    logger.error(errorMessage(error));
    console.error(USAGE);
    return EXIT_USAGE;
  }

  if (options.json) {
    console.log(formatJsonReport(results));
  } else if (results.some((result) => result.findings.length > 0)) {
    console.log(formatTextReport(results));
  } else {
    console.log("✅ No code smells detected!");
  }

  if (options.failOn && hasFindingsAtOrAbove(results, options.failOn)) {
    return EXIT_FINDINGS;
  }
  return EXIT_OK;
}

if (require.main === module) {
  process.exitCode = runCli(process.argv.slice(2));
}
