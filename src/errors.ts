/**
 * Error types for smellscan.
 *
 * Configuration errors are raised while loading settings and abort the run.
 * Source-unit errors are raised by tree adapters and only fail the file they
 * belong to.
 */

export class SmellScanError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Invalid configuration: a malformed .smellscan.yml or a bad threshold passed
 * through the API.
 */
export class ConfigError extends SmellScanError {
  constructor(message: string, readonly source?: string) {
    super(source ? `${source}: ${message}` : message);
  }
}

/**
 * A single source file that could not be read or parsed.
 */
export class SourceUnitError extends SmellScanError {
  constructor(
    readonly filePath: string,
    readonly reason: string
  ) {
    super(`Cannot analyze ${filePath}: ${reason}`);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : "Unknown error";
}
