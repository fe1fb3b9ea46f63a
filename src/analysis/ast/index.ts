/**
 * Syntax-tree layer: parser adapters and tree queries.
 *
 * Supported languages:
 * - Python: tree-sitter (fast, fault-tolerant parsing)
 */

import { pythonTreeAdapter } from "./python";
import { SupportedLanguage, TreeAdapter } from "./types";

export * from "./types";
export * from "./query";
export { PythonTreeAdapter, pythonTreeAdapter } from "./python";

/**
 * Registry of language-specific tree adapters.
 */
const adapters = new Map<SupportedLanguage, TreeAdapter>();
adapters.set("python", pythonTreeAdapter);

/**
 * First registered adapter that accepts the file, or null when none does.
 */
export function getTreeAdapter(filePath: string): TreeAdapter | null {
  for (const adapter of adapters.values()) {
    if (adapter.canAnalyze(filePath)) {
      return adapter;
    }
  }
  return null;
}
