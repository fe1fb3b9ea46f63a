/**
 * Structural metrics over a single definition node.
 */

import { NodeKind, SyntaxNode } from "./ast/types";

/** Control structures that open a new nesting level. */
export const NESTING_NODE_KINDS: ReadonlySet<string> = new Set([
  NodeKind.IfStatement,
  NodeKind.ForStatement,
  NodeKind.WhileStatement,
  NodeKind.WithStatement,
  NodeKind.TryStatement,
]);

/** Parameter-list entries that count as ordinary parameters. */
export const COUNTED_PARAMETER_KINDS: ReadonlySet<string> = new Set([
  NodeKind.Identifier,
  NodeKind.TypedParameter,
  NodeKind.DefaultParameter,
]);

/** Definitions that open their own scope. */
const SCOPE_NODE_KINDS: ReadonlySet<string> = new Set([
  NodeKind.FunctionDefinition,
  NodeKind.ClassDefinition,
]);

/**
 * How nested function and class bodies affect the enclosing depth.
 * - accumulate: nested bodies are walked and count toward the enclosing function
 * - isolate: nested definitions are skipped; they are measured on their own pass
 */
export type NestedDefinitionMode = "accumulate" | "isolate";

export const NESTED_DEFINITION_MODES: readonly NestedDefinitionMode[] = ["accumulate", "isolate"];

export interface NestingOptions {
  nestedDefinitions?: NestedDefinitionMode;
}

/**
 * Inclusive number of source lines the node spans.
 */
export function lineSpan(node: SyntaxNode): number {
  return node.endPosition.row - node.startPosition.row + 1;
}

/**
 * Number of plain, typed and defaulted parameters. 0 when the node has no
 * parameter list.
 */
export function parameterCount(definition: SyntaxNode): number {
  const parameters = definition.children.find((child) => child.type === NodeKind.Parameters);
  if (!parameters) return 0;

  return parameters.children.filter((child) => COUNTED_PARAMETER_KINDS.has(child.type)).length;
}

/**
 * Deepest control-structure nesting below the node. The node itself is depth 0.
 */
export function maxNestingDepth(definition: SyntaxNode, options: NestingOptions = {}): number {
  const isolate = options.nestedDefinitions === "isolate";

  const walk = (node: SyntaxNode, depth: number): number => {
    let maxDepth = depth;
    for (const child of node.children) {
      if (isolate && SCOPE_NODE_KINDS.has(child.type)) continue;

      const childDepth = walk(child, NESTING_NODE_KINDS.has(child.type) ? depth + 1 : depth);
      if (childDepth > maxDepth) {
        maxDepth = childDepth;
      }
    }
    return maxDepth;
  };

  return walk(definition, 0);
}
