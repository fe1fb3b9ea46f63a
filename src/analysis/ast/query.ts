/**
 * Tree query helpers shared by metrics, detectors and orchestration.
 *
 * All helpers are read-only and tolerate incomplete trees: missing structure
 * falls back to an empty result or the "unknown" name.
 */

import { DEFINITION_NODE_KINDS, DefinitionKind, NodeKind, SyntaxNode } from "./types";

/** Name reported when a definition has no identifier child. */
export const UNKNOWN_NAME = "unknown";

/**
 * Collect every node of the given kinds in pre-order.
 */
export function findAllNodes(root: SyntaxNode, types: readonly string[]): SyntaxNode[] {
  const results: SyntaxNode[] = [];
  const traverse = (node: SyntaxNode) => {
    if (types.includes(node.type)) {
      results.push(node);
    }
    for (const child of node.children) {
      traverse(child);
    }
  };
  traverse(root);
  return results;
}

/**
 * Find all function or class definitions anywhere under root, in source order.
 * Nested and class-member definitions are included.
 */
export function findDefinitions(root: SyntaxNode, kind: DefinitionKind): SyntaxNode[] {
  return findAllNodes(root, [DEFINITION_NODE_KINDS[kind]]);
}

/**
 * Name of a function or class definition: the first identifier among its
 * direct children.
 */
export function nameOf(definition: SyntaxNode): string {
  for (const child of definition.children) {
    if (child.type === NodeKind.Identifier) {
      return child.text;
    }
  }
  return UNKNOWN_NAME;
}

/**
 * Methods declared directly in a class body. Functions nested inside those
 * methods are not included.
 */
export function methodsOf(classNode: SyntaxNode): SyntaxNode[] {
  const methods: SyntaxNode[] = [];

  for (const child of classNode.children) {
    if (child.type !== NodeKind.Block) continue;

    for (const item of child.children) {
      if (item.type === NodeKind.FunctionDefinition) {
        methods.push(item);
      } else if (item.type === NodeKind.DecoratedDefinition) {
        // @staticmethod, @property, ...
        const inner = item.children.find((c) => c.type === NodeKind.FunctionDefinition);
        if (inner) methods.push(inner);
      }
    }
  }

  return methods;
}

/**
 * Split a camelCase or snake_case identifier into lowercase words.
 */
export function splitIdentifier(name: string): string[] {
  return name
    .replace(/_/g, " ")
    .replace(/([a-z])([A-Z])/g, "$1 $2")
    .toLowerCase()
    .split(/\s+/)
    .filter((word) => word.length > 0);
}

/**
 * Stable key for a node within one tree. Node objects handed out by a parser
 * binding are not guaranteed to be identical across traversals.
 */
export function nodeKey(node: SyntaxNode): string {
  return `${node.type}@${node.startPosition.row}:${node.startPosition.column}`;
}
