/**
 * Shared types for syntax-tree based analysis.
 *
 * The engine never depends on a concrete parser. Anything that exposes a kind
 * tag, positions, text and ordered children can be analyzed; tree-sitter nodes
 * satisfy the contract as they are.
 */

/**
 * A position in the source, 0-based as produced by the parser.
 */
export interface Point {
  row: number;
  column: number;
}

/**
 * The generic node contract the engine consumes. Nodes are never mutated.
 */
export interface SyntaxNode {
  /** Grammar kind tag, e.g. "function_definition" */
  readonly type: string;
  readonly startPosition: Point;
  readonly endPosition: Point;
  readonly text: string;
  /** Child nodes in source order */
  readonly children: readonly SyntaxNode[];
}

/**
 * Node kinds the engine inspects (tree-sitter-python grammar names).
 * Node.type stays a plain string because the grammar's kind set is open.
 */
export const NodeKind = {
  Module: "module",
  FunctionDefinition: "function_definition",
  ClassDefinition: "class_definition",
  DecoratedDefinition: "decorated_definition",
  Block: "block",
  Identifier: "identifier",
  Parameters: "parameters",
  TypedParameter: "typed_parameter",
  DefaultParameter: "default_parameter",
  IfStatement: "if_statement",
  ForStatement: "for_statement",
  WhileStatement: "while_statement",
  WithStatement: "with_statement",
  TryStatement: "try_statement",
} as const;

export type NodeKind = (typeof NodeKind)[keyof typeof NodeKind];

/**
 * Definition kinds that can be looked up in a tree.
 */
export type DefinitionKind = "function" | "class";

export const DEFINITION_NODE_KINDS: Record<DefinitionKind, NodeKind> = {
  function: NodeKind.FunctionDefinition,
  class: NodeKind.ClassDefinition,
};

/**
 * A parsed source unit: the tree root and the text it was built from.
 */
export interface ParsedTree {
  root: SyntaxNode;
  source: string;
}

/**
 * Languages supported by a tree adapter.
 */
export type SupportedLanguage = "python" | "unknown";

/**
 * Detect the language from a file path.
 */
export function detectLanguage(filePath: string): SupportedLanguage {
  const ext = filePath.toLowerCase().split(".").pop();

  switch (ext) {
    case "py":
    case "pyw":
      return "python";
    default:
      return "unknown";
  }
}

/**
 * Seam over an external parser. Adapters turn source text into a tree that
 * satisfies the SyntaxNode contract.
 */
export interface TreeAdapter {
  /** The language this adapter parses */
  language: SupportedLanguage;

  /**
   * Check if this adapter can handle the given file.
   */
  canAnalyze(filePath: string): boolean;

  /**
   * Parse source text.
   *
   * @throws SourceUnitError when the parser rejects the input
   */
  parse(source: string, filePath?: string): ParsedTree;

  /**
   * Read and parse a file.
   *
   * @throws SourceUnitError when the file cannot be read or parsed
   */
  parseFile(filePath: string): ParsedTree;
}
