/**
 * Python tree adapter using tree-sitter.
 *
 * Tree-sitter keeps producing a tree for partial or broken code (syntax
 * errors become ERROR nodes), so only unreadable files and parser failures
 * surface as SourceUnitError.
 *
 * Handles: .py, .pyw
 */

import * as fs from "fs";
import Parser from "tree-sitter";
import Python from "tree-sitter-python";

import { ParsedTree, SupportedLanguage, TreeAdapter, detectLanguage } from "./types";
import { SourceUnitError, errorMessage } from "../../errors";

/**
 * The binding's plain string input is limited to 32 KiB, so source is handed
 * to the parser in slices through the callback input.
 */
const PARSE_CHUNK_SIZE = 16 * 1024;

export class PythonTreeAdapter implements TreeAdapter {
  language: SupportedLanguage = "python";
  private parser: Parser;

  constructor() {
    this.parser = new Parser();
    this.parser.setLanguage(Python);
  }

  canAnalyze(filePath: string): boolean {
    return detectLanguage(filePath) === this.language;
  }

  parse(source: string, filePath = "<source>"): ParsedTree {
    try {
      const tree = this.parser.parse((index: number) =>
        index < source.length ? source.slice(index, index + PARSE_CHUNK_SIZE) : null
      );
      return { root: tree.rootNode, source };
    } catch (error) {
      throw new SourceUnitError(filePath, errorMessage(error));
    }
  }

  parseFile(filePath: string): ParsedTree {
    let source: string;
    try {
      source = fs.readFileSync(filePath, "utf-8");
    } catch (error) {
      throw new SourceUnitError(filePath, errorMessage(error));
    }

    return this.parse(source, filePath);
  }
}

export const pythonTreeAdapter = new PythonTreeAdapter();
