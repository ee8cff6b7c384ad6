import type Parser from "tree-sitter";
import type { Tree, SyntaxNode } from "tree-sitter";
import type { LanguageAdapter } from "./LanguageAdapter.js";
import type { SupportedGrammar } from "../treesitter/grammarLoader.js";
import {
  getParser,
  clearCache as clearGrammarCache,
} from "../treesitter/grammarLoader.js";
import type { RawCall, RawMatches } from "../treesitter/types.js";
import { TREESITTER_BUFFER_SIZE } from "../../config/constants.js";
import { SourceParseError } from "../../model/errors.js";

export abstract class BaseAdapter implements LanguageAdapter {
  abstract languageId: string;

  abstract fileExtensions: readonly string[];

  protected abstract grammar: SupportedGrammar;

  protected parser: Parser | null = null;

  getParser(): Parser | null {
    if (!this.parser) {
      this.parser = getParser(this.grammar);
    }
    return this.parser;
  }

  parse(content: string, filePath: string): Tree {
    const parser = this.getParser();
    if (!parser) {
      throw new SourceParseError(`No ${this.grammar} parser available for ${filePath}`);
    }

    const tree = parser.parse(content, undefined, {
      bufferSize: Math.max(TREESITTER_BUFFER_SIZE, content.length * 2),
    });

    if (tree.rootNode.hasError) {
      const errorNode = findFirstErrorNode(tree.rootNode);
      const line = errorNode.startPosition.row + 1;
      throw new SourceParseError(`Syntax error near line ${line}`, line);
    }

    return tree;
  }

  abstract extractMatches(
    tree: Tree,
    content: string,
    filePath: string,
  ): RawMatches;

  /**
   * 1-based inclusive line span. A node ending at column 0 ends on the
   * previous line.
   */
  protected lineSpan(node: SyntaxNode): { startLine: number; endLine: number } {
    const startLine = node.startPosition.row + 1;
    const endRow =
      node.endPosition.column === 0 && node.endPosition.row > node.startPosition.row
        ? node.endPosition.row - 1
        : node.endPosition.row;
    return { startLine, endLine: endRow + 1 };
  }

  protected callAt(node: SyntaxNode, callee: string, expression: string): RawCall {
    return {
      callee,
      expression,
      line: node.startPosition.row + 1,
      column: node.startPosition.column,
    };
  }
}

function findFirstErrorNode(node: SyntaxNode): SyntaxNode {
  for (const child of node.children) {
    if (child.type === "ERROR") {
      return child;
    }
    if (child.hasError) {
      return findFirstErrorNode(child);
    }
  }
  return node;
}

export function createClearCacheFunction(...grammars: SupportedGrammar[]): () => void {
  return function clearCache(): void {
    for (const grammar of grammars) {
      clearGrammarCache(grammar);
    }
  };
}
