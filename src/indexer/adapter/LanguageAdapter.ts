import type { Tree } from "tree-sitter";
import type { RawMatches } from "../treesitter/types.js";

export interface LanguageAdapter {
  /** Language tag recorded on every file this adapter handles. */
  languageId: string;

  fileExtensions: readonly string[];

  /**
   * Parses one file. Throws SourceParseError when the content has syntax
   * errors or no parser is available.
   */
  parse(content: string, filePath: string): Tree;

  /**
   * Function, method and class boundaries plus call expressions, with
   * member and static qualifiers already stripped from callee names.
   */
  extractMatches(tree: Tree, content: string, filePath: string): RawMatches;
}
