import type { SyntaxNode } from "tree-sitter";

export type { SyntaxNode, QueryCapture, Tree } from "tree-sitter";

export type RawDefinitionKind = "function" | "method" | "class";

/**
 * A function, method or class boundary as one adapter sees it.
 */
export interface RawDefinition {
  kind: RawDefinitionKind;
  name: string;
  /** Qualified name of the enclosing class for methods and nested classes. */
  className?: string;
  startLine: number;
  endLine: number;
}

export interface RawCall {
  callee: string;
  expression: string;
  line: number;
  column: number;
}

export interface RawMatches {
  definitions: RawDefinition[];
  calls: RawCall[];
  /** Module specifiers as written, in source order. */
  imports: string[];
}

const BARE_IDENTIFIER = /^[\p{L}\p{Nl}_$][\p{L}\p{Nl}\p{Mn}\p{Mc}\p{Nd}\p{Pc}$]*$/u;

/** Letters of any script, digits after the first character, `_` and `$`. */
export function isBareIdentifier(text: string): boolean {
  return BARE_IDENTIFIER.test(text);
}

const QUOTE_PAIRS: Record<string, string> = { '"': '"', "'": "'", "`": "`", "<": ">" };

/** `"fmt"`, `'x'` and `<stdio.h>` without their delimiters. */
export function unquote(text: string): string {
  const close = QUOTE_PAIRS[text[0] ?? ""];
  return close !== undefined && text.length >= 2 && text.endsWith(close)
    ? text.slice(1, -1)
    : text;
}

/**
 * Callee text with whitespace removed, so that a chain split across lines
 * reads as one expression.
 */
export function compactExpression(node: SyntaxNode): string {
  return node.text.replace(/\s+/g, "");
}
