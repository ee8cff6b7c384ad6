import type { Tree, SyntaxNode, QueryCapture } from "tree-sitter";
import { BaseAdapter, createClearCacheFunction } from "./BaseAdapter.js";
import type {
  RawCall,
  RawDefinition,
  RawMatches,
} from "../treesitter/types.js";
import { compactExpression, isBareIdentifier, unquote } from "../treesitter/types.js";
import { createQuery } from "../treesitter/grammarLoader.js";

const CALL_QUERY = `
(call_expression
  function: (_) @target) @call
`;

class CAdapter extends BaseAdapter {
  languageId = "c";
  fileExtensions = [".c", ".h"] as const;
  protected grammar = "c" as const;

  extractMatches(tree: Tree, _content: string, _filePath: string): RawMatches {
    const definitions: RawDefinition[] = [];
    this.collectDefinitions(tree.rootNode, definitions);

    return {
      definitions,
      calls: this.extractCalls(tree),
      imports: tree.rootNode
        .descendantsOfType("preproc_include")
        .map((node) => node.childForFieldName("path"))
        .filter((path): path is SyntaxNode => path !== null)
        .map((path) => unquote(path.text)),
    };
  }

  private collectDefinitions(node: SyntaxNode, definitions: RawDefinition[]): void {
    for (const child of node.namedChildren) {
      if (child.type === "function_definition") {
        const declarator = child.childForFieldName("declarator");
        const name = declarator ? functionName(declarator) : null;
        if (name) {
          definitions.push({ kind: "function", name, ...this.lineSpan(child) });
        }
        continue;
      }

      // only struct definitions with a body, not `struct foo *p;` references
      if (child.type === "struct_specifier" && child.childForFieldName("body")) {
        const name = child.childForFieldName("name")?.text;
        if (name) {
          definitions.push({ kind: "class", name, ...this.lineSpan(child) });
        }
      }

      this.collectDefinitions(child, definitions);
    }
  }

  private extractCalls(tree: Tree): RawCall[] {
    const query = createQuery("c", CALL_QUERY);
    if (!query) {
      return [];
    }

    const calls: RawCall[] = [];
    const seenCallNodes = new Set<number>();

    for (const match of query.matches(tree.rootNode)) {
      const callCapture = match.captures.find(
        (c: QueryCapture) => c.name === "call",
      );
      const targetCapture = match.captures.find(
        (c: QueryCapture) => c.name === "target",
      );
      if (!callCapture || !targetCapture) continue;

      const callNode = callCapture.node;
      if (seenCallNodes.has(callNode.id)) continue;
      seenCallNodes.add(callNode.id);

      const target = targetCapture.node;
      const nameNode =
        target.type === "identifier"
          ? target
          : target.type === "field_expression"
            ? target.childForFieldName("field")
            : null;
      if (!nameNode || !isBareIdentifier(nameNode.text)) continue;

      calls.push(this.callAt(nameNode, nameNode.text, compactExpression(target)));
    }

    return calls;
  }
}

/**
 * Walks pointer and parenthesized declarators down to the innermost
 * function_declarator, so `static int *(*make(void))(int)` names `make`.
 */
function functionName(declarator: SyntaxNode): string | null {
  let current: SyntaxNode | null = declarator;
  let name: string | null = null;

  while (current) {
    if (current.type === "function_declarator") {
      const inner: SyntaxNode | null = current.childForFieldName("declarator");
      if (inner?.type === "identifier") {
        name = inner.text;
      }
      current = inner;
    } else if (
      current.type === "pointer_declarator" ||
      current.type === "parenthesized_declarator" ||
      current.type === "attributed_declarator"
    ) {
      current =
        current.childForFieldName("declarator") ?? current.namedChildren[0] ?? null;
    } else {
      break;
    }
  }

  return name;
}

const clearCache = createClearCacheFunction("c");

export { CAdapter, clearCache };
