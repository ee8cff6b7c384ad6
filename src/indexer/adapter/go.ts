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

const IMPORT_QUERY = `
(import_spec
  path: (_) @path)
`;

class GoAdapter extends BaseAdapter {
  languageId = "go";
  fileExtensions = [".go"] as const;
  protected grammar = "go" as const;

  extractMatches(tree: Tree, _content: string, _filePath: string): RawMatches {
    const definitions: RawDefinition[] = [];
    this.collectDefinitions(tree.rootNode, definitions);

    return {
      definitions,
      calls: this.extractCalls(tree),
      imports: this.extractImports(tree),
    };
  }

  private extractImports(tree: Tree): string[] {
    const query = createQuery("go", IMPORT_QUERY);
    if (!query) {
      return [];
    }
    return query.captures(tree.rootNode).map((c: QueryCapture) => unquote(c.node.text));
  }

  private collectDefinitions(node: SyntaxNode, definitions: RawDefinition[]): void {
    for (const child of node.namedChildren) {
      switch (child.type) {
        case "function_declaration": {
          const name = child.childForFieldName("name")?.text;
          if (name) {
            definitions.push({ kind: "function", name, ...this.lineSpan(child) });
          }
          break;
        }

        case "method_declaration": {
          const name = child.childForFieldName("name")?.text;
          if (name) {
            definitions.push({
              kind: "method",
              name,
              className: receiverTypeName(child) ?? undefined,
              ...this.lineSpan(child),
            });
          }
          break;
        }

        case "type_spec": {
          const name = child.childForFieldName("name")?.text;
          const type = child.childForFieldName("type");
          if (name && (type?.type === "struct_type" || type?.type === "interface_type")) {
            definitions.push({ kind: "class", name, ...this.lineSpan(child) });
          }
          break;
        }

        default:
          this.collectDefinitions(child, definitions);
      }
    }
  }

  private extractCalls(tree: Tree): RawCall[] {
    const query = createQuery("go", CALL_QUERY);
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
          : target.type === "selector_expression"
            ? target.childForFieldName("field")
            : null;
      if (!nameNode || !isBareIdentifier(nameNode.text)) continue;

      calls.push(this.callAt(nameNode, nameNode.text, compactExpression(target)));
    }

    return calls;
  }
}

/**
 * `Server` for both `func (s Server) Run()` and `func (s *Server) Run()`;
 * type parameters on generic receivers are dropped.
 */
function receiverTypeName(method: SyntaxNode): string | null {
  const receiver = method.childForFieldName("receiver");
  const param = receiver?.namedChildren.find(
    (c) => c.type === "parameter_declaration",
  );
  let type = param?.childForFieldName("type") ?? null;

  while (type && type.type === "pointer_type") {
    type = type.namedChildren[0] ?? null;
  }
  if (type?.type === "generic_type") {
    type = type.childForFieldName("type");
  }

  return type && type.type === "type_identifier" ? type.text : null;
}

const clearCache = createClearCacheFunction("go");

export { GoAdapter, clearCache };
