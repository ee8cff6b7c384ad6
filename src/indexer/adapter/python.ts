import type { Tree, SyntaxNode, QueryCapture } from "tree-sitter";
import { BaseAdapter, createClearCacheFunction } from "./BaseAdapter.js";
import type {
  RawCall,
  RawDefinition,
  RawMatches,
} from "../treesitter/types.js";
import { compactExpression, isBareIdentifier } from "../treesitter/types.js";
import { createQuery } from "../treesitter/grammarLoader.js";

const CALL_QUERY = `
(call
  function: (identifier) @callee) @call

(call
  function: (attribute
    attribute: (identifier) @callee)) @call
`;

/**
 * Scope a definition is declared in: the module, a class body, or the body
 * of a function (whose nested defs are plain functions).
 */
type Owner =
  | { kind: "module" }
  | { kind: "class"; qualifiedName: string }
  | { kind: "function" };

class PythonAdapter extends BaseAdapter {
  languageId = "python";
  fileExtensions = [".py", ".pyi"] as const;
  protected grammar = "python" as const;

  extractMatches(tree: Tree, _content: string, _filePath: string): RawMatches {
    const definitions: RawDefinition[] = [];
    this.collectDefinitions(tree.rootNode, { kind: "module" }, definitions);

    return {
      definitions,
      calls: this.extractCalls(tree),
      imports: this.extractImports(tree),
    };
  }

  /**
   * `import a.b, c as d` gives `a.b` and `c`; `from ..pkg import x` gives
   * `..pkg`. Imports nested in functions count too.
   */
  private extractImports(tree: Tree): string[] {
    const imports: string[] = [];
    for (const node of tree.rootNode.descendantsOfType([
      "import_statement",
      "import_from_statement",
      "future_import_statement",
    ])) {
      if (node.type === "future_import_statement") {
        imports.push("__future__");
        continue;
      }
      if (node.type === "import_from_statement") {
        const module = node.childForFieldName("module_name");
        if (module) imports.push(module.text.replace(/\s+/g, ""));
        continue;
      }
      for (const child of node.namedChildren) {
        const name = child.type === "aliased_import" ? child.childForFieldName("name") : child;
        if (name?.type === "dotted_name") {
          imports.push(name.text.replace(/\s+/g, ""));
        }
      }
    }
    return imports;
  }

  private collectDefinitions(
    node: SyntaxNode,
    owner: Owner,
    definitions: RawDefinition[],
  ): void {
    for (const child of node.namedChildren) {
      switch (child.type) {
        case "function_definition": {
          const name = child.childForFieldName("name")?.text;
          if (name) {
            definitions.push({
              kind: owner.kind === "class" ? "method" : "function",
              name,
              className: owner.kind === "class" ? owner.qualifiedName : undefined,
              ...this.lineSpan(child),
            });
          }
          this.collectDefinitions(child, { kind: "function" }, definitions);
          break;
        }

        case "class_definition": {
          const name = child.childForFieldName("name")?.text;
          if (!name) {
            this.collectDefinitions(child, owner, definitions);
            break;
          }
          const className = owner.kind === "class" ? owner.qualifiedName : undefined;
          definitions.push({
            kind: "class",
            name,
            className,
            ...this.lineSpan(child),
          });
          this.collectDefinitions(
            child,
            {
              kind: "class",
              qualifiedName: className ? `${className}.${name}` : name,
            },
            definitions,
          );
          break;
        }

        default:
          // decorated_definition, block and friends pass the owner through
          this.collectDefinitions(child, owner, definitions);
      }
    }
  }

  private extractCalls(tree: Tree): RawCall[] {
    const query = createQuery("python", CALL_QUERY);
    if (!query) {
      return [];
    }

    const calls: RawCall[] = [];
    const seenCallNodes = new Set<number>();

    for (const match of query.matches(tree.rootNode)) {
      const callCapture = match.captures.find(
        (c: QueryCapture) => c.name === "call",
      );
      const calleeCapture = match.captures.find(
        (c: QueryCapture) => c.name === "callee",
      );
      if (!callCapture || !calleeCapture) continue;

      const callNode = callCapture.node;
      if (seenCallNodes.has(callNode.id)) continue;
      seenCallNodes.add(callNode.id);

      const callee = calleeCapture.node.text;
      if (!isBareIdentifier(callee)) continue;

      const functionNode = callNode.childForFieldName("function");
      const expression = functionNode ? compactExpression(functionNode) : callee;

      calls.push(this.callAt(calleeCapture.node, callee, expression));
    }

    return calls;
  }
}

const clearCache = createClearCacheFunction("python");

export { PythonAdapter, clearCache };
