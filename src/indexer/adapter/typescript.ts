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
(call_expression
  function: (_) @target) @call

(new_expression
  constructor: (_) @target) @call
`;

const IMPORT_QUERY = `
(import_statement
  source: (string (string_fragment) @source))

(export_statement
  source: (string (string_fragment) @source))
`;

const FUNCTION_DECLARATIONS = new Set([
  "function_declaration",
  "generator_function_declaration",
  "function_signature",
]);

const CLASS_DECLARATIONS = new Set([
  "class_declaration",
  "abstract_class_declaration",
  "class",
]);

const FUNCTION_VALUES = new Set([
  "arrow_function",
  "function",
  "function_expression",
  "generator_function",
]);

type Owner = { kind: "class"; qualifiedName: string } | { kind: "other" };

/**
 * TypeScript and JavaScript. Both go through the TypeScript grammars; the
 * tsx grammar also covers JSX and plain JavaScript.
 */
class TypeScriptAdapter extends BaseAdapter {
  languageId: string;
  fileExtensions: readonly string[];
  protected grammar: "typescript" | "tsx";

  constructor(
    languageId: "typescript" | "javascript" = "typescript",
    grammar: "typescript" | "tsx" = "typescript",
  ) {
    super();
    this.languageId = languageId;
    this.grammar = grammar;
    this.fileExtensions =
      languageId === "javascript"
        ? [".js", ".jsx", ".mjs", ".cjs"]
        : [".ts", ".mts", ".cts", ".tsx"];
  }

  extractMatches(tree: Tree, _content: string, _filePath: string): RawMatches {
    const definitions: RawDefinition[] = [];
    this.collectDefinitions(tree.rootNode, { kind: "other" }, definitions);

    return {
      definitions,
      calls: this.extractCalls(tree),
      imports: this.extractImports(tree),
    };
  }

  /** Sources of `import ... from` and `export ... from` statements. */
  private extractImports(tree: Tree): string[] {
    const query = createQuery(this.grammar, IMPORT_QUERY);
    if (!query) {
      return [];
    }
    return query
      .captures(tree.rootNode)
      .filter((c: QueryCapture) => c.name === "source")
      .map((c: QueryCapture) => c.node.text);
  }

  private collectDefinitions(
    node: SyntaxNode,
    owner: Owner,
    definitions: RawDefinition[],
  ): void {
    for (const child of node.namedChildren) {
      if (FUNCTION_DECLARATIONS.has(child.type)) {
        const name = child.childForFieldName("name")?.text;
        if (name && child.type !== "function_signature") {
          definitions.push({ kind: "function", name, ...this.lineSpan(child) });
        }
        this.collectDefinitions(child, { kind: "other" }, definitions);
        continue;
      }

      if (CLASS_DECLARATIONS.has(child.type)) {
        const name = child.childForFieldName("name")?.text;
        if (!name) {
          this.collectDefinitions(child, { kind: "other" }, definitions);
          continue;
        }
        const className = owner.kind === "class" ? owner.qualifiedName : undefined;
        definitions.push({ kind: "class", name, className, ...this.lineSpan(child) });
        this.collectDefinitions(
          child,
          { kind: "class", qualifiedName: className ? `${className}.${name}` : name },
          definitions,
        );
        continue;
      }

      if (child.type === "method_definition") {
        const name = memberName(child);
        if (name) {
          definitions.push({
            kind: owner.kind === "class" ? "method" : "function",
            name,
            className: owner.kind === "class" ? owner.qualifiedName : undefined,
            ...this.lineSpan(child),
          });
        }
        this.collectDefinitions(child, { kind: "other" }, definitions);
        continue;
      }

      if (child.type === "public_field_definition" || child.type === "field_definition") {
        const value = child.childForFieldName("value");
        const name = memberName(child);
        if (value && FUNCTION_VALUES.has(value.type) && name) {
          definitions.push({
            kind: owner.kind === "class" ? "method" : "function",
            name,
            className: owner.kind === "class" ? owner.qualifiedName : undefined,
            ...this.lineSpan(child),
          });
          this.collectDefinitions(value, { kind: "other" }, definitions);
          continue;
        }
      }

      if (child.type === "variable_declarator") {
        const nameNode = child.childForFieldName("name");
        const value = child.childForFieldName("value");
        if (nameNode?.type === "identifier" && value && FUNCTION_VALUES.has(value.type)) {
          definitions.push({
            kind: "function",
            name: nameNode.text,
            ...this.lineSpan(child),
          });
          this.collectDefinitions(value, { kind: "other" }, definitions);
          continue;
        }
      }

      // class_body passes the class owner through; other containers reset it
      this.collectDefinitions(
        child,
        child.type === "class_body" ? owner : { kind: "other" },
        definitions,
      );
    }
  }

  private extractCalls(tree: Tree): RawCall[] {
    const query = createQuery(this.grammar, CALL_QUERY);
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

      const nameNode = calleeNameNode(targetCapture.node);
      if (!nameNode) continue;
      const callee = nameNode.text.replace(/^#/, "");
      if (!isBareIdentifier(callee) || callee === "super") continue;

      const target = compactExpression(targetCapture.node);
      const expression = callNode.type === "new_expression" ? `new ${target}` : target;
      calls.push(this.callAt(nameNode, callee, expression));
    }

    return calls;
  }
}

function memberName(node: SyntaxNode): string | null {
  const nameNode = node.childForFieldName("name") ?? node.childForFieldName("property");
  if (!nameNode) {
    return null;
  }
  // #private members are looked up by their bare name
  const text = nameNode.text.replace(/^#/, "");
  return isBareIdentifier(text) ? text : null;
}

/**
 * The identifier that names the callee: `f` in `f()`, `run` in
 * `this.worker.run()`, `Foo` in `new ns.Foo()`.
 */
function calleeNameNode(target: SyntaxNode): SyntaxNode | null {
  switch (target.type) {
    case "identifier":
      return target;
    case "member_expression":
      return target.childForFieldName("property");
    case "non_null_expression":
    case "parenthesized_expression": {
      const inner = target.namedChildren[0];
      return inner ? calleeNameNode(inner) : null;
    }
    default:
      return null;
  }
}

const clearCache = createClearCacheFunction("typescript", "tsx");

export { TypeScriptAdapter, clearCache };
