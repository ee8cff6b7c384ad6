import type { Tree, SyntaxNode } from "tree-sitter";
import { BaseAdapter, createClearCacheFunction } from "./BaseAdapter.js";
import type {
  RawCall,
  RawDefinition,
  RawMatches,
} from "../treesitter/types.js";
import { compactExpression, isBareIdentifier } from "../treesitter/types.js";

const TYPE_DECLARATIONS = new Set([
  "class_declaration",
  "interface_declaration",
  "enum_declaration",
  "record_declaration",
  "annotation_type_declaration",
]);

type Owner = { kind: "class"; qualifiedName: string } | { kind: "other" };

class JavaAdapter extends BaseAdapter {
  languageId = "java";
  fileExtensions = [".java"] as const;
  protected grammar = "java" as const;

  extractMatches(tree: Tree, _content: string, _filePath: string): RawMatches {
    const definitions: RawDefinition[] = [];
    this.collectDefinitions(tree.rootNode, { kind: "other" }, definitions);

    const calls: RawCall[] = [];
    this.collectCalls(tree.rootNode, calls);

    const imports = tree.rootNode
      .descendantsOfType("import_declaration")
      .map((node) =>
        node.text
          .replace(/^import\s+(static\s+)?/, "")
          .replace(/;$/, "")
          .replace(/\s+/g, ""),
      );

    return { definitions, calls, imports };
  }

  private collectDefinitions(
    node: SyntaxNode,
    owner: Owner,
    definitions: RawDefinition[],
  ): void {
    for (const child of node.namedChildren) {
      if (TYPE_DECLARATIONS.has(child.type)) {
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

      if (
        child.type === "method_declaration" ||
        child.type === "constructor_declaration" ||
        child.type === "compact_constructor_declaration"
      ) {
        const name = child.childForFieldName("name")?.text;
        if (name) {
          definitions.push({
            kind: owner.kind === "class" ? "method" : "function",
            name,
            className: owner.kind === "class" ? owner.qualifiedName : undefined,
            ...this.lineSpan(child),
          });
        }
        // local and anonymous classes inside the body start a fresh scope
        this.collectDefinitions(child, { kind: "other" }, definitions);
        continue;
      }

      const bodyOwner =
        child.type === "class_body" ||
        child.type === "interface_body" ||
        child.type === "enum_body" ||
        child.type === "enum_body_declarations" ||
        child.type === "annotation_type_body"
          ? owner
          : { kind: "other" as const };
      this.collectDefinitions(child, bodyOwner, definitions);
    }
  }

  private collectCalls(node: SyntaxNode, calls: RawCall[]): void {
    if (node.type === "method_invocation") {
      const nameNode = node.childForFieldName("name");
      const objectNode = node.childForFieldName("object");
      if (
        nameNode &&
        isBareIdentifier(nameNode.text) &&
        nameNode.text !== "this" &&
        nameNode.text !== "super"
      ) {
        const expression = objectNode
          ? `${compactExpression(objectNode)}.${nameNode.text}`
          : nameNode.text;
        calls.push(this.callAt(nameNode, nameNode.text, expression));
      }
    } else if (node.type === "object_creation_expression") {
      const typeNode = node.childForFieldName("type");
      const nameNode = typeNode ? constructedTypeName(typeNode) : null;
      if (typeNode && nameNode) {
        calls.push(
          this.callAt(nameNode, nameNode.text, `new ${compactExpression(typeNode)}`),
        );
      }
    }

    for (const child of node.namedChildren) {
      this.collectCalls(child, calls);
    }
  }
}

/**
 * `Foo` in `new Foo()`, `new Foo<Bar>()` and `new pkg.Outer.Foo()`.
 */
function constructedTypeName(type: SyntaxNode): SyntaxNode | null {
  switch (type.type) {
    case "type_identifier":
      return type;
    case "generic_type": {
      const inner = type.namedChildren[0];
      return inner ? constructedTypeName(inner) : null;
    }
    case "scoped_type_identifier": {
      const last = type.namedChildren[type.namedChildren.length - 1];
      return last ? constructedTypeName(last) : null;
    }
    default:
      return null;
  }
}

const clearCache = createClearCacheFunction("java");

export { JavaAdapter, clearCache };
