import type { Definition, RepoModel } from "../model/types.js";
import { getFileModel } from "../model/types.js";
import { innermostContaining } from "../indexer/normalizer.js";
import { normalizePath } from "../util/paths.js";

/**
 * Innermost definition in the file whose range contains the line. The
 * module scope, spanning the whole file, only wins when nothing else
 * contains the line.
 */
export function findEnclosingDefinition(
  model: RepoModel,
  filePath: string,
  line: number,
): Definition | undefined {
  const file = getFileModel(model, normalizePath(filePath));
  if (!file) {
    return undefined;
  }
  return innermostContaining(file.definitions, line);
}

export type DefinitionLocator = { line: number } | { name: string };

export interface DefinitionSource {
  definition: Definition;
  text: string;
}

/**
 * Source text of a definition in one file, picked either by a line it
 * encloses or by name. A name matches the bare or the qualified name;
 * the first match in line order wins.
 */
export function getDefinitionSource(
  model: RepoModel,
  filePath: string,
  content: string,
  locator: DefinitionLocator,
): DefinitionSource | undefined {
  const file = getFileModel(model, normalizePath(filePath));
  if (!file) {
    return undefined;
  }

  const definition =
    "line" in locator
      ? innermostContaining(file.definitions, locator.line)
      : file.definitions.find(
          (def) =>
            def.kind !== "module" &&
            (def.name === locator.name || def.qualifiedName === locator.name),
        );
  if (!definition) {
    return undefined;
  }

  const lines = content.split("\n");
  return {
    definition,
    text: lines.slice(definition.startLine - 1, definition.endLine).join("\n"),
  };
}
