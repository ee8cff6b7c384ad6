import { readFile } from "fs/promises";
import type { ShowOptions } from "../types.js";
import { loadRepoModel, setupCommand } from "./context.js";
import { getDefinitionSource } from "../../graph/locate.js";
import type { DefinitionLocator } from "../../graph/locate.js";
import { normalizePath, resolveWithinRoot } from "../../util/paths.js";

export async function showCommand(options: ShowOptions): Promise<void> {
  const config = setupCommand(options);
  const { model } = await loadRepoModel(options, config);

  const filePath = normalizePath(options.file);
  const content = await readFile(resolveWithinRoot(options.repoPath, filePath), "utf8");
  const locator: DefinitionLocator =
    options.line !== undefined ? { line: options.line } : { name: options.name ?? "" };

  const source = getDefinitionSource(model, filePath, content, locator);
  if (!source) {
    const target = "line" in locator ? `line ${locator.line}` : locator.name;
    console.error(`No definition found for ${target} in ${filePath}`);
    process.exitCode = 1;
    return;
  }

  if (options.json) {
    console.log(JSON.stringify({ ...source.definition, text: source.text }, null, 2));
    return;
  }

  const { definition } = source;
  console.log(
    `# ${definition.qualifiedName} (${definition.filePath}:${definition.startLine}-${definition.endLine})`,
  );
  console.log(source.text);
}
