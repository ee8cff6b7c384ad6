import type { LookupOptions } from "../types.js";
import { loadRepoModel, setupCommand } from "./context.js";
import { lookupDefinitionsByName } from "../../graph/symbolIndex.js";

export async function lookupCommand(options: LookupOptions): Promise<void> {
  const config = setupCommand(options);
  const { model } = await loadRepoModel(options, config);

  const definitions = lookupDefinitionsByName(model, options.name, options.language);

  if (options.json) {
    console.log(
      JSON.stringify(
        definitions.map(({ calls, ...definition }) => ({
          ...definition,
          callCount: calls.length,
        })),
        null,
        2,
      ),
    );
    return;
  }

  if (definitions.length === 0) {
    console.log(`No definitions named ${options.name}`);
    return;
  }
  for (const def of definitions) {
    console.log(
      `${def.kind} ${def.qualifiedName} ${def.filePath}:${def.startLine}-${def.endLine}`,
    );
  }
}
