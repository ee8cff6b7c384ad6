import type { CallStackOptions } from "../types.js";
import { loadRepoModel, setupCommand } from "./context.js";
import { callStackErrorToMessage, resolveCallStack } from "../../graph/callStack.js";
import { formatCallStack } from "../../graph/format.js";

export async function callstackCommand(options: CallStackOptions): Promise<void> {
  const config = setupCommand(options);
  const { model } = await loadRepoModel(options, config);

  const result = resolveCallStack(
    model,
    options.file,
    options.line,
    options.maxDepth ?? config.callStack.maxDepth,
    { maxNodes: config.callStack.maxNodes },
  );

  if (!result.ok) {
    console.error(callStackErrorToMessage(result.error));
    process.exitCode = 1;
    return;
  }

  console.log(formatCallStack(result.tree, options.json ? "json" : "text"));
}
