import type { GenerateOptions } from "../types.js";
import { loadRepoModel, resolveOutputPath, setupCommand } from "./context.js";
import { countDefinitions } from "../../model/types.js";

export async function generateCommand(options: GenerateOptions): Promise<void> {
  const config = setupCommand(options);
  const controller = new AbortController();
  const onSignal = (): void => {
    controller.abort();
  };
  process.once("SIGINT", onSignal);

  try {
    const result = await loadRepoModel(options, config, {
      signal: controller.signal,
      ...(options.workerThreads ? { workerThreads: true } : {}),
      ...(options.concurrency !== undefined ? { concurrency: options.concurrency } : {}),
    });
    const outputPath = resolveOutputPath(options, config);

    if (options.json) {
      console.log(
        JSON.stringify(
          {
            outputPath,
            regenerated: result.regenerated,
            metadata: result.metadata,
            ...(result.regenerated
              ? { stats: result.stats, failures: result.failures, cancelled: result.cancelled }
              : {}),
          },
          null,
          2,
        ),
      );
      return;
    }

    if (!result.regenerated) {
      console.log(`Model is up to date (${result.metadata.fingerprint ?? "no fingerprint"})`);
      console.log(`  Files: ${Object.keys(result.model.files).length}`);
      console.log(`  Definitions: ${countDefinitions(result.model)}`);
      console.log(`  Output: ${outputPath}`);
      return;
    }

    const { stats } = result;
    console.log(result.cancelled ? "Generation cancelled" : "Generated model");
    console.log(`  Files indexed: ${stats.filesIndexed}/${stats.filesTotal}`);
    console.log(`  Definitions: ${stats.definitions}`);
    console.log(`  Unsupported: ${stats.filesUnsupported}`);
    console.log(`  Failed: ${stats.filesFailed}`);
    console.log(`  Duration: ${stats.durationMs}ms`);
    if (!result.cancelled) {
      console.log(`  Output: ${outputPath}`);
    }
    for (const failure of result.failures) {
      if (failure.kind === "ParseFailure" || failure.kind === "WorkerFailure") {
        const where = failure.line !== undefined ? `:${failure.line}` : "";
        console.log(`  ${failure.kind} ${failure.path}${where}: ${failure.message}`);
      }
    }
  } finally {
    process.removeListener("SIGINT", onSignal);
  }
}
