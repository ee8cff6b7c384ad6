import { isAbsolute, resolve } from "path";
import { loadConfig } from "../../config/loadConfig.js";
import type { AppConfig } from "../../config/types.js";
import { logger } from "../../util/logger.js";
import { initTracing } from "../../util/tracing.js";
import { LocalContentProvider } from "../../sync/localProvider.js";
import { JsonModelStore } from "../../sync/modelStore.js";
import { refreshRepoModel } from "../../sync/refresh.js";
import type { RefreshResult } from "../../sync/refresh.js";
import type { GenerateOptions as PipelineOptions } from "../../indexer/pipeline.js";
import type { CLIOptions, RepoCommandOptions } from "../types.js";

/**
 * Loads the config and applies the logging and tracing settings, with
 * command-line flags taking precedence.
 */
export function setupCommand(options: CLIOptions): AppConfig {
  const config = loadConfig(options.config);
  logger.setLevel(options.logLevel ?? config.logLevel);
  initTracing(config.tracing);
  return config;
}

export function resolveOutputPath(
  options: RepoCommandOptions,
  config: AppConfig,
): string {
  const output = options.output ?? config.output.path;
  return isAbsolute(output) ? output : resolve(options.repoPath, output);
}

/**
 * The repository's model, regenerated when the saved one is stale.
 */
export async function loadRepoModel(
  options: RepoCommandOptions,
  config: AppConfig,
  pipelineOptions: PipelineOptions = {},
): Promise<RefreshResult> {
  const provider = new LocalContentProvider({
    ignore: config.indexing.ignore,
    maxFileBytes: config.indexing.maxFileBytes,
  });

  const result = await refreshRepoModel({
    repository: resolve(options.repoPath),
    ref: options.ref,
    outputPath: resolveOutputPath(options, config),
    provider,
    store: new JsonModelStore(),
    force: options.force,
    generateOptions: {
      concurrency: config.indexing.concurrency,
      workerThreads: config.indexing.workerThreads,
      maxFileBytes: config.indexing.maxFileBytes,
      ...pipelineOptions,
    },
  });

  for (const warning of result.warnings) {
    logger.warn(warning);
  }
  return result;
}
