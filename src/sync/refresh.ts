import type { FileFailure, RepoMetadata, RepoModel } from "../model/types.js";
import type { ContentProvider, FingerprintProvider, ModelStore } from "./types.js";
import { withContentSnapshot } from "./types.js";
import { checkFreshness } from "./staleness.js";
import { generate } from "../indexer/pipeline.js";
import type { GenerateOptions, GenerateStats } from "../indexer/pipeline.js";
import { CALLMAP_VERSION } from "../config/constants.js";
import { logger } from "../util/logger.js";
import { SPAN_NAMES, setSpanAttributes, withSpan } from "../util/tracing.js";

export interface RefreshOptions {
  repository: string;
  ref: string;
  outputPath: string;
  provider: ContentProvider;
  /** Defaults to the content provider when it can fingerprint. */
  fingerprints?: FingerprintProvider;
  store: ModelStore;
  /** Regenerate even when the persisted model is current. */
  force?: boolean;
  generateOptions?: GenerateOptions;
}

export type RefreshResult =
  | {
      regenerated: false;
      model: RepoModel;
      metadata: RepoMetadata;
      warnings: string[];
    }
  | {
      regenerated: true;
      model: RepoModel;
      metadata: RepoMetadata;
      failures: FileFailure[];
      cancelled: boolean;
      stats: GenerateStats;
      warnings: string[];
    };

function canFingerprint(
  provider: ContentProvider,
): provider is ContentProvider & FingerprintProvider {
  return "getFingerprint" in provider && typeof provider.getFingerprint === "function";
}

/**
 * Reuses the persisted model when its fingerprint matches the
 * repository; otherwise fetches the content, regenerates and saves. A
 * cancelled generation is returned but not saved.
 */
export async function refreshRepoModel(options: RefreshOptions): Promise<RefreshResult> {
  const { repository, ref, outputPath, provider, store } = options;

  return withSpan(
    SPAN_NAMES.REFRESH,
    async (span) => {
      const warnings: string[] = [];
      const fingerprints =
        options.fingerprints ?? (canFingerprint(provider) ? provider : undefined);

      if (!options.force && fingerprints) {
        const freshness = await checkFreshness(
          store,
          outputPath,
          fingerprints,
          repository,
          ref,
        );
        warnings.push(...freshness.warnings);
        if (freshness.current && freshness.persisted) {
          logger.info("Model is up to date", {
            repository,
            ref,
            fingerprint: freshness.fingerprint,
          });
          setSpanAttributes(span, { "callmap.regenerated": false });
          return {
            regenerated: false,
            model: freshness.persisted.model,
            metadata: freshness.persisted.metadata,
            warnings,
          };
        }
      }

      const result = await withContentSnapshot(provider, repository, ref, async (snapshot) => {
        const generated = await generate(snapshot.files, options.generateOptions);
        const metadata: RepoMetadata = {
          repository,
          ref: snapshot.ref,
          ...(snapshot.fingerprint ? { fingerprint: snapshot.fingerprint } : {}),
          generatedAt: new Date().toISOString(),
          toolVersion: CALLMAP_VERSION,
        };
        return { ...generated, metadata };
      });

      if (result.cancelled) {
        warnings.push("Generation was cancelled; the partial model was not saved");
      } else {
        await store.save(outputPath, result.model, result.metadata);
      }

      setSpanAttributes(span, {
        "callmap.regenerated": true,
        "callmap.cancelled": result.cancelled,
      });
      return {
        regenerated: true,
        model: result.model,
        metadata: result.metadata,
        failures: result.failures,
        cancelled: result.cancelled,
        stats: result.stats,
        warnings,
      };
    },
    { "callmap.repository": repository, "callmap.ref": ref },
  );
}
