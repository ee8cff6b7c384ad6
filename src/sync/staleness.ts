import type { RepoMetadata } from "../model/types.js";
import type { FingerprintProvider, ModelStore, PersistedModel } from "./types.js";
import { PersistenceError } from "../model/errors.js";
import { logger } from "../util/logger.js";

/**
 * True only when a persisted model exists for the same repository and
 * its fingerprint equals the current one. Anything unknown means stale.
 */
export function isUpToDate(
  persisted: RepoMetadata | undefined,
  currentFingerprint: string | undefined,
  repository?: string,
): boolean {
  if (!persisted || !persisted.fingerprint || !currentFingerprint) {
    return false;
  }
  if (repository !== undefined && persisted.repository !== repository) {
    return false;
  }
  return persisted.fingerprint === currentFingerprint;
}

export interface FreshnessCheck {
  current: boolean;
  fingerprint?: string;
  persisted?: PersistedModel;
  warnings: string[];
}

/**
 * Loads the persisted model and compares it with the repository's
 * current fingerprint. An unreadable or outdated persisted model, and a
 * fingerprint that cannot be had, count as stale with a warning.
 */
export async function checkFreshness(
  store: ModelStore,
  outputPath: string,
  fingerprints: FingerprintProvider,
  repository: string,
  ref: string,
): Promise<FreshnessCheck> {
  const warnings: string[] = [];

  let persisted: PersistedModel | undefined;
  try {
    persisted = await store.load(outputPath);
  } catch (error) {
    if (!(error instanceof PersistenceError)) {
      throw error;
    }
    warnings.push(`Persisted model is unusable, regenerating: ${error.message}`);
    logger.warn("Persisted model is unusable", { outputPath, error });
  }

  let fingerprint: string | undefined;
  try {
    fingerprint = await fingerprints.getFingerprint(repository, ref);
    if (fingerprint === undefined) {
      warnings.push(`Fingerprint unavailable for ${repository} at ${ref}, regenerating`);
      logger.warn("Fingerprint unavailable", { repository, ref });
    }
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    warnings.push(`Fingerprint lookup failed, regenerating: ${message}`);
    logger.warn("Fingerprint lookup failed", { repository, ref, error });
  }

  const current = isUpToDate(persisted?.metadata, fingerprint, repository);
  logger.debug("Freshness check", {
    repository,
    ref,
    current,
    persistedFingerprint: persisted?.metadata.fingerprint,
    fingerprint,
  });

  return { current, fingerprint, persisted, warnings };
}
