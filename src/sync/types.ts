import type { RepoMetadata, RepoModel, SourceFile } from "../model/types.js";

/**
 * Repository content at one ref, owned by the provider that fetched it.
 * Valid until `release()`.
 */
export interface ContentSnapshot {
  files: readonly SourceFile[];
  /** Latest commit id or another opaque content fingerprint. */
  fingerprint?: string;
  ref: string;
  release(): Promise<void>;
}

export interface ContentProvider {
  /**
   * Fails with RefNotFoundError for an unknown ref and with
   * FetchFailureError for transport or authentication problems.
   */
  fetch(repository: string, ref: string): Promise<ContentSnapshot>;
}

export interface FingerprintProvider {
  /** Undefined when the fingerprint cannot be determined. */
  getFingerprint(repository: string, ref: string): Promise<string | undefined>;
}

export interface PersistedModel {
  metadata: RepoMetadata;
  model: RepoModel;
}

export interface ModelStore {
  /** Undefined when nothing has been saved at the path yet. */
  load(path: string): Promise<PersistedModel | undefined>;
  save(path: string, model: RepoModel, metadata: RepoMetadata): Promise<void>;
}

/**
 * Fetches a snapshot, hands it to fn and releases it on every exit path.
 */
export async function withContentSnapshot<T>(
  provider: ContentProvider,
  repository: string,
  ref: string,
  fn: (snapshot: ContentSnapshot) => Promise<T>,
): Promise<T> {
  const snapshot = await provider.fetch(repository, ref);
  try {
    return await fn(snapshot);
  } finally {
    await snapshot.release();
  }
}
