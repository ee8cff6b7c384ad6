export type {
  CallSite,
  Definition,
  DefinitionKind,
  FileFailure,
  FileFailureKind,
  FileModel,
  RepoMetadata,
  RepoModel,
  SourceFile,
} from "./model/types.js";
export { definitionKey, emptyRepoModel, getFileModel } from "./model/types.js";
export {
  ConfigError,
  ErrorCode,
  FetchFailureError,
  PersistenceError,
  RefNotFoundError,
  ResourceExhaustedError,
  ValidationError,
  errorToResponse,
} from "./model/errors.js";

export { generate } from "./indexer/pipeline.js";
export type {
  GenerateOptions,
  GenerateProgress,
  GenerateResult,
  GenerateStats,
} from "./indexer/pipeline.js";
export { processSourceFile } from "./indexer/fileProcessor.js";
export type { FileOutcome } from "./indexer/fileProcessor.js";
export { normalizeMatches } from "./indexer/normalizer.js";
export {
  detectLanguage,
  getSupportedExtensions,
  registerAdapter,
} from "./indexer/adapter/registry.js";
export type { LanguageAdapter } from "./indexer/adapter/LanguageAdapter.js";
export { BaseAdapter } from "./indexer/adapter/BaseAdapter.js";

export {
  SymbolIndex,
  getSymbolIndex,
  lookupDefinitionsByName,
} from "./graph/symbolIndex.js";
export {
  buildChildrenMap,
  callStackErrorToMessage,
  resolveCallStack,
} from "./graph/callStack.js";
export type {
  CallStackEntry,
  CallStackError,
  CallStackResult,
  CallStackStatus,
  CallStackTree,
  ResolveCallStackOptions,
} from "./graph/callStack.js";
export { findEnclosingDefinition, getDefinitionSource } from "./graph/locate.js";
export type { DefinitionLocator, DefinitionSource } from "./graph/locate.js";
export { formatCallStack, toCallStackJson } from "./graph/format.js";
export type { CallStackFormat, CallStackJson, CallStackNodeJson } from "./graph/format.js";

export { isUpToDate, checkFreshness } from "./sync/staleness.js";
export type { FreshnessCheck } from "./sync/staleness.js";
export { withContentSnapshot } from "./sync/types.js";
export type {
  ContentProvider,
  ContentSnapshot,
  FingerprintProvider,
  ModelStore,
  PersistedModel,
} from "./sync/types.js";
export { LocalContentProvider, GitFingerprintProvider } from "./sync/localProvider.js";
export { JsonModelStore } from "./sync/modelStore.js";
export { refreshRepoModel } from "./sync/refresh.js";
export type { RefreshOptions, RefreshResult } from "./sync/refresh.js";

export { loadConfig, parseConfig } from "./config/loadConfig.js";
export type { AppConfig } from "./config/types.js";
