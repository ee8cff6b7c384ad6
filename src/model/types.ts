/**
 * Language-agnostic entity model shared by every stage of the pipeline.
 */

export type DefinitionKind = "function" | "method" | "class" | "module";

export interface SourceFile {
  /** Repository-relative path with forward slashes. */
  readonly path: string;
  /** Language tag; detected from the extension when absent. */
  readonly language?: string;
  readonly content: string;
}

export interface CallSite {
  /** Bare callable name used for lookup. */
  callee: string;
  /** Callee text as written at the call expression. */
  expression: string;
  line: number;
  column: number;
}

export interface Definition {
  kind: DefinitionKind;
  name: string;
  qualifiedName: string;
  className?: string;
  filePath: string;
  /** 1-based, inclusive. */
  startLine: number;
  /** 1-based, inclusive. */
  endLine: number;
  calls: CallSite[];
}

export interface FileModel {
  language: string;
  lineCount: number;
  definitions: Definition[];
  /** Imported modules, headers or packages as written, first occurrence order. */
  imports: string[];
}

export interface RepoModel {
  files: Record<string, FileModel>;
}

export interface RepoMetadata {
  repository: string;
  ref: string;
  /** Opaque content fingerprint, usually the latest commit id. */
  fingerprint?: string;
  generatedAt: string;
  toolVersion: string;
}

export type FileFailureKind =
  | "UnsupportedLanguage"
  | "ParseFailure"
  | "WorkerFailure"
  | "Cancelled";

export interface FileFailure {
  path: string;
  kind: FileFailureKind;
  message: string;
  line?: number;
}

export function emptyRepoModel(): RepoModel {
  return { files: {} };
}

/**
 * Identity of a definition across the model: file, qualified name and
 * range. Two same-named overloads in one file still differ by range.
 */
export function definitionKey(definition: Definition): string {
  return `${definition.filePath}:${definition.qualifiedName}:${definition.startLine}-${definition.endLine}`;
}

/**
 * File entry by repository-relative path. Only the model's own keys
 * match, never inherited object members.
 */
export function getFileModel(model: RepoModel, path: string): FileModel | undefined {
  return Object.hasOwn(model.files, path) ? model.files[path] : undefined;
}

export function countDefinitions(model: RepoModel): number {
  let total = 0;
  for (const file of Object.values(model.files)) {
    total += file.definitions.length;
  }
  return total;
}
