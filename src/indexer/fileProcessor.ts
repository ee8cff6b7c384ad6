import type { Definition, FileFailure, SourceFile } from "../model/types.js";
import type { LanguageAdapter } from "./adapter/LanguageAdapter.js";
import {
  getAdapterForExtension,
  getAdapterForLanguage,
} from "./adapter/registry.js";
import { normalizeMatches } from "./normalizer.js";
import { extensionOf, normalizePath } from "../util/paths.js";
import {
  ResourceExhaustedError,
  SourceParseError,
  isResourceExhaustion,
} from "../model/errors.js";
import { MAX_FILE_BYTES } from "../config/constants.js";

export interface ProcessFileOptions {
  maxFileBytes?: number;
}

export type FileOutcome =
  | {
      ok: true;
      path: string;
      language: string;
      lineCount: number;
      definitions: Definition[];
      imports: string[];
    }
  | { ok: false; failure: FileFailure };

/**
 * Lines in the file; a trailing newline does not start a new line.
 */
export function countLines(content: string): number {
  if (content === "") {
    return 0;
  }
  const lines = content.split("\n").length;
  return content.endsWith("\n") ? lines - 1 : lines;
}

function resolveAdapter(file: SourceFile, path: string): LanguageAdapter | null {
  const byExtension = getAdapterForExtension(extensionOf(path));
  if (!file.language) {
    return byExtension;
  }
  if (byExtension && byExtension.languageId === file.language) {
    return byExtension;
  }
  return getAdapterForLanguage(file.language);
}

function failure(
  path: string,
  kind: FileFailure["kind"],
  message: string,
  line?: number,
): FileOutcome {
  return {
    ok: false,
    failure: line === undefined ? { path, kind, message } : { path, kind, message, line },
  };
}

/**
 * Parses one file and normalizes its definitions. Problems with the file
 * itself come back as a failure outcome; only exhaustion of a shared
 * resource is thrown, as ResourceExhaustedError.
 */
export function processSourceFile(
  file: SourceFile,
  options: ProcessFileOptions = {},
): FileOutcome {
  const path = normalizePath(file.path);
  const adapter = resolveAdapter(file, path);
  if (!adapter) {
    return failure(
      path,
      "UnsupportedLanguage",
      file.language
        ? `No adapter for language: ${file.language}`
        : `No adapter for extension: ${extensionOf(path) || "(none)"}`,
    );
  }

  const maxFileBytes = options.maxFileBytes ?? MAX_FILE_BYTES;
  const size = Buffer.byteLength(file.content, "utf8");
  if (size > maxFileBytes) {
    return failure(path, "ParseFailure", `file too large (${size} bytes > ${maxFileBytes})`);
  }

  try {
    const tree = adapter.parse(file.content, path);
    const lineCount = countLines(file.content);
    const raw = adapter.extractMatches(tree, file.content, path);
    return {
      ok: true,
      path,
      language: adapter.languageId,
      lineCount,
      definitions: normalizeMatches(path, lineCount, raw),
      imports: [...new Set(raw.imports)],
    };
  } catch (error) {
    if (isResourceExhaustion(error)) {
      throw error instanceof ResourceExhaustedError
        ? error
        : new ResourceExhaustedError(`Resource exhausted while parsing ${path}`, {
            cause: error,
          });
    }
    if (error instanceof SourceParseError) {
      return failure(path, "ParseFailure", error.message, error.line);
    }
    return failure(
      path,
      "ParseFailure",
      error instanceof Error ? error.message : String(error),
    );
  }
}
