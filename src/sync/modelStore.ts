import { mkdir, readFile, rename, writeFile } from "fs/promises";
import { dirname } from "path";
import { z } from "zod";
import type { RepoMetadata, RepoModel } from "../model/types.js";
import type { ModelStore, PersistedModel } from "./types.js";
import { PersistenceError } from "../model/errors.js";
import { MODEL_FORMAT_VERSION } from "../config/constants.js";
import { logger } from "../util/logger.js";

const CallSiteSchema = z.object({
  callee: z.string(),
  expression: z.string(),
  line: z.number().int().min(1),
  column: z.number().int().min(0),
});

const DefinitionSchema = z.object({
  kind: z.enum(["function", "method", "class", "module"]),
  name: z.string().min(1),
  qualifiedName: z.string().min(1),
  className: z.string().optional(),
  filePath: z.string(),
  startLine: z.number().int().min(1),
  endLine: z.number().int().min(1),
  calls: z.array(CallSiteSchema),
});

const FileModelSchema = z.object({
  language: z.string().min(1),
  lineCount: z.number().int().min(0),
  definitions: z.array(DefinitionSchema),
  imports: z.array(z.string()),
});

const RepoMetadataSchema = z.object({
  repository: z.string(),
  ref: z.string(),
  fingerprint: z.string().optional(),
  generatedAt: z.string(),
  toolVersion: z.string(),
});

export const PersistedModelSchema = z.object({
  formatVersion: z.literal(MODEL_FORMAT_VERSION),
  metadata: RepoMetadataSchema,
  files: z.record(FileModelSchema),
});

function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/**
 * Stores `{ formatVersion, metadata, files }` as one JSON document.
 * Writes go to a temporary file first and are renamed into place.
 */
export class JsonModelStore implements ModelStore {
  async load(path: string): Promise<PersistedModel | undefined> {
    let text: string;
    try {
      text = await readFile(path, "utf8");
    } catch (error) {
      if (isNotFound(error)) {
        return undefined;
      }
      throw new PersistenceError(
        `Cannot read model: ${error instanceof Error ? error.message : String(error)}`,
        path,
      );
    }

    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (error) {
      throw new PersistenceError(
        `Model is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
        path,
      );
    }

    const parsed = PersistedModelSchema.safeParse(raw);
    if (!parsed.success) {
      const issues = parsed.error.errors
        .slice(0, 5)
        .map((e) => `${e.path.join(".")}: ${e.message}`)
        .join("; ");
      throw new PersistenceError(`Model is corrupt: ${issues}`, path);
    }

    const { metadata, files } = parsed.data;
    logger.debug("Loaded model", { path, files: Object.keys(files).length });
    return { metadata, model: { files } };
  }

  async save(path: string, model: RepoModel, metadata: RepoMetadata): Promise<void> {
    const document = {
      formatVersion: MODEL_FORMAT_VERSION,
      metadata,
      files: model.files,
    };
    const tempPath = `${path}.${process.pid}.tmp`;
    try {
      await mkdir(dirname(path), { recursive: true });
      await writeFile(tempPath, JSON.stringify(document, null, 2) + "\n", "utf8");
      await rename(tempPath, path);
    } catch (error) {
      throw new PersistenceError(
        `Cannot write model: ${error instanceof Error ? error.message : String(error)}`,
        path,
      );
    }
    logger.debug("Saved model", { path, files: Object.keys(model.files).length });
  }
}
