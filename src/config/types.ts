import { z } from "zod";
import {
  MAX_FILE_BYTES,
  DEFAULT_INDEXING_CONCURRENCY,
  MAX_INDEXING_CONCURRENCY,
  DEFAULT_IGNORE_GLOBS,
  DEFAULT_CALLSTACK_MAX_DEPTH,
  MAX_CALLSTACK_DEPTH,
  DEFAULT_CALLSTACK_MAX_NODES,
  DEFAULT_OUTPUT_PATH,
} from "./constants.js";

export const LogLevelSchema = z.enum(["debug", "info", "warn", "error"]);

export const IndexingConfigSchema = z.object({
  concurrency: z
    .number()
    .int()
    .min(1)
    .max(MAX_INDEXING_CONCURRENCY)
    .default(DEFAULT_INDEXING_CONCURRENCY),
  workerThreads: z.boolean().default(false),
  maxFileBytes: z.number().int().min(1).default(MAX_FILE_BYTES),
  ignore: z.array(z.string()).default(DEFAULT_IGNORE_GLOBS),
});

export type IndexingConfig = z.infer<typeof IndexingConfigSchema>;

export const CallStackConfigSchema = z.object({
  maxDepth: z
    .number()
    .int()
    .min(0)
    .max(MAX_CALLSTACK_DEPTH)
    .default(DEFAULT_CALLSTACK_MAX_DEPTH),
  maxNodes: z.number().int().min(1).default(DEFAULT_CALLSTACK_MAX_NODES),
});

export type CallStackConfig = z.infer<typeof CallStackConfigSchema>;

export const OutputConfigSchema = z.object({
  path: z.string().min(1).default(DEFAULT_OUTPUT_PATH),
});

export const TracingConfigSchema = z.object({
  enabled: z.boolean().default(false),
  exporterType: z.enum(["console", "memory"]).default("console"),
  serviceName: z.string().min(1).optional(),
});

export type TracingConfig = z.infer<typeof TracingConfigSchema>;

export const AppConfigSchema = z.object({
  logLevel: LogLevelSchema.default("info"),
  indexing: IndexingConfigSchema.default({}),
  callStack: CallStackConfigSchema.default({}),
  output: OutputConfigSchema.default({}),
  tracing: TracingConfigSchema.default({}),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;
