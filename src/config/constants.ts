/**
 * Constants for callmap
 *
 * Named defaults shared by the config schema, the pipeline and the
 * call stack resolver.
 */

import { availableParallelism } from "os";

// ============================================================================
// Package
// ============================================================================

export const CALLMAP_VERSION = "0.3.0";

export const CONFIG_FILE_NAME = "callmap.config.json";

/**
 * Environment variable holding an explicit config file path.
 */
export const CONFIG_ENV_VAR = "CALLMAP_CONFIG";

// ============================================================================
// Indexing
// ============================================================================

/**
 * Files larger than this are reported as parse failures instead of being
 * handed to a parser.
 */
export const MAX_FILE_BYTES = 2_000_000;

/**
 * Upper bound for the worker count, whatever the host reports.
 */
export const MAX_INDEXING_CONCURRENCY = 32;

/**
 * One worker per available core, leaving one for the aggregator.
 */
export const DEFAULT_INDEXING_CONCURRENCY = Math.max(
  1,
  Math.min(availableParallelism() - 1, MAX_INDEXING_CONCURRENCY),
);

/**
 * Concurrent file reads while loading a local checkout.
 */
export const DEFAULT_READ_CONCURRENCY = 16;

export const DEFAULT_IGNORE_GLOBS = [
  "**/node_modules/**",
  "**/dist/**",
  "**/build/**",
  "**/.git/**",
];

// ============================================================================
// Call stacks
// ============================================================================

export const DEFAULT_CALLSTACK_MAX_DEPTH = 8;

export const MAX_CALLSTACK_DEPTH = 64;

/**
 * Hard cap on the number of entries in one call stack tree. Wide fan-out
 * through ambiguous names can otherwise grow the tree exponentially.
 */
export const DEFAULT_CALLSTACK_MAX_NODES = 10_000;

// ============================================================================
// Model
// ============================================================================

/**
 * Name of the synthetic definition that owns module-level calls.
 */
export const MODULE_SCOPE_NAME = "<module>";

export const MODEL_FORMAT_VERSION = 2;

export const DEFAULT_OUTPUT_PATH = "callmap.json";

// Tree-sitter has a default 32KB buffer limit that causes "Invalid argument"
// errors on larger files.
export const TREESITTER_BUFFER_SIZE = 1024 * 1024;

export const GRAMMAR_QUERY_LENGTH = 120;
