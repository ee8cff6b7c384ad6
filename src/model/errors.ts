export enum ErrorCode {
  CONFIG_ERROR = "CONFIG_ERROR",
  FETCH_FAILURE = "FETCH_FAILURE",
  REF_NOT_FOUND = "REF_NOT_FOUND",
  RESOURCE_EXHAUSTED = "RESOURCE_EXHAUSTED",
  PERSISTENCE_ERROR = "PERSISTENCE_ERROR",
  VALIDATION_ERROR = "VALIDATION_ERROR",
  PARSE_FAILURE = "PARSE_FAILURE",
}

export class ConfigError extends Error {
  readonly code = ErrorCode.CONFIG_ERROR;
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/**
 * Transport or authentication failure while acquiring repository content.
 */
export class FetchFailureError extends Error {
  readonly code = ErrorCode.FETCH_FAILURE;
  constructor(
    message: string,
    readonly repository: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "FetchFailureError";
  }
}

export class RefNotFoundError extends Error {
  readonly code = ErrorCode.REF_NOT_FOUND;
  constructor(
    readonly repository: string,
    readonly ref: string,
  ) {
    super(`No ref found in repository ${repository} by name: ${ref}`);
    this.name = "RefNotFoundError";
  }
}

/**
 * A fault in a resource shared by every file (memory, the worker pool).
 * Aborts the whole generation run.
 */
export class ResourceExhaustedError extends Error {
  readonly code = ErrorCode.RESOURCE_EXHAUSTED;
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ResourceExhaustedError";
  }
}

export class PersistenceError extends Error {
  readonly code = ErrorCode.PERSISTENCE_ERROR;
  constructor(
    message: string,
    readonly path: string,
  ) {
    super(message);
    this.name = "PersistenceError";
  }
}

export class ValidationError extends Error {
  readonly code = ErrorCode.VALIDATION_ERROR;
  constructor(message: string) {
    super(message);
    this.name = "ValidationError";
  }
}

/**
 * Raised by an adapter when a file does not parse cleanly. Caught by the
 * file processor and turned into a per-file failure.
 */
export class SourceParseError extends Error {
  readonly code = ErrorCode.PARSE_FAILURE;
  constructor(
    message: string,
    readonly line?: number,
  ) {
    super(message);
    this.name = "SourceParseError";
  }
}

const RESOURCE_FAULT_CODES = new Set<string>([
  ErrorCode.RESOURCE_EXHAUSTED,
  "ERR_WORKER_OUT_OF_MEMORY",
  "ERR_WORKER_INIT_FAILED",
  "ERR_MEMORY_ALLOCATION_FAILED",
  "ENOMEM",
]);

/**
 * True for errors that signal exhaustion of a process-wide resource
 * rather than a problem with one input file.
 */
export function isResourceExhaustion(error: unknown): boolean {
  if (error instanceof ResourceExhaustedError) {
    return true;
  }
  if (!(error instanceof Error)) {
    return false;
  }
  if ("code" in error && typeof error.code === "string") {
    if (RESOURCE_FAULT_CODES.has(error.code)) {
      return true;
    }
  }
  return (
    error instanceof RangeError &&
    /allocation failed|out of memory/i.test(error.message)
  );
}

export interface ErrorDetail {
  message: string;
  code?: string;
}

export function errorToResponse(error: unknown): { error: ErrorDetail } {
  if (error instanceof Error) {
    const detail: ErrorDetail = {
      message: error.message,
    };
    if ("code" in error && typeof error.code === "string") {
      detail.code = error.code;
    }
    return { error: detail };
  }
  return {
    error: {
      message: String(error),
    },
  };
}
