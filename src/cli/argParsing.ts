import { parseArgs } from "util";
import { isLogLevel } from "../util/logger.js";
import { ValidationError } from "../model/errors.js";
import type {
  CallStackOptions,
  CLIOptions,
  GenerateOptions,
  LookupOptions,
  RepoCommandOptions,
  ShowOptions,
} from "./types.js";

export const CLI_OPTIONS = {
  help: { type: "boolean", short: "h" },
  version: { type: "boolean", short: "v" },
  config: { type: "string", short: "c" },
  "log-level": { type: "string" },
  output: { type: "string", short: "o" },
  force: { type: "boolean", short: "f" },
  json: { type: "boolean" },
  ref: { type: "string" },
  file: { type: "string" },
  line: { type: "string" },
  name: { type: "string" },
  language: { type: "string" },
  "max-depth": { type: "string" },
  concurrency: { type: "string" },
  "worker-threads": { type: "boolean" },
} as const;

export interface ParsedOptionValues {
  help?: boolean;
  version?: boolean;
  config?: string;
  "log-level"?: string;
  output?: string;
  force?: boolean;
  json?: boolean;
  ref?: string;
  file?: string;
  line?: string;
  name?: string;
  language?: string;
  "max-depth"?: string;
  concurrency?: string;
  "worker-threads"?: boolean;
}

export interface ParsedCommandLine {
  command: string | undefined;
  args: string[];
  values: ParsedOptionValues;
}

export function parseCommandLine(argv: string[]): ParsedCommandLine {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    strict: true,
    options: CLI_OPTIONS,
  });
  return {
    command: positionals[0],
    args: positionals.slice(1),
    values,
  };
}

function parseInteger(flag: string, value: string, min: number): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < min) {
    throw new ValidationError(`--${flag} must be an integer >= ${min}, got "${value}"`);
  }
  return parsed;
}

function requireValue(flag: string, value: string | undefined): string {
  if (value === undefined || value.length === 0) {
    throw new ValidationError(`--${flag} is required`);
  }
  return value;
}

export function parseGlobalOptions(values: ParsedOptionValues): CLIOptions {
  const options: CLIOptions = {};
  if (values.config !== undefined) {
    options.config = values.config;
  }
  const logLevel = values["log-level"];
  if (logLevel !== undefined) {
    if (!isLogLevel(logLevel)) {
      throw new ValidationError(
        `--log-level must be one of debug, info, warn, error, got "${logLevel}"`,
      );
    }
    options.logLevel = logLevel;
  }
  if (values.output !== undefined) {
    options.output = values.output;
  }
  if (values.force === true) {
    options.force = true;
  }
  if (values.json === true) {
    options.json = true;
  }
  return options;
}

function parseRepoOptions(
  args: string[],
  global: CLIOptions,
  values: ParsedOptionValues,
): RepoCommandOptions {
  const repoPath = args[0];
  if (!repoPath) {
    throw new ValidationError("A repository directory is required");
  }
  return { ...global, repoPath, ref: values.ref ?? "HEAD" };
}

export function parseGenerateOptions(
  args: string[],
  global: CLIOptions,
  values: ParsedOptionValues,
): GenerateOptions {
  const options: GenerateOptions = parseRepoOptions(args, global, values);
  if (values["worker-threads"] === true) {
    options.workerThreads = true;
  }
  if (values.concurrency !== undefined) {
    options.concurrency = parseInteger("concurrency", values.concurrency, 1);
  }
  return options;
}

export function parseCallStackOptions(
  args: string[],
  global: CLIOptions,
  values: ParsedOptionValues,
): CallStackOptions {
  const options: CallStackOptions = {
    ...parseRepoOptions(args, global, values),
    file: requireValue("file", values.file),
    line: parseInteger("line", requireValue("line", values.line), 1),
  };
  if (values["max-depth"] !== undefined) {
    options.maxDepth = parseInteger("max-depth", values["max-depth"], 0);
  }
  return options;
}

export function parseLookupOptions(
  args: string[],
  global: CLIOptions,
  values: ParsedOptionValues,
): LookupOptions {
  const options: LookupOptions = {
    ...parseRepoOptions(args, global, values),
    name: requireValue("name", values.name),
  };
  if (values.language !== undefined) {
    options.language = values.language;
  }
  return options;
}

export function parseShowOptions(
  args: string[],
  global: CLIOptions,
  values: ParsedOptionValues,
): ShowOptions {
  const options: ShowOptions = {
    ...parseRepoOptions(args, global, values),
    file: requireValue("file", values.file),
  };
  if (values.line !== undefined) {
    options.line = parseInteger("line", values.line, 1);
  }
  if (values.name !== undefined) {
    options.name = values.name;
  }
  if (options.line === undefined && options.name === undefined) {
    throw new ValidationError("show needs --line or --name");
  }
  return options;
}
