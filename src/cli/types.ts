import type { LogLevel } from "../util/logger.js";

export type { LogLevel };

export interface CLIOptions {
  config?: string;
  logLevel?: LogLevel;
  /** Model file; relative paths resolve against the repository directory. */
  output?: string;
  force?: boolean;
  json?: boolean;
}

export interface RepoCommandOptions extends CLIOptions {
  repoPath: string;
  ref: string;
}

export interface GenerateOptions extends RepoCommandOptions {
  workerThreads?: boolean;
  concurrency?: number;
}

export interface CallStackOptions extends RepoCommandOptions {
  file: string;
  line: number;
  maxDepth?: number;
}

export interface LookupOptions extends RepoCommandOptions {
  name: string;
  language?: string;
}

export interface ShowOptions extends RepoCommandOptions {
  file: string;
  line?: number;
  name?: string;
}

export interface VersionOptions extends CLIOptions {}
