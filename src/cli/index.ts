#!/usr/bin/env node

import { versionCommand } from "./commands/version.js";
import { generateCommand } from "./commands/generate.js";
import { callstackCommand } from "./commands/callstack.js";
import { lookupCommand } from "./commands/lookup.js";
import { showCommand } from "./commands/show.js";
import {
  parseCommandLine,
  parseGlobalOptions,
  parseGenerateOptions,
  parseCallStackOptions,
  parseLookupOptions,
  parseShowOptions,
} from "./argParsing.js";
import { errorToResponse } from "../model/errors.js";
import { shutdownTracing } from "../util/tracing.js";

async function main(): Promise<void> {
  const { command, args, values } = parseCommandLine(process.argv.slice(2));

  if (values.help) {
    showHelp();
    return;
  }

  const global = parseGlobalOptions(values);

  if (values.version) {
    await versionCommand(global);
    return;
  }

  if (!command) {
    showHelp();
    process.exitCode = 1;
    return;
  }

  switch (command) {
    case "generate":
      await generateCommand(parseGenerateOptions(args, global, values));
      break;

    case "callstack":
      await callstackCommand(parseCallStackOptions(args, global, values));
      break;

    case "lookup":
      await lookupCommand(parseLookupOptions(args, global, values));
      break;

    case "show":
      await showCommand(parseShowOptions(args, global, values));
      break;

    case "version":
      await versionCommand(global);
      break;

    default:
      console.error(`Unknown command: ${command}`);
      console.error("");
      showHelp();
      process.exitCode = 1;
  }
}

function showHelp(): void {
  console.log(`
callmap - cross-language call map and call stack explorer

Usage:
  callmap [global-options] <command> <repo-dir> [command-options]

Commands:
  generate          Build (or reuse) the model for a directory
  callstack         Call stack starting at --file/--line
  lookup            Definitions carrying --name
  show              Source of the definition at --line or named --name in --file
  version           Show version information

Global Options:
  -c, --config PATH      Path to configuration file
  --log-level LEVEL      Log level: debug, info, warn, error (default: info)
  -o, --output PATH      Model file (default: callmap.json in the repo directory)
  -f, --force            Regenerate even when the saved model is current
  --json                 Print JSON instead of text
  --ref REF              Ref the work tree must be at (default: HEAD)
  -h, --help             Show this help message
  -v, --version          Show version

 Generate Options:
   --concurrency N       Files processed at once
   --worker-threads      Parse in worker threads (needs a build)

 Callstack Options:
   --file PATH           Repository-relative file (required)
   --line N              1-based line (required)
   --max-depth N         Expansion depth (default from config)

 Lookup Options:
   --name NAME           Bare definition name (required)
   --language ID         Only definitions in this language

 Show Options:
   --file PATH           Repository-relative file (required)
   --line N | --name NAME

 Examples:
   callmap generate .
   callmap callstack . --file src/app.py --line 12 --max-depth 4
   callmap lookup . --name run --json
   callmap show . --file src/app.py --name main
`);
}

function reportFatal(error: unknown): void {
  if (process.argv.includes("--json")) {
    console.error(JSON.stringify(errorToResponse(error)));
  } else {
    console.error(
      `Fatal error: ${error instanceof Error ? error.message : String(error)}`,
    );
  }
  process.exitCode = 1;
}

main()
  .catch(reportFatal)
  .then(() => shutdownTracing())
  .catch(reportFatal);
