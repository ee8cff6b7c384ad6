import { readFileSync } from "fs";
import { resolve, dirname } from "path";
import { fileURLToPath } from "url";
import { AppConfig, AppConfigSchema } from "./types.js";
import { CONFIG_ENV_VAR, CONFIG_FILE_NAME } from "./constants.js";
import { findPackageRoot } from "../util/findPackageRoot.js";
import { ConfigError } from "../model/errors.js";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

function expandEnvVars(obj: unknown): unknown {
  if (typeof obj === "string") {
    return obj.replace(/\$\{([^}]+)\}/g, (_, varName: string) => {
      const value = process.env[varName];
      if (value === undefined) {
        throw new ConfigError(`Environment variable "${varName}" is not set`);
      }
      return value;
    });
  }

  if (Array.isArray(obj)) {
    return obj.map((item) => expandEnvVars(item));
  }

  if (obj !== null && typeof obj === "object") {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      result[key] = expandEnvVars(value);
    }
    return result;
  }

  return obj;
}

export function parseConfig(raw: unknown, source = "<inline>"): AppConfig {
  const result = AppConfigSchema.safeParse(expandEnvVars(raw));

  if (!result.success) {
    const errors = result.error.errors
      .map((e) => {
        const path = e.path.join(".");
        return `  - ${path}: ${e.message}`;
      })
      .join("\n");
    throw new ConfigError(`Config validation failed (${source}):\n${errors}`);
  }

  return result.data;
}

export function defaultConfigPath(): string {
  return resolve(findPackageRoot(__dirname), "config", CONFIG_FILE_NAME);
}

/**
 * Loads the configuration from, in order: the explicit path, the
 * CALLMAP_CONFIG environment variable, the packaged default file.
 * Only a missing default file falls back to schema defaults.
 */
export function loadConfig(configPath?: string): AppConfig {
  const envConfigPath = process.env[CONFIG_ENV_VAR];
  const explicitPath = configPath ?? envConfigPath;
  const filePath = explicitPath ? resolve(explicitPath) : defaultConfigPath();

  let rawContent: string;
  try {
    rawContent = readFileSync(filePath, "utf-8");
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") {
      if (!explicitPath) {
        return parseConfig({}, "defaults");
      }
      throw new ConfigError(`Config file not found: ${filePath}`);
    }
    throw err;
  }

  let parsedConfig: unknown;
  try {
    parsedConfig = JSON.parse(rawContent);
  } catch (err) {
    if (err instanceof SyntaxError) {
      throw new ConfigError(`Invalid JSON in config file: ${filePath}`);
    }
    throw err;
  }

  return parseConfig(parsedConfig, filePath);
}
