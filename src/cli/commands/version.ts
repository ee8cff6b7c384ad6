import { readFileSync } from "fs";
import { resolve, dirname } from "path";
import { fileURLToPath } from "url";
import type { VersionOptions } from "../types.js";
import { findPackageRoot } from "../../util/findPackageRoot.js";
import { CALLMAP_VERSION } from "../../config/constants.js";
import { getSupportedExtensions } from "../../indexer/adapter/registry.js";

const __dirname = dirname(fileURLToPath(import.meta.url));

export async function versionCommand(options: VersionOptions): Promise<void> {
  const version = getVersion();
  const extensions = getSupportedExtensions().sort();

  if (options.json) {
    console.log(
      JSON.stringify({ version, node: process.version, extensions }, null, 2),
    );
    return;
  }

  console.log(`callmap version: ${version}`);
  console.log("");
  console.log("Environment:");
  console.log(`  Node.js: ${process.version}`);
  console.log(`  Platform: ${process.platform}`);
  console.log(`  Arch: ${process.arch}`);
  console.log(`  Extensions: ${extensions.join(" ")}`);
}

function readPackageVersion(text: string): string | undefined {
  const pkg: unknown = JSON.parse(text);
  if (pkg !== null && typeof pkg === "object" && "version" in pkg) {
    return typeof pkg.version === "string" ? pkg.version : undefined;
  }
  return undefined;
}

export function getVersion(): string {
  const packageJson = resolve(findPackageRoot(__dirname), "package.json");
  try {
    return readPackageVersion(readFileSync(packageJson, "utf-8")) ?? CALLMAP_VERSION;
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return CALLMAP_VERSION;
    }
    throw error;
  }
}
