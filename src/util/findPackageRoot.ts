import { existsSync } from "fs";
import { dirname, resolve } from "path";

/**
 * Nearest directory at or above startDir holding a package.json, so that
 * code running from src/ (tsx) and from dist/ finds config/ and the
 * compiled worker alike.
 */
export function findPackageRoot(startDir: string, maxDepth = 10): string {
  let dir = resolve(startDir);
  for (let depth = 0; depth < maxDepth; depth++) {
    if (existsSync(resolve(dir, "package.json"))) {
      return dir;
    }
    const parent = dirname(dir);
    if (parent === dir) {
      break;
    }
    dir = parent;
  }
  return resolve(startDir);
}
