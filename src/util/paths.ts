import * as path from "path";

function toForwardSlashes(p: string): string {
  return p.replace(/\\/g, "/");
}

/**
 * Canonical repository-relative form: forward slashes, no "./" prefix,
 * no redundant segments.
 */
export function normalizePath(p: string): string {
  if (p === "") {
    return p;
  }
  const normalized = path.posix.normalize(toForwardSlashes(p));
  return normalized.startsWith("./") ? normalized.slice(2) : normalized;
}

export function extensionOf(p: string): string {
  return path.posix.extname(normalizePath(p)).toLowerCase();
}

function containsPathTraversal(p: string): boolean {
  const normalized = normalizePath(p);
  return (
    normalized === ".." ||
    normalized.startsWith("../") ||
    normalized.includes("/../") ||
    normalized.endsWith("/..")
  );
}

/**
 * Resolves a repository-relative path against the checkout root and
 * rejects anything that would escape it.
 */
export function resolveWithinRoot(root: string, relPath: string): string {
  if (containsPathTraversal(relPath) || path.isAbsolute(relPath)) {
    throw new Error(`Path escapes repository root: ${relPath}`);
  }
  const absoluteRoot = path.resolve(root);
  const absoluteTarget = path.resolve(absoluteRoot, relPath);
  const rootPrefix = absoluteRoot.endsWith(path.sep)
    ? absoluteRoot
    : absoluteRoot + path.sep;

  if (absoluteTarget !== absoluteRoot && !absoluteTarget.startsWith(rootPrefix)) {
    throw new Error(`Path escapes repository root: ${relPath}`);
  }
  return absoluteTarget;
}
