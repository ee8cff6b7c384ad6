import * as crypto from "crypto";

export function hashContent(content: string): string {
  return crypto.createHash("sha256").update(content).digest("hex");
}

/**
 * Order-independent digest of a set of (path, content) pairs.
 */
export function hashFileSet(
  entries: Iterable<{ path: string; content: string }>,
): string {
  const lines: string[] = [];
  for (const entry of entries) {
    lines.push(`${entry.path}\0${hashContent(entry.content)}`);
  }
  lines.sort();
  return hashContent(lines.join("\n"));
}
