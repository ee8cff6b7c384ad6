import type { CallSite } from "../model/types.js";
import type { CallStackEntry, CallStackStatus, CallStackTree } from "./callStack.js";
import { buildChildrenMap } from "./callStack.js";

export type CallStackFormat = "text" | "json";

export interface CallStackNodeJson {
  name: string;
  qualifiedName: string | null;
  filePath: string | null;
  startLine: number | null;
  endLine: number | null;
  status: CallStackStatus;
  depth: number;
  candidateCount: number;
  callSite: CallSite | null;
  children: CallStackNodeJson[];
}

export interface CallStackJson {
  maxDepth: number;
  truncated: boolean;
  root: CallStackNodeJson;
}

function describe(entry: CallStackEntry): string {
  const def = entry.definition;
  let text = def
    ? `${def.qualifiedName} (${def.filePath}:${def.startLine}-${def.endLine})`
    : entry.calleeName;

  if (entry.callSite) {
    text += ` via ${entry.callSite.expression} at line ${entry.callSite.line}`;
  }

  switch (entry.status) {
    case "cyclic":
      text += " [cyclic]";
      break;
    case "unresolved":
      text += " [unresolved]";
      break;
    case "depth_limit":
      text += " [depth limit]";
      break;
    case "truncated":
      text += " [truncated]";
      break;
    case "expanded":
      break;
  }

  if (entry.candidateCount > 1) {
    text += ` [ambiguous: ${entry.candidateCount} candidates]`;
  }
  return text;
}

/**
 * Nested form of the tree with status markers kept on every node.
 */
export function toCallStackJson(tree: CallStackTree): CallStackJson {
  const children = buildChildrenMap(tree);

  const toNode = (entry: CallStackEntry): CallStackNodeJson => ({
    name: entry.definition?.name ?? entry.calleeName,
    qualifiedName: entry.definition?.qualifiedName ?? null,
    filePath: entry.definition?.filePath ?? null,
    startLine: entry.definition?.startLine ?? null,
    endLine: entry.definition?.endLine ?? null,
    status: entry.status,
    depth: entry.depth,
    candidateCount: entry.candidateCount,
    callSite: entry.callSite,
    children: (children.get(entry.id) ?? []).map(toNode),
  });

  return {
    maxDepth: tree.maxDepth,
    truncated: tree.truncated,
    root: toNode(tree.root),
  };
}

/**
 * Renders the tree depth-first, two spaces of indent per level, or as
 * pretty-printed JSON.
 */
export function formatCallStack(
  tree: CallStackTree,
  format: CallStackFormat = "text",
): string {
  if (format === "json") {
    return JSON.stringify(toCallStackJson(tree), null, 2);
  }

  const children = buildChildrenMap(tree);
  const lines: string[] = [];
  const visit = (entry: CallStackEntry): void => {
    lines.push(`${"  ".repeat(entry.depth)}${describe(entry)}`);
    for (const child of children.get(entry.id) ?? []) {
      visit(child);
    }
  };
  visit(tree.root);

  if (tree.truncated) {
    lines.push(`... truncated at ${tree.entries.length} entries`);
  }
  return lines.join("\n");
}
