import type { CallSite, Definition, RepoModel } from "../model/types.js";
import { definitionKey, getFileModel } from "../model/types.js";
import { ValidationError } from "../model/errors.js";
import { getSymbolIndex } from "./symbolIndex.js";
import { findEnclosingDefinition } from "./locate.js";
import { normalizePath } from "../util/paths.js";
import { logger } from "../util/logger.js";
import { SPAN_NAMES, setSpanAttributes, withSpanSync } from "../util/tracing.js";
import {
  DEFAULT_CALLSTACK_MAX_NODES,
  MAX_CALLSTACK_DEPTH,
} from "../config/constants.js";

/**
 * - expanded: the definition's calls were followed
 * - cyclic: already on the path from the root, not followed again
 * - unresolved: no definition carries the callee name
 * - depth_limit: at the depth bound, not followed
 * - truncated: queued when the node cap was hit and never followed, or
 *   cut off by the cap partway through its calls
 */
export type CallStackStatus =
  | "expanded"
  | "cyclic"
  | "unresolved"
  | "depth_limit"
  | "truncated";

export interface CallStackEntry {
  id: number;
  parentId: number | null;
  depth: number;
  status: CallStackStatus;
  /** Null for unresolved callees. */
  definition: Definition | null;
  /** Call in the parent that led here; null for the root. */
  callSite: CallSite | null;
  calleeName: string;
  /** Definitions the callee name resolved to; above 1 means ambiguous. */
  candidateCount: number;
}

export interface CallStackTree {
  root: CallStackEntry;
  /** Breadth-first, root first. */
  entries: CallStackEntry[];
  maxDepth: number;
  truncated: boolean;
}

export type CallStackError = {
  type: "no_enclosing_definition";
  filePath: string;
  line: number;
};

export type CallStackResult =
  | { ok: true; tree: CallStackTree }
  | { ok: false; error: CallStackError };

export function callStackOk(tree: CallStackTree): CallStackResult {
  return { ok: true, tree };
}

export function callStackErr(error: CallStackError): CallStackResult {
  return { ok: false, error };
}

export function callStackErrorToMessage(error: CallStackError): string {
  switch (error.type) {
    case "no_enclosing_definition":
      return `No definition encloses ${error.filePath}:${error.line}`;
  }
}

export interface ResolveCallStackOptions {
  maxNodes?: number;
}

function isOnPath(entries: CallStackEntry[], fromId: number, key: string): boolean {
  let current: CallStackEntry | undefined = entries[fromId];
  while (current) {
    if (current.definition && definitionKey(current.definition) === key) {
      return true;
    }
    current = current.parentId === null ? undefined : entries[current.parentId];
  }
  return false;
}

function languageOf(model: RepoModel, definition: Definition): string | undefined {
  return getFileModel(model, definition.filePath)?.language;
}

/**
 * Expands outgoing calls breadth-first from the definition enclosing
 * `filePath:line`. Callees resolve by bare name within the caller's
 * language; every candidate of an ambiguous name becomes a sibling.
 * Within one frame each definition and each unresolved name appears once.
 */
export function resolveCallStack(
  model: RepoModel,
  filePath: string,
  line: number,
  maxDepth: number,
  options: ResolveCallStackOptions = {},
): CallStackResult {
  if (!Number.isInteger(maxDepth) || maxDepth < 0 || maxDepth > MAX_CALLSTACK_DEPTH) {
    throw new ValidationError(
      `maxDepth must be an integer between 0 and ${MAX_CALLSTACK_DEPTH}, got ${maxDepth}`,
    );
  }
  const maxNodes = options.maxNodes ?? DEFAULT_CALLSTACK_MAX_NODES;
  if (!Number.isInteger(maxNodes) || maxNodes < 1) {
    throw new ValidationError(`maxNodes must be a positive integer, got ${maxNodes}`);
  }

  const path = normalizePath(filePath);

  return withSpanSync(
    SPAN_NAMES.CALLSTACK_RESOLVE,
    (span) => {
      const rootDefinition = findEnclosingDefinition(model, path, line);
      if (!rootDefinition) {
        logger.debug("No enclosing definition", { filePath: path, line });
        return callStackErr({ type: "no_enclosing_definition", filePath: path, line });
      }

      const tree = expand(model, rootDefinition, maxDepth, maxNodes);
      setSpanAttributes(span, {
        "callmap.callstack.entries": tree.entries.length,
        "callmap.callstack.truncated": tree.truncated,
      });
      if (tree.truncated) {
        logger.warn("Call stack truncated", { filePath: path, line, maxNodes });
      }
      return callStackOk(tree);
    },
    { "callmap.file": path, "callmap.line": line, "callmap.max_depth": maxDepth },
  );
}

function expand(
  model: RepoModel,
  rootDefinition: Definition,
  maxDepth: number,
  maxNodes: number,
): CallStackTree {
  const index = getSymbolIndex(model);
  const root: CallStackEntry = {
    id: 0,
    parentId: null,
    depth: 0,
    status: maxDepth === 0 ? "depth_limit" : "expanded",
    definition: rootDefinition,
    callSite: null,
    calleeName: rootDefinition.name,
    candidateCount: 1,
  };
  const entries: CallStackEntry[] = [root];
  const frontier: number[] = root.status === "expanded" ? [0] : [];
  let truncated = false;

  for (let head = 0; head < frontier.length && !truncated; head++) {
    const frame = entries[frontier[head]];
    const definition = frame.definition;
    if (!definition) continue;

    const language = languageOf(model, definition);
    const childDepth = frame.depth + 1;
    const seen = new Set<string>();

    for (const callSite of definition.calls) {
      const candidates = index.resolve(callSite.callee, language);

      if (candidates.length === 0) {
        const key = `unresolved\0${callSite.callee}`;
        if (seen.has(key)) continue;
        if (entries.length >= maxNodes) {
          truncated = true;
          break;
        }
        seen.add(key);
        entries.push({
          id: entries.length,
          parentId: frame.id,
          depth: childDepth,
          status: "unresolved",
          definition: null,
          callSite,
          calleeName: callSite.callee,
          candidateCount: 0,
        });
        continue;
      }

      for (const candidate of candidates) {
        const key = definitionKey(candidate);
        if (seen.has(key)) continue;
        if (entries.length >= maxNodes) {
          truncated = true;
          break;
        }
        seen.add(key);

        // cycle check first, so a recursive call is reported as cyclic
        // even at the depth bound
        const status: CallStackStatus = isOnPath(entries, frame.id, key)
          ? "cyclic"
          : childDepth >= maxDepth
            ? "depth_limit"
            : "expanded";
        const entry: CallStackEntry = {
          id: entries.length,
          parentId: frame.id,
          depth: childDepth,
          status,
          definition: candidate,
          callSite,
          calleeName: callSite.callee,
          candidateCount: candidates.length,
        };
        entries.push(entry);
        if (status === "expanded") {
          frontier.push(entry.id);
        }
      }
      if (truncated) break;
    }

    if (truncated) {
      frame.status = "truncated";
      for (const id of frontier.slice(head + 1)) {
        entries[id].status = "truncated";
      }
    }
  }

  return { root, entries, maxDepth, truncated };
}

/**
 * Parent id to child entries, in entry order. Rebuilds the tree from the
 * flat breadth-first list.
 */
export function buildChildrenMap(tree: CallStackTree): Map<number, CallStackEntry[]> {
  const children = new Map<number, CallStackEntry[]>();
  for (const entry of tree.entries) {
    if (entry.parentId === null) continue;
    const siblings = children.get(entry.parentId);
    if (siblings) {
      siblings.push(entry);
    } else {
      children.set(entry.parentId, [entry]);
    }
  }
  return children;
}
