import type { CallSite, Definition } from "../model/types.js";
import type { RawCall, RawDefinition, RawMatches } from "./treesitter/types.js";
import { MODULE_SCOPE_NAME } from "../config/constants.js";

interface Ranged {
  startLine: number;
  endLine: number;
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}

function contains(outer: Ranged, inner: Ranged): boolean {
  return outer.startLine <= inner.startLine && inner.endLine <= outer.endLine;
}

function span(range: Ranged): number {
  return range.endLine - range.startLine;
}

function qualify(raw: RawDefinition): string {
  return raw.className ? `${raw.className}.${raw.name}` : raw.name;
}

function clampDefinition(raw: RawDefinition, lineCount: number): RawDefinition {
  const lastLine = Math.max(1, lineCount);
  const startLine = clamp(raw.startLine, 1, lastLine);
  const endLine = clamp(raw.endLine, startLine, lastLine);
  return { ...raw, startLine, endLine };
}

/**
 * Keeps definitions that nest or are disjoint. Input is ordered outer
 * before inner, so every kept range either closes before the next one
 * starts or contains it; a range that does neither partially overlaps
 * the innermost open one and is dropped.
 */
function dropOverlaps(sorted: RawDefinition[]): RawDefinition[] {
  const kept: RawDefinition[] = [];
  const open: RawDefinition[] = [];

  for (const def of sorted) {
    while (open.length > 0 && open[open.length - 1].endLine < def.startLine) {
      open.pop();
    }
    const parent = open[open.length - 1];
    if (parent && !contains(parent, def)) {
      continue;
    }
    kept.push(def);
    open.push(def);
  }

  return kept;
}

function compareCalls(a: CallSite, b: CallSite): number {
  return a.line - b.line || a.column - b.column;
}

/**
 * Turns one adapter's raw matches into the file's definitions: ranges
 * clamped to the file, duplicates and partial overlaps removed, every
 * call attached to the innermost definition that contains its line.
 * Calls outside every definition go to a `<module>` definition that
 * spans the file and exists only when there are such calls.
 */
export function normalizeMatches(
  filePath: string,
  lineCount: number,
  raw: Pick<RawMatches, "definitions" | "calls">,
): Definition[] {
  const seen = new Set<string>();
  const unique: RawDefinition[] = [];
  for (const candidate of raw.definitions) {
    const def = clampDefinition(candidate, lineCount);
    const key = `${def.kind}\0${qualify(def)}\0${def.startLine}\0${def.endLine}`;
    if (seen.has(key)) continue;
    seen.add(key);
    unique.push(def);
  }

  // Array.prototype.sort is stable: equal ranges keep adapter order
  const sorted = [...unique].sort(
    (a, b) => a.startLine - b.startLine || b.endLine - a.endLine,
  );
  const kept = dropOverlaps(sorted);

  const definitions: Definition[] = kept.map((def) => ({
    kind: def.kind,
    name: def.name,
    qualifiedName: qualify(def),
    ...(def.className ? { className: def.className } : {}),
    filePath,
    startLine: def.startLine,
    endLine: def.endLine,
    calls: [],
  }));

  const moduleCalls: CallSite[] = [];
  for (const call of raw.calls) {
    const site = toCallSite(call);
    const owner = innermostContaining(definitions, site.line);
    if (owner) {
      owner.calls.push(site);
    } else {
      moduleCalls.push(site);
    }
  }

  for (const def of definitions) {
    def.calls.sort(compareCalls);
  }

  if (moduleCalls.length === 0) {
    return definitions;
  }

  moduleCalls.sort(compareCalls);
  const moduleScope: Definition = {
    kind: "module",
    name: MODULE_SCOPE_NAME,
    qualifiedName: MODULE_SCOPE_NAME,
    filePath,
    startLine: 1,
    endLine: Math.max(1, lineCount),
    calls: moduleCalls,
  };
  return [moduleScope, ...definitions];
}

function toCallSite(call: RawCall): CallSite {
  return {
    callee: call.callee,
    expression: call.expression,
    line: call.line,
    column: call.column,
  };
}

/**
 * Smallest definition whose range contains the line. Definitions come in
 * outer-before-inner order, so on equal size the later one wins.
 */
export function innermostContaining<T extends Ranged>(
  definitions: readonly T[],
  line: number,
): T | undefined {
  let best: T | undefined;
  for (const def of definitions) {
    if (def.startLine > line || def.endLine < line) continue;
    if (!best || span(def) <= span(best)) {
      best = def;
    }
  }
  return best;
}
