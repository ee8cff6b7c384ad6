import type { Definition, RepoModel } from "../model/types.js";

interface IndexedDefinition {
  definition: Definition;
  language: string;
}

const EMPTY: readonly Definition[] = Object.freeze([]);

/**
 * Bare name to every definition carrying it, across the whole model.
 * The module scope is never indexed. Built once, never mutated.
 */
export class SymbolIndex {
  private constructor(
    private readonly byName: ReadonlyMap<string, readonly IndexedDefinition[]>,
    readonly size: number,
  ) {}

  static build(model: RepoModel): SymbolIndex {
    const byName = new Map<string, IndexedDefinition[]>();
    let size = 0;

    for (const path of Object.keys(model.files).sort()) {
      const file = model.files[path];
      for (const definition of file.definitions) {
        if (definition.kind === "module") continue;
        const bucket = byName.get(definition.name);
        const entry = { definition, language: file.language };
        if (bucket) {
          bucket.push(entry);
        } else {
          byName.set(definition.name, [entry]);
        }
        size++;
      }
    }

    for (const bucket of byName.values()) {
      Object.freeze(bucket);
    }
    return new SymbolIndex(byName, size);
  }

  /**
   * Candidates for a bare name, case-sensitive, in path then line order.
   * With a language, only definitions from files of that language.
   */
  resolve(name: string, language?: string): readonly Definition[] {
    const bucket = this.byName.get(name);
    if (!bucket) {
      return EMPTY;
    }
    const matching = language === undefined
      ? bucket
      : bucket.filter((entry) => entry.language === language);
    return matching.map((entry) => entry.definition);
  }

  names(): string[] {
    return [...this.byName.keys()].sort();
  }
}

const indexCache = new WeakMap<RepoModel, SymbolIndex>();

/** One index per model object, built on first use. */
export function getSymbolIndex(model: RepoModel): SymbolIndex {
  let index = indexCache.get(model);
  if (!index) {
    index = SymbolIndex.build(model);
    indexCache.set(model, index);
  }
  return index;
}

export function lookupDefinitionsByName(
  model: RepoModel,
  name: string,
  language?: string,
): readonly Definition[] {
  return getSymbolIndex(model).resolve(name, language);
}
