import Parser from "tree-sitter";
import TypeScript from "tree-sitter-typescript";
import Python from "tree-sitter-python";
import Go from "tree-sitter-go";
import Java from "tree-sitter-java";
import C from "tree-sitter-c";
import { logger } from "../../util/logger.js";
import { GRAMMAR_QUERY_LENGTH } from "../../config/constants.js";

export type SupportedGrammar =
  | "python"
  | "typescript"
  | "tsx"
  | "go"
  | "java"
  | "c";

const parserCache = new Map<SupportedGrammar, Parser | null>();
const queryCache = new Map<string, Parser.Query | null>();

function getLanguageModule(grammar: SupportedGrammar): unknown {
  switch (grammar) {
    case "python":
      return Python;
    case "typescript":
      return TypeScript.typescript;
    case "tsx":
      return TypeScript.tsx;
    case "go":
      return Go;
    case "java":
      return Java;
    case "c":
      return C;
  }
}

export function getParser(grammar: SupportedGrammar): Parser | null {
  const cached = parserCache.get(grammar);
  if (cached !== undefined) {
    return cached;
  }

  try {
    const parser = new Parser();
    parser.setLanguage(getLanguageModule(grammar));
    parserCache.set(grammar, parser);
    logger.debug(`Created parser for ${grammar}`);
    return parser;
  } catch (error) {
    logger.error(`Failed to create parser for ${grammar}`, {
      error: error instanceof Error ? error.message : String(error),
    });
    parserCache.set(grammar, null);
    return null;
  }
}

/**
 * Compiles a query once per grammar and source text; later calls reuse it.
 */
export function createQuery(
  grammar: SupportedGrammar,
  queryString: string,
): Parser.Query | null {
  const key = `${grammar}\0${queryString}`;
  const cached = queryCache.get(key);
  if (cached !== undefined) {
    return cached;
  }

  try {
    const query = new Parser.Query(getLanguageModule(grammar), queryString);
    queryCache.set(key, query);
    return query;
  } catch (error) {
    logger.error(`Failed to create query for ${grammar}`, {
      error: error instanceof Error ? error.message : String(error),
      query: queryString.substring(0, GRAMMAR_QUERY_LENGTH),
    });
    queryCache.set(key, null);
    return null;
  }
}

export function clearCache(grammar?: SupportedGrammar): void {
  if (grammar) {
    parserCache.delete(grammar);
    for (const key of [...queryCache.keys()]) {
      if (key.startsWith(`${grammar}\0`)) {
        queryCache.delete(key);
      }
    }
    logger.debug(`Cleared parser cache for ${grammar}`);
  } else {
    parserCache.clear();
    queryCache.clear();
    logger.debug("Cleared all parser caches");
  }
}
