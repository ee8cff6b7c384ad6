import type { LanguageAdapter } from "./LanguageAdapter.js";
import { adapters as builtInAdapters } from "./adapters.js";
import { logger } from "../../util/logger.js";
import { extensionOf } from "../../util/paths.js";

type AdapterFactory = () => LanguageAdapter;

interface AdapterEntry {
  languageId: string;
  factory: AdapterFactory;
  adapter: LanguageAdapter | null;
  source: "builtin" | "custom";
}

const ADAPTER_REGISTRY = new Map<string, AdapterEntry>();

let builtInAdaptersLoaded = false;

function loadBuiltInAdapters(): void {
  if (builtInAdaptersLoaded) {
    return;
  }

  for (const { extension, languageId, factory } of builtInAdapters) {
    ADAPTER_REGISTRY.set(extension.toLowerCase(), {
      languageId,
      factory,
      adapter: null,
      source: "builtin",
    });
  }

  builtInAdaptersLoaded = true;
}

/**
 * Maps an extension to an adapter, replacing any built-in entry for it.
 */
function registerAdapter(
  extension: string,
  languageId: string,
  factory: AdapterFactory,
): void {
  loadBuiltInAdapters();

  const normalizedExt = extension.toLowerCase();
  if (ADAPTER_REGISTRY.get(normalizedExt)?.source === "builtin") {
    logger.warn(`Overriding built-in adapter for extension ${normalizedExt}`, {
      languageId,
    });
  }

  ADAPTER_REGISTRY.set(normalizedExt, {
    languageId,
    factory,
    adapter: null,
    source: "custom",
  });
}

function getAdapterForExtension(ext: string): LanguageAdapter | null {
  loadBuiltInAdapters();

  const normalizedExt = ext.toLowerCase();
  const entry = ADAPTER_REGISTRY.get(normalizedExt);

  if (!entry) {
    return null;
  }

  if (!entry.adapter) {
    try {
      entry.adapter = entry.factory();
    } catch (error) {
      logger.error(`Failed to create adapter for extension ${normalizedExt}`, {
        source: entry.source,
        error: error instanceof Error ? error.message : String(error),
      });
      return null;
    }
  }

  return entry.adapter;
}

/**
 * Adapter for an explicit language tag: the first extension registered
 * for that language.
 */
function getAdapterForLanguage(languageId: string): LanguageAdapter | null {
  loadBuiltInAdapters();
  for (const [extension, entry] of ADAPTER_REGISTRY) {
    if (entry.languageId === languageId) {
      return getAdapterForExtension(extension);
    }
  }
  return null;
}

function getSupportedExtensions(): string[] {
  loadBuiltInAdapters();
  return Array.from(ADAPTER_REGISTRY.keys());
}

function getLanguageIdForExtension(ext: string): string | null {
  loadBuiltInAdapters();
  const entry = ADAPTER_REGISTRY.get(ext.toLowerCase());
  return entry ? entry.languageId : null;
}

/** Language tag for a path, or null when no adapter claims its extension. */
function detectLanguage(filePath: string): string | null {
  const ext = extensionOf(filePath);
  return ext ? getLanguageIdForExtension(ext) : null;
}

function resetRegistry(): void {
  ADAPTER_REGISTRY.clear();
  builtInAdaptersLoaded = false;
}

export {
  registerAdapter,
  getAdapterForExtension,
  getAdapterForLanguage,
  getSupportedExtensions,
  getLanguageIdForExtension,
  detectLanguage,
  loadBuiltInAdapters,
  resetRegistry,
};
