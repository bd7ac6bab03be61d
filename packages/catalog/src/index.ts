import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import type { CatalogSource, Topic } from "@featuretour/core";
import { parseCatalog } from "@featuretour/zod";

const DEFAULT_CATALOG_URL = new URL("../topics.json", import.meta.url);

/**
 * Reads and validates a JSON topic catalog from disk.
 */
function readCatalogFile(path: string | URL): Topic[] {
  const source = typeof path === "string" ? path : fileURLToPath(path);
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf8"));
  } catch (err) {
    if (err instanceof Error) {
      throw new Error(`Failed to read topic catalog (${source}): ${err.message}`);
    }
    throw err;
  }
  return parseCatalog(raw, source);
}

/**
 * Loads the catalog bundled with this package.
 */
export function loadDefaultTopics(): Topic[] {
  return readCatalogFile(DEFAULT_CATALOG_URL);
}

/**
 * Wraps an in-memory list of topics. Duplicate ids are rejected up front.
 */
export function createStaticCatalogSource(
  topics: readonly Topic[],
): CatalogSource {
  const validated = Object.freeze(parseCatalog(topics, "static catalog"));
  return {
    loadTopics: () => validated,
  };
}

/**
 * Catalog backed by a JSON file. The file is read lazily on first use and
 * cached afterwards, since catalogs are static for the process lifetime.
 */
export function createJsonFileCatalogSource(path: string): CatalogSource {
  let cached: readonly Topic[] | null = null;
  return {
    loadTopics() {
      if (!cached) cached = Object.freeze(readCatalogFile(path));
      return cached;
    },
  };
}

export const defaultCatalogSource: CatalogSource = {
  loadTopics: loadDefaultTopics,
};
