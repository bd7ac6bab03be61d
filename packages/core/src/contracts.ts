import type { Topic } from "./topic";

/**
 * Data-loading collaborator that hands the catalog to the composition root.
 * Implementations live in `@featuretour/catalog`.
 */
export interface CatalogSource {
  /**
   * Load the full, ordered topic catalog.
   */
  loadTopics(): readonly Topic[];
}
