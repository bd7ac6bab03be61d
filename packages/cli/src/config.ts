/**
 * Configuration types and helpers for the featuretour CLI
 */

export const DEFAULT_CONFIG_FILE = 'featuretour.config.ts';

/**
 * featuretour CLI configuration
 */
export interface FeaturetourConfig {
  /**
   * Path to a JSON topic catalog, relative to the config file.
   * The bundled catalog is used when omitted.
   *
   * @example './topics.json'
   */
  catalog?: string;

  /**
   * Topic id selected before the first page is shown.
   *
   * @example 'state-hoisting'
   */
  startAt?: string;
}

/**
 * Define a type-safe featuretour configuration.
 * Use this in your `featuretour.config.ts` file.
 *
 * @example
 * ```ts
 * // featuretour.config.ts
 * import { defineConfig } from '@featuretour/cli/config';
 *
 * export default defineConfig({
 *   catalog: './topics.json',
 *   startAt: 'navigation',
 * });
 * ```
 */
export function defineConfig(config: FeaturetourConfig): FeaturetourConfig {
  return config;
}
