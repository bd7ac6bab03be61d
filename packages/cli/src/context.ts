import { existsSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import {
  createJsonFileCatalogSource,
  defaultCatalogSource,
} from '@featuretour/catalog';
import type { CatalogSource, Logger } from '@featuretour/core';
import { FeaturePaginator } from '@featuretour/paginator';
import { DEFAULT_CONFIG_FILE, type FeaturetourConfig } from './config.js';
import { loadConfig } from './utils/config-loader.js';

export type TourContextOptions = {
  /**
   * Config file path. When omitted, `featuretour.config.ts` in `cwd` is used
   * if it exists.
   */
  config?: string;

  /**
   * JSON catalog path, overriding the config file.
   */
  catalog?: string;

  cwd?: string;
  logger: Logger;
};

export type TourContext = {
  config: FeaturetourConfig;
  paginator: FeaturePaginator;
};

async function resolveConfig(
  options: TourContextOptions,
  cwd: string,
): Promise<{ config: FeaturetourConfig; baseDir: string }> {
  const configPath = resolve(cwd, options.config ?? DEFAULT_CONFIG_FILE);

  if (!existsSync(configPath)) {
    if (options.config) {
      throw new Error(`Config file not found: ${configPath}`);
    }
    return { config: {}, baseDir: cwd };
  }

  options.logger.log?.(`Loading config from: ${configPath}`);
  return { config: await loadConfig(configPath), baseDir: dirname(configPath) };
}

function resolveCatalog(
  options: TourContextOptions,
  config: FeaturetourConfig,
  cwd: string,
  baseDir: string,
): CatalogSource {
  if (options.catalog) {
    return createJsonFileCatalogSource(resolve(cwd, options.catalog));
  }
  if (config.catalog) {
    return createJsonFileCatalogSource(resolve(baseDir, config.catalog));
  }
  return defaultCatalogSource;
}

/**
 * Composition root for the CLI: config, catalog and paginator.
 */
export async function createTourContext(
  options: TourContextOptions,
): Promise<TourContext> {
  const cwd = options.cwd ?? process.cwd();
  const { config, baseDir } = await resolveConfig(options, cwd);
  const source = resolveCatalog(options, config, cwd, baseDir);

  const paginator = FeaturePaginator.fromSource(source, {
    logger: options.logger,
  });
  if (config.startAt) paginator.selectById(config.startAt);

  return { config, paginator };
}
