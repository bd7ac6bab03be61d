import { Command } from 'commander';
import { createConsoleLogger } from '@featuretour/core';
import { createTourContext, type TourContext } from '../context.js';

export type CommonOptions = {
  config?: string;
  catalog?: string;
  verbose: boolean;
};

export function withCommonOptions(command: Command): Command {
  return command
    .option('-c, --config <path>', 'Path to config file (default: featuretour.config.ts if present)')
    .option('--catalog <path>', 'Path to a JSON topic catalog')
    .option('-v, --verbose', 'Log config loading and ignored navigation', false);
}

/**
 * Builds the tour context, or prints the error and exits.
 */
export async function openContext(
  options: CommonOptions,
): Promise<TourContext> {
  const logger = createConsoleLogger({
    mode: options.verbose ? 'verbose' : 'quiet',
    scope: 'featuretour',
  });
  try {
    return await createTourContext({
      config: options.config,
      catalog: options.catalog,
      logger,
    });
  } catch (err) {
    logger.error?.(err instanceof Error ? err.message : String(err));
    process.exit(1);
  }
}
