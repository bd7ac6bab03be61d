import type { FeaturetourConfig } from '../config.js';
import { object, optional, parse, string } from 'valibot';

const featuretourConfigSchema = object({
  catalog: optional(string()),
  startAt: optional(string()),
});

export function validateConfig(value: unknown, configPath: string): FeaturetourConfig {
  try {
    return parse(featuretourConfigSchema, value);
  } catch (err) {
    if (err instanceof Error) {
      throw new Error(`Invalid featuretour config (${configPath}): ${err.message}`);
    }
    throw err;
  }
}

/**
 * Load and parse a featuretour config file
 */
export async function loadConfig(configPath: string): Promise<FeaturetourConfig> {
  // jiti lets the config be written in TypeScript
  const { createJiti } = await import('jiti');
  const jiti = createJiti(process.cwd());

  try {
    const configModule: unknown = await jiti.import(configPath);

    // Handle both default export and named export
    const config =
      typeof configModule === 'object' && configModule !== null && 'default' in configModule
        ? configModule.default
        : configModule;

    if (!config) {
      throw new Error('Config file must export a configuration object');
    }

    return validateConfig(config, configPath);
  } catch (err) {
    if (err instanceof Error) {
      throw new Error(`Failed to load config from ${configPath}: ${err.message}`);
    }
    throw err;
  }
}
