import { existsSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import * as yaml from 'js-yaml';
import { ConfigError, errorMessage } from '../errors/custom-errors.js';
import { resolveEnvRecursive } from '../utils/env-resolver.js';
import { defaultConfigPath, PLUGIN_KEY } from './config-defaults.js';

/**
 * Result of reading the host configuration file
 */
export type LoadedConfig = {
  /** Absolute path of the configuration file */
  path: string;
  /** Whether the path was given explicitly (and is forwarded to beets) */
  explicit: boolean;
  /** Raw plugin section, undefined when absent */
  section: unknown;
};

/**
 * Load the plugin section from the beets configuration file
 *
 * @param configPath - Path to config file; defaults to the beets config.yaml
 * @returns Raw plugin section with environment variables resolved
 * @throws ConfigError if an explicit file doesn't exist or any file is invalid
 */
export async function loadConfig(configPath?: string): Promise<LoadedConfig> {
  const explicit = configPath !== undefined;
  const absolutePath = resolve(configPath ?? defaultConfigPath());

  if (!existsSync(absolutePath)) {
    if (explicit) {
      throw new ConfigError(`Configuration file not found: "${absolutePath}"`);
    }
    return { path: absolutePath, explicit, section: undefined };
  }

  const content = await readFile(absolutePath, 'utf8');

  let document: unknown;
  try {
    document = yaml.load(content);
  } catch (error) {
    throw new ConfigError(`Failed to parse YAML in "${absolutePath}": ${errorMessage(error)}`);
  }

  if (document === undefined || document === null) {
    return { path: absolutePath, explicit, section: undefined };
  }

  if (typeof document !== 'object' || Array.isArray(document)) {
    throw new ConfigError(`Configuration file "${absolutePath}" must contain a mapping`);
  }

  const section: unknown = Object.entries(document).find(([key]) => key === PLUGIN_KEY)?.[1];

  return { path: absolutePath, explicit, section: resolveEnvRecursive(section) };
}
