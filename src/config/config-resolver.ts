import { ConfigError } from '../errors/custom-errors.js';
import type { CommandFlags, EffectiveConfig } from '../types/config.types.js';
import { expandHome } from '../utils/env-resolver.js';
import { validatePersistedConfig } from './config-schema.js';

/**
 * Merge configuration layers into the effective configuration
 *
 * Precedence, highest first:
 * 1. Command-line flags
 * 2. Persisted plugin section of the beets config
 * 3. Built-in defaults
 *
 * `youtubedlOptions` is merged key by key instead of being replaced.
 *
 * @param defaults - Built-in defaults
 * @param persisted - Raw plugin section (validated here)
 * @param flags - Command-line overrides
 * @throws ConfigError if the persisted section is invalid
 */
export function resolveConfig(defaults: EffectiveConfig, persisted: unknown, flags: CommandFlags = {}): EffectiveConfig {
  const validation = validatePersistedConfig(persisted);
  if (!validation.success) {
    throw new ConfigError(validation.error);
  }
  const stored = validation.data;

  return {
    download: flags.download ?? stored.download ?? defaults.download,
    splitFiles: flags.splitFiles ?? stored.split_files ?? defaults.splitFiles,
    import: flags.import ?? stored.import ?? defaults.import,
    keepFiles: flags.keepFiles ?? stored.keep_files ?? defaults.keepFiles,
    forceDownload: flags.forceDownload ?? stored.force_download ?? defaults.forceDownload,
    verbose: flags.verbose ?? stored.verbose ?? defaults.verbose,
    urls: [...(stored.urls ?? defaults.urls)],
    youtubedlOptions: {
      ...defaults.youtubedlOptions,
      ...stored.youtubedl_options,
      ...flags.youtubedlOptions,
    },
    cacheDir: expandHome(stored.cache_dir ?? defaults.cacheDir),
    beetCommand: stored.beet_command ?? defaults.beetCommand,
  };
}
