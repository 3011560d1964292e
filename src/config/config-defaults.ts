import { homedir } from 'node:os';
import { join } from 'node:path';
import type { EffectiveConfig } from '../types/config.types.js';

/**
 * Key of the plugin section in the beets config.yaml
 */
export const PLUGIN_KEY = 'ytimport';

/**
 * Directory beets reads its configuration from
 *
 * $BEETSDIR wins; otherwise %APPDATA%\beets on Windows and
 * $XDG_CONFIG_HOME/beets (default ~/.config/beets) elsewhere.
 */
export function beetsConfigDir(env: NodeJS.ProcessEnv = process.env, platform: NodeJS.Platform = process.platform): string {
  if (env.BEETSDIR) {
    return env.BEETSDIR;
  }
  if (platform === 'win32' && env.APPDATA) {
    return join(env.APPDATA, 'beets');
  }
  return join(env.XDG_CONFIG_HOME || join(homedir(), '.config'), 'beets');
}

export function defaultConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  return join(beetsConfigDir(env), 'config.yaml');
}

/**
 * Default configuration values
 */
export function getDefaults(env: NodeJS.ProcessEnv = process.env): EffectiveConfig {
  return {
    download: true,
    splitFiles: true,
    import: true,
    keepFiles: false,
    forceDownload: false,
    urls: [],
    youtubedlOptions: {},
    verbose: false,
    cacheDir: join(beetsConfigDir(env), PLUGIN_KEY),
    beetCommand: 'beet',
  };
}
