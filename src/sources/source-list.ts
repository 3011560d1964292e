import { NoSourcesError } from '../errors/custom-errors.js';
import type { EffectiveConfig } from '../types/config.types.js';
import type { SourceRequest } from '../types/pipeline.types.js';

/**
 * Determine the ordered list of sources for this run
 *
 * Command arguments win; the configured `urls` are only used when none are given and
 * no albums were asked for.
 *
 * @param args - Positional command arguments
 * @param configuredUrls - `urls` from the effective configuration
 * @param hasAlbums - Whether `--album` searches add sources of their own
 * @throws NoSourcesError if there is nothing to process
 */
export function buildSourceList(
  args: readonly string[],
  configuredUrls: readonly string[],
  hasAlbums = false,
): string[] {
  const explicit = args.filter((arg) => arg.trim() !== '');
  if (explicit.length > 0 || hasAlbums) {
    return explicit;
  }

  if (configuredUrls.length > 0) {
    return [...configuredUrls];
  }

  throw new NoSourcesError('No urls given on the command line and no "urls" configured');
}

export function createSourceRequest(url: string, config: EffectiveConfig): SourceRequest {
  return Object.freeze({ url, config: Object.freeze({ ...config }) });
}
