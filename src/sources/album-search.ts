import { ConfigError, DownloadError, errorMessage } from '../errors/custom-errors.js';
import { logger } from '../utils/logger.js';

/**
 * Album named on the command line as "<artist> - <album>"
 */
export type AlbumQuery = {
  artist: string;
  album: string;
};

export const ALBUM_SEPARATOR = ' - ';

/**
 * Album search section of YouTube Music, as yt-dlp reads it
 */
const ALBUM_SEARCH_URL = 'https://music.youtube.com/search';

/**
 * Looks up the first entry of a search page
 */
export type EntryFinder = (url: string) => Promise<string | undefined>;

/**
 * @throws ConfigError if the value has no artist or no album part
 */
export function parseAlbumQuery(value: string): AlbumQuery {
  const index = value.indexOf(ALBUM_SEPARATOR);
  const artist = index === -1 ? '' : value.slice(0, index).trim();
  const album = index === -1 ? '' : value.slice(index + ALBUM_SEPARATOR.length).trim();

  if (!artist || !album) {
    throw new ConfigError(`Album must be given as "<artist>${ALBUM_SEPARATOR}<album>", got "${value}"`);
  }
  return { artist, album };
}

export function describeAlbum(query: AlbumQuery): string {
  return `${query.artist}${ALBUM_SEPARATOR}${query.album}`;
}

export function albumSearchUrl(query: AlbumQuery): string {
  return `${ALBUM_SEARCH_URL}?q=${encodeURIComponent(`${query.artist} ${query.album}`)}#albums`;
}

/**
 * Turn album queries into playlist urls, taking the best search match of each
 *
 * Albums without a match are returned as DownloadErrors labelled "album:<artist> - <album>".
 */
export async function resolveAlbumSources(
  queries: readonly AlbumQuery[],
  findFirstEntry: EntryFinder,
): Promise<{ urls: string[]; failures: DownloadError[] }> {
  const urls: string[] = [];
  const failures: DownloadError[] = [];

  for (const query of queries) {
    const label = `album:${describeAlbum(query)}`;
    logger.info(`Searching for ${describeAlbum(query)}...`);

    let url: string | undefined;
    try {
      url = await findFirstEntry(albumSearchUrl(query));
    } catch (error) {
      failures.push(new DownloadError(`Album search for ${describeAlbum(query)} failed: ${errorMessage(error)}`, label));
      continue;
    }

    if (url === undefined) {
      failures.push(new DownloadError(`No results found for ${describeAlbum(query)}`, label));
      continue;
    }

    logger.debug(`${describeAlbum(query)} resolved to ${url}`);
    urls.push(url);
  }

  return { urls, failures };
}
