import { mkdir, rename, rm } from 'node:fs/promises';
import { basename, dirname, extname, join } from 'node:path';
import { TRACKS_DIRNAME } from '../downloader/fetch-orchestrator.js';
import { errorMessage, ImportError } from '../errors/custom-errors.js';
import type { FetchResult, ImportBatch, SourceRequest, TrackFile } from '../types/pipeline.types.js';
import { uniqueFilename } from '../utils/filename-sanitizer.js';
import { logger } from '../utils/logger.js';
import type { LibraryImporter } from './beets-importer.js';

/**
 * Flexible attribute recording where an imported item came from
 */
export const SOURCE_FIELD = 'ytimport_source';

export type ImportOutcome = {
  /** Whether the importer was invoked */
  imported: boolean;
  batch: ImportBatch;
};

/**
 * Describe tracks where they are: their shared directory, or the source directory
 * when they are spread over several
 */
export function describeBatch(sourceDirectory: string, tracks: TrackFile[]): ImportBatch {
  const directories = new Set(tracks.map((track) => dirname(track.path)));
  const [shared] = directories;
  const directory = directories.size === 1 && shared !== undefined ? shared : sourceDirectory;
  return { directory, tracks, singleton: tracks.length === 1 };
}

/**
 * Gather the tracks of a source into one directory
 *
 * Tracks outside `<sourceDirectory>/tracks` are moved in when they do not
 * all share a directory already (a playlist where only some entries were split).
 */
export async function stageImportBatch(sourceDirectory: string, tracks: TrackFile[]): Promise<ImportBatch> {
  const directories = new Set(tracks.map((track) => dirname(track.path)));
  const singleton = tracks.length === 1;

  if (directories.size <= 1) {
    return describeBatch(sourceDirectory, tracks);
  }

  const tracksDir = join(sourceDirectory, TRACKS_DIRNAME);
  await mkdir(tracksDir, { recursive: true });

  const taken = new Set(
    tracks.filter((track) => dirname(track.path) === tracksDir).map((track) => basename(track.path).toLowerCase()),
  );
  const staged: TrackFile[] = [];

  for (const track of tracks) {
    if (dirname(track.path) === tracksDir) {
      staged.push(track);
      continue;
    }
    const ext = extname(track.path);
    const target = join(tracksDir, uniqueFilename(basename(track.path, ext), ext, taken));
    logger.debug(`Moving ${track.path} to ${target}`);
    await rename(track.path, target);
    staged.push({ ...track, path: target });
  }

  return { directory: tracksDir, tracks: staged, singleton };
}

/**
 * Remove a source directory; failures are only logged
 */
export async function removeSourceDirectory(directory: string): Promise<void> {
  try {
    await rm(directory, { recursive: true, force: true });
    logger.debug(`Removed ${directory}`);
  } catch (error) {
    logger.warning(`Failed to remove ${directory}: ${errorMessage(error)}`);
  }
}

/**
 * Hands the tracks of one source to the host library and cleans up afterwards
 */
export class ImportTrigger {
  constructor(private readonly importer: LibraryImporter) {}

  /**
   * Whether items imported from `url` are already in the library
   *
   * @throws ImportError if the library cannot be queried
   */
  async isImported(url: string): Promise<boolean> {
    try {
      return await this.importer.contains(SOURCE_FIELD, url);
    } catch (error) {
      throw new ImportError(`Cannot query the library for ${url}: ${errorMessage(error)}`, url);
    }
  }

  /**
   * @throws ImportError if the importer fails
   */
  async run(request: SourceRequest, fetched: FetchResult, tracks: TrackFile[]): Promise<ImportOutcome> {
    const { url, config } = request;

    if (!config.import) {
      const batch = describeBatch(fetched.directory, tracks);
      logger.info(`Import disabled, ${tracks.length} file(s) left in ${batch.directory}`);
      return { imported: false, batch };
    }

    const batch = await stageImportBatch(fetched.directory, tracks);

    try {
      logger.info(`Importing ${batch.tracks.length} file(s) from ${batch.directory} with ${this.importer.getName()}`);
      await this.importer.importDirectory({
        directory: batch.directory,
        singleton: batch.singleton,
        fields: { [SOURCE_FIELD]: url },
        verbose: config.verbose,
      });
    } catch (error) {
      throw new ImportError(`Import of ${batch.directory} failed: ${errorMessage(error)}`, url);
    } finally {
      if (!config.keepFiles) {
        await removeSourceDirectory(fetched.directory);
      }
    }

    return { imported: true, batch };
  }
}
