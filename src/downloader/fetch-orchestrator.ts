import { createHash } from 'node:crypto';
import { readdir } from 'node:fs/promises';
import { basename, extname, join } from 'node:path';
import { DownloadError, errorMessage } from '../errors/custom-errors.js';
import type { FetchedFile, FetchResult, SourceRequest } from '../types/pipeline.types.js';
import { logger } from '../utils/logger.js';
import { INFO_JSON_SUFFIX, readInfoJson } from './info-json.js';
import type { Downloader } from './types.js';
import { toYtdlpArgs } from './ytdlp-options.js';

/**
 * Extensions of files handed on to the splitter and the importer
 */
export const MEDIA_EXTENSIONS: ReadonlySet<string> = new Set([
  '.mp3',
  '.m4a',
  '.opus',
  '.ogg',
  '.oga',
  '.flac',
  '.wav',
  '.aac',
  '.alac',
  '.aiff',
  '.wma',
  '.webm',
  '.mka',
  '.mp4',
]);

/**
 * Subdirectory holding split tracks
 */
export const TRACKS_DIRNAME = 'tracks';

/**
 * Stable directory name for a source identifier
 */
export function sourceKey(url: string): string {
  return createHash('md5').update(url).digest('hex').slice(0, 16);
}

/**
 * Runs the downloader for one source and describes what ended up on disk
 */
export class FetchOrchestrator {
  constructor(private readonly downloader: Downloader) {}

  /**
   * Local destination directory for a source
   */
  sourceDirectory(request: SourceRequest): string {
    return join(request.config.cacheDir, sourceKey(request.url));
  }

  /**
   * Fetch a source (or reuse an earlier download when `download` is off)
   *
   * @throws DownloadError if the downloader fails or no media files are found
   */
  async fetch(request: SourceRequest): Promise<FetchResult> {
    const { url, config } = request;
    const directory = this.sourceDirectory(request);

    if (config.download) {
      const { ignored } = toYtdlpArgs(config.youtubedlOptions);
      for (const key of ignored) {
        logger.warning(`Ignoring youtubedl option "${key}": output location is managed by ytimport`);
      }

      logger.info(`Downloading ${url} with ${this.downloader.getName()}...`);
      try {
        const result = await this.downloader.download(url, directory, {
          options: config.youtubedlOptions,
          onProgress: (progress) => logger.progress(progress),
          onLog: (message) => logger.debug(message),
        });
        logger.endProgress();
        logger.debug(`${this.downloader.getName()} reported ${result.files.length} file(s)`);
      } catch (error) {
        logger.endProgress();
        throw new DownloadError(`Failed to download ${url}: ${errorMessage(error)}`, url);
      }
    } else {
      logger.info(`Skipping download, looking for files in ${directory}`);
    }

    const files = await this.scanDirectory(directory, !config.download);
    if (files.length === 0) {
      const reason = config.download
        ? `${this.downloader.getName()} finished but no media files were found in ${directory}`
        : `No downloaded files found in ${directory}`;
      throw new DownloadError(reason, url);
    }

    return { url, directory, files };
  }

  /**
   * Media files in the source directory paired with their metadata sidecars
   *
   * @param reuseTracks - Fall back to the tracks left by an earlier split
   */
  private async scanDirectory(directory: string, reuseTracks: boolean): Promise<FetchedFile[]> {
    const names = await listFiles(directory);
    const mediaNames = names.filter(isMediaFile);

    if (mediaNames.length === 0 && reuseTracks) {
      const tracksDir = join(directory, TRACKS_DIRNAME);
      return (await listFiles(tracksDir)).filter(isMediaFile).map((name) => ({
        path: join(tracksDir, name),
        title: stripExtension(name),
        chapters: [],
      }));
    }

    const sidecars = new Set(names.filter((name) => name.endsWith(INFO_JSON_SUFFIX)));
    const files: FetchedFile[] = [];

    for (const name of mediaNames) {
      const base = stripExtension(name);
      const sidecar = `${base}${INFO_JSON_SUFFIX}`;
      const info = sidecars.has(sidecar) ? await readInfoJson(join(directory, sidecar)) : undefined;

      files.push({
        path: join(directory, name),
        title: info?.title ?? base,
        id: info?.id,
        chapters: info && !info.isPlaylist ? info.chapters : [],
      });
    }

    return files;
  }
}

async function listFiles(directory: string): Promise<string[]> {
  try {
    const entries = await readdir(directory, { withFileTypes: true });
    return entries
      .filter((entry) => entry.isFile())
      .map((entry) => entry.name)
      .sort();
  } catch (error) {
    logger.debug(`Cannot list ${directory}: ${errorMessage(error)}`);
    return [];
  }
}

function isMediaFile(name: string): boolean {
  return MEDIA_EXTENSIONS.has(extname(name).toLowerCase());
}

function stripExtension(name: string): string {
  return basename(name, extname(name));
}
