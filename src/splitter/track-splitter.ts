import { constants } from 'node:fs';
import { access, mkdir, rm } from 'node:fs/promises';
import { extname, join } from 'node:path';
import { TRACKS_DIRNAME } from '../downloader/fetch-orchestrator.js';
import { errorMessage, SplitError, SplitWarning } from '../errors/custom-errors.js';
import type { Chapter, FetchedFile, FetchResult, SourceRequest, TrackFile } from '../types/pipeline.types.js';
import { sanitizeFilename, uniqueFilename } from '../utils/filename-sanitizer.js';
import { logger } from '../utils/logger.js';
import { formatTimestamp } from '../utils/time-utils.js';
import type { TrackExtractor } from './ffmpeg.js';

export type SplitOutcome = {
  tracks: TrackFile[];
  warnings: SplitWarning[];
};

type UsableChapter = Chapter & { index: number };

/**
 * Turns fetched files into the tracks handed to the importer
 */
export class TrackSplitter {
  constructor(private readonly extractor: TrackExtractor) {}

  async split(request: SourceRequest, fetched: FetchResult): Promise<SplitOutcome> {
    const tracks: TrackFile[] = [];
    const warnings: SplitWarning[] = [];
    // Names claimed in tracks/ during this split
    const taken = new Set<string>();

    for (const file of fetched.files) {
      if (!request.config.splitFiles || file.chapters.length === 0) {
        tracks.push(passThrough(file));
        continue;
      }

      const usable = this.usableChapters(request.url, file, warnings);
      if (usable.length === 0) {
        logger.warning(`No usable chapters in ${file.title}, importing it as a single file`);
        tracks.push(passThrough(file));
        continue;
      }

      tracks.push(...(await this.splitFile(request, fetched.directory, file, usable, taken)));
    }

    return { tracks, warnings };
  }

  private usableChapters(url: string, file: FetchedFile, warnings: SplitWarning[]): UsableChapter[] {
    const usable: UsableChapter[] = [];

    file.chapters.forEach((chapter, index) => {
      if (chapter.startTime < chapter.endTime) {
        usable.push({ ...chapter, index });
        return;
      }
      const warning = new SplitWarning(
        `Skipping chapter ${index + 1} of ${file.title}: starts at ${formatTimestamp(chapter.startTime)} but ends at ${formatTimestamp(chapter.endTime)}`,
        url,
        index,
      );
      logger.warning(warning.message);
      warnings.push(warning);
    });

    return usable;
  }

  private async splitFile(
    request: SourceRequest,
    directory: string,
    file: FetchedFile,
    chapters: UsableChapter[],
    taken: Set<string>,
  ): Promise<TrackFile[]> {
    const { url, config } = request;

    try {
      await access(file.path, constants.R_OK);
    } catch (error) {
      throw new SplitError(`Cannot read ${file.path}: ${errorMessage(error)}`, url);
    }

    const tracksDir = join(directory, TRACKS_DIRNAME);
    await mkdir(tracksDir, { recursive: true });

    const ext = extname(file.path);
    const total = chapters.length;
    const tracks: TrackFile[] = [];

    logger.info(`Splitting ${file.title} into ${total} track(s)`);

    for (const [position, chapter] of chapters.entries()) {
      const number = position + 1;
      const title = chapter.title.trim() || `Track ${String(number).padStart(2, '0')}`;
      const base = sanitizeFilename(title) || `Track ${String(number).padStart(2, '0')}`;
      const output = join(tracksDir, uniqueFilename(base, ext, taken));

      logger.debug(
        `  ${number}/${total} ${formatTimestamp(chapter.startTime)}-${formatTimestamp(chapter.endTime)} ${title}`,
      );

      try {
        await this.extractor.extract({
          input: file.path,
          output,
          start: chapter.startTime,
          end: chapter.endTime,
          metadata: { title, track: `${number}/${total}`, album: file.title },
        });
      } catch (error) {
        throw new SplitError(`Failed to extract chapter ${chapter.index + 1} of ${file.title}: ${errorMessage(error)}`, url);
      }

      tracks.push({ path: output, title });
    }

    if (!config.keepFiles) {
      await rm(file.path, { force: true });
    }

    return tracks;
  }
}

function passThrough(file: FetchedFile): TrackFile {
  return { path: file.path, title: file.title };
}
