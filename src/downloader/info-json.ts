import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { errorMessage } from '../errors/custom-errors.js';
import type { Chapter } from '../types/pipeline.types.js';
import { logger } from '../utils/logger.js';

export const INFO_JSON_SUFFIX = '.info.json';

const ChapterSchema = z.object({
  start_time: z.number(),
  end_time: z.number(),
  title: z.string().nullish(),
});

/**
 * The subset of yt-dlp's --write-info-json sidecar we rely on
 */
const InfoJsonSchema = z.object({
  id: z.string().nullish(),
  title: z.string().nullish(),
  _type: z.string().nullish(),
  chapters: z.array(ChapterSchema).nullish(),
});

export type EntryInfo = {
  id?: string;
  title?: string;
  isPlaylist: boolean;
  chapters: Chapter[];
};

/**
 * Parse a sidecar document
 *
 * @returns Entry info, or undefined when the document doesn't look like a yt-dlp sidecar
 */
export function parseInfoJson(document: unknown): EntryInfo | undefined {
  const parsed = InfoJsonSchema.safeParse(document);
  if (!parsed.success) {
    return undefined;
  }

  const { id, title, _type, chapters } = parsed.data;
  return {
    id: id ?? undefined,
    title: title ?? undefined,
    isPlaylist: _type === 'playlist',
    chapters: (chapters ?? []).map((chapter) => ({
      startTime: chapter.start_time,
      endTime: chapter.end_time,
      title: chapter.title ?? '',
    })),
  };
}

/**
 * Read a sidecar file; unreadable or malformed sidecars are logged and ignored
 */
export async function readInfoJson(path: string): Promise<EntryInfo | undefined> {
  try {
    const info = parseInfoJson(JSON.parse(await readFile(path, 'utf8')));
    if (!info) {
      logger.warning(`Ignoring unrecognised metadata file ${path}`);
    }
    return info;
  } catch (error) {
    logger.warning(`Ignoring unreadable metadata file ${path}: ${errorMessage(error)}`);
    return undefined;
  }
}
