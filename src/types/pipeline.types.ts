import type { EffectiveConfig } from './config.types.js';

/**
 * A single source identifier plus the configuration in force for this run
 */
export type SourceRequest = Readonly<{
  url: string;
  config: Readonly<EffectiveConfig>;
}>;

/**
 * Chapter marker reported by yt-dlp (offsets in seconds)
 */
export type Chapter = {
  startTime: number;
  endTime: number;
  title: string;
};

/**
 * Media file produced (or found) for a source
 */
export type FetchedFile = {
  path: string;
  title: string;
  /** Extractor id of the entry, when a metadata sidecar was written */
  id?: string;
  chapters: Chapter[];
};

/**
 * Everything the downloader left in the source directory
 */
export type FetchResult = {
  url: string;
  directory: string;
  files: FetchedFile[];
};

/**
 * Final audio file handed to the host library
 */
export type TrackFile = {
  path: string;
  title: string;
};

/**
 * Directory passed to the host import routine
 */
export type ImportBatch = {
  directory: string;
  tracks: TrackFile[];
  /** Import as singletons rather than as an album */
  singleton: boolean;
};
