/**
 * Options forwarded verbatim to yt-dlp (keys are yt-dlp long option names)
 */
export type YtdlpOptions = Record<string, unknown>;

/**
 * Fully resolved configuration for one run
 */
export type EffectiveConfig = {
  /** Fetch sources with yt-dlp (false: reuse files already in the cache directory) */
  download: boolean;
  /** Split files that carry chapter markers into one file per chapter */
  splitFiles: boolean;
  /** Hand the resulting tracks to `beet import` */
  import: boolean;
  /** Keep downloaded and split files after the import */
  keepFiles: boolean;
  /** Fetch and import sources that are already in the library */
  forceDownload: boolean;
  /** Fallback source list used when no urls are given on the command line */
  urls: string[];
  /** Options passed through to yt-dlp */
  youtubedlOptions: YtdlpOptions;
  /** Show yt-dlp output and debug messages */
  verbose: boolean;
  /** Directory holding one subdirectory per source */
  cacheDir: string;
  /** Executable of the host library */
  beetCommand: string;
};

/**
 * Overrides coming from command-line flags
 */
export type CommandFlags = Partial<Pick<EffectiveConfig, 'download' | 'splitFiles' | 'import' | 'keepFiles' | 'forceDownload' | 'verbose'>> & {
  youtubedlOptions?: YtdlpOptions;
};
