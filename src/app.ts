import { array, boolean, command, flag, multioption, option, optional, restPositionals, string } from 'cmd-ts';
import { getDefaults } from './config/config-defaults.js';
import { type LoadedConfig, loadConfig } from './config/config-loader.js';
import { resolveConfig } from './config/config-resolver.js';
import { FetchOrchestrator } from './downloader/fetch-orchestrator.js';
import { YtdlpWrapper } from './downloader/lib/ytdlp-wrapper.js';
import { ConfigError, errorMessage, NoSourcesError } from './errors/custom-errors.js';
import { BeetsImporter } from './importer/beets-importer.js';
import { ImportTrigger } from './importer/import-trigger.js';
import { type PipelineCollaborators, processSources } from './pipeline/processor.js';
import { describeOutcome, exitCodeFor, type ProcessingReport } from './pipeline/report.js';
import { type EntryFinder, parseAlbumQuery, resolveAlbumSources } from './sources/album-search.js';
import { buildSourceList } from './sources/source-list.js';
import { checkFfmpegInstalled, FfmpegExtractor } from './splitter/ffmpeg.js';
import { TrackSplitter } from './splitter/track-splitter.js';
import type { CommandFlags, EffectiveConfig } from './types/config.types.js';
import { LogLevel, logger } from './utils/logger.js';
import { formatDuration } from './utils/time-utils.js';

export type AppDependencies = {
  loadConfig: typeof loadConfig;
  checkYtDlpInstalled: () => Promise<boolean>;
  checkFfmpegInstalled: () => Promise<boolean>;
  findAlbum: EntryFinder;
  createPipeline: (config: EffectiveConfig, loaded: LoadedConfig) => PipelineCollaborators;
};

const defaultDependencies: AppDependencies = {
  loadConfig,
  checkYtDlpInstalled: YtdlpWrapper.checkInstalled,
  checkFfmpegInstalled: () => checkFfmpegInstalled(),
  findAlbum: (searchUrl) => new YtdlpWrapper().findFirstEntry(searchUrl),
  createPipeline: (config, loaded) => ({
    fetcher: new FetchOrchestrator(new YtdlpWrapper()),
    splitter: new TrackSplitter(new FfmpegExtractor()),
    importer: new ImportTrigger(new BeetsImporter(config.beetCommand, loaded.explicit ? loaded.path : undefined)),
  }),
};

export type RunOptions = {
  /** Explicit configuration file (forwarded to beets) */
  configPath?: string;
  /** "<artist> - <album>" searches whose best match is processed after the urls */
  albums?: readonly string[];
  flags?: CommandFlags;
};

export async function runApp(
  urls: readonly string[],
  options: RunOptions = {},
  deps: AppDependencies = defaultDependencies,
): Promise<ProcessingReport> {
  const loaded = await deps.loadConfig(options.configPath);
  logger.debug(loaded.section === undefined ? `No ytimport section in ${loaded.path}` : `Configuration loaded from ${loaded.path}`);

  const config = resolveConfig(getDefaults(), loaded.section, options.flags);
  if (config.verbose) {
    logger.setLevel(LogLevel.DEBUG);
  }

  const albums = (options.albums ?? []).map(parseAlbumQuery);
  const sources = buildSourceList(urls, config.urls, albums.length > 0);

  if (config.download || albums.length > 0) {
    logger.debug('Checking yt-dlp installation...');
    const ytDlpInstalled = await deps.checkYtDlpInstalled();

    if (!ytDlpInstalled) {
      throw new Error(
        'yt-dlp is not installed. Please install it first:\n' +
          '  - macOS: brew install yt-dlp\n' +
          '  - Linux: pip install yt-dlp\n' +
          '  - Windows: winget install yt-dlp',
      );
    }
  }

  if (config.splitFiles && (config.download || config.import)) {
    logger.debug('Checking ffmpeg installation...');
    const ffmpegInstalled = await deps.checkFfmpegInstalled();

    if (!ffmpegInstalled) {
      throw new Error(
        'ffmpeg is not installed (needed to split files by chapter). Install it or pass --no-split-files:\n' +
          '  - macOS: brew install ffmpeg\n' +
          '  - Linux: apt install ffmpeg\n' +
          '  - Windows: winget install ffmpeg',
      );
    }
  }

  const startedAt = Date.now();
  const found = await resolveAlbumSources(albums, deps.findAlbum);
  sources.push(...found.urls);

  const processed = await processSources(sources, config, deps.createPipeline(config, loaded));
  const report: ProcessingReport = {
    outcomes: [
      ...found.failures.map((error) => ({ status: 'failed' as const, url: error.url, error })),
      ...processed.outcomes,
    ],
  };

  for (const outcome of report.outcomes) {
    if (outcome.status === 'failed') {
      logger.error(describeOutcome(outcome));
    } else {
      logger.success(describeOutcome(outcome));
    }
  }
  logger.info(`Processed ${report.outcomes.length} source(s) in ${formatDuration(Date.now() - startedAt)}`);

  return report;
}

/**
 * Combine a `--name` / `--no-name` flag pair
 *
 * @throws ConfigError if both forms are given
 */
export function toggle(name: string, on: boolean, off: boolean): boolean | undefined {
  if (on && off) {
    throw new ConfigError(`--${name} and --no-${name} cannot be used together`);
  }
  if (on) {
    return true;
  }
  return off ? false : undefined;
}

export type CliArgs = {
  download: boolean;
  noDownload: boolean;
  splitFiles: boolean;
  noSplitFiles: boolean;
  import: boolean;
  noImport: boolean;
  keepFiles: boolean;
  noKeepFiles: boolean;
  forceDownload: boolean;
  format?: string;
  verbose: boolean;
};

/**
 * Translate parsed command-line flags into configuration overrides
 */
export function buildFlags(args: CliArgs): CommandFlags {
  const flags: CommandFlags = {
    download: toggle('download', args.download, args.noDownload),
    splitFiles: toggle('split-files', args.splitFiles, args.noSplitFiles),
    import: toggle('import', args.import, args.noImport),
    keepFiles: toggle('keep-files', args.keepFiles, args.noKeepFiles),
    forceDownload: args.forceDownload ? true : undefined,
    verbose: args.verbose ? true : undefined,
  };
  if (args.format !== undefined) {
    flags.youtubedlOptions = { format: args.format };
  }
  return flags;
}

// Define CLI using cmd-ts
export const cli = command({
  name: 'ytimport',
  description: 'Download audio with yt-dlp, split it by chapters and import it into beets',
  args: {
    urls: restPositionals({
      type: string,
      displayName: 'urls',
      description: 'Sources to fetch (default: "urls" from the configuration)',
    }),
    config: option({
      type: optional(string),
      long: 'config',
      short: 'c',
      description: 'Path to the beets configuration file (default: beets config.yaml)',
    }),
    download: flag({ type: boolean, long: 'download', description: 'Download sources with yt-dlp' }),
    noDownload: flag({ type: boolean, long: 'no-download', description: 'Reuse files downloaded earlier' }),
    splitFiles: flag({ type: boolean, long: 'split-files', description: 'Split files by chapter' }),
    noSplitFiles: flag({ type: boolean, long: 'no-split-files', description: 'Keep files whole' }),
    import: flag({ type: boolean, long: 'import', description: 'Import the tracks into beets' }),
    noImport: flag({ type: boolean, long: 'no-import', description: 'Leave the tracks in the cache directory' }),
    keepFiles: flag({ type: boolean, long: 'keep-files', description: 'Keep files after importing' }),
    noKeepFiles: flag({ type: boolean, long: 'no-keep-files', description: 'Remove files after importing' }),
    forceDownload: flag({
      type: boolean,
      long: 'force-download',
      description: 'Fetch and import sources already in the library again',
    }),
    albums: multioption({
      type: array(string),
      long: 'album',
      short: 'a',
      description: 'Search YouTube Music for "<artist> - <album>" and process the best match',
    }),
    format: option({
      type: optional(string),
      long: 'format',
      short: 'f',
      description: 'yt-dlp format selector (overrides youtubedl_options.format)',
    }),
    verbose: flag({ type: boolean, long: 'verbose', short: 'v', description: 'Show debug output' }),
  },
  handler: async ({ urls, config, albums, ...rest }) => {
    try {
      const report = await runApp(urls, { configPath: config, albums, flags: buildFlags(rest) });
      process.exitCode = exitCodeFor(report);
    } catch (error) {
      if (error instanceof ConfigError) {
        logger.error(`Configuration error: ${error.message}`);
      } else if (error instanceof NoSourcesError) {
        logger.error(`Nothing to do: ${error.message}`);
      } else {
        logger.error(`Fatal error: ${errorMessage(error)}`);
      }
      process.exit(1);
    }
  },
});
