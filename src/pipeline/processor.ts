import type { FetchOrchestrator } from '../downloader/fetch-orchestrator.js';
import { DownloadError, SourceError, SplitError } from '../errors/custom-errors.js';
import { type ImportTrigger, removeSourceDirectory } from '../importer/import-trigger.js';
import { createSourceRequest } from '../sources/source-list.js';
import type { SplitOutcome, TrackSplitter } from '../splitter/track-splitter.js';
import type { EffectiveConfig } from '../types/config.types.js';
import type { FetchResult, SourceRequest } from '../types/pipeline.types.js';
import { logger } from '../utils/logger.js';
import type { ProcessingReport, SourceOutcome } from './report.js';

/**
 * Stages a source passes through
 */
export type PipelineCollaborators = {
  fetcher: Pick<FetchOrchestrator, 'fetch' | 'sourceDirectory'>;
  splitter: Pick<TrackSplitter, 'split'>;
  importer: Pick<ImportTrigger, 'run' | 'isImported'>;
};

/**
 * Process sources one at a time, in order
 *
 * A SourceError ends only its own source; anything else aborts the run.
 */
export async function processSources(
  sources: readonly string[],
  config: EffectiveConfig,
  collaborators: PipelineCollaborators,
): Promise<ProcessingReport> {
  const outcomes: SourceOutcome[] = [];

  for (const [index, url] of sources.entries()) {
    const request = createSourceRequest(url, config);
    logger.highlight(`[${index + 1}/${sources.length}] ${url}`);

    try {
      outcomes.push(await processSource(request, collaborators));
    } catch (error) {
      if (!(error instanceof SourceError)) {
        throw error;
      }
      logger.error(error.message);
      outcomes.push({ status: 'failed', url, error });
    }
  }

  return { outcomes };
}

async function processSource(request: SourceRequest, collaborators: PipelineCollaborators): Promise<SourceOutcome> {
  const { url, config } = request;

  if (!config.download && !config.import) {
    logger.info('Download and import are both disabled, nothing to do');
    return { status: 'validated', url };
  }

  if (!config.forceDownload && (await collaborators.importer.isImported(url))) {
    logger.info(`${url} is already in the library, skipping (use --force-download to fetch it again)`);
    return { status: 'skipped', url };
  }

  let fetched: FetchResult;
  let split: SplitOutcome;
  try {
    fetched = await collaborators.fetcher.fetch(request);
    split = await collaborators.splitter.split(request, fetched);
  } catch (error) {
    // Partial downloads of this run; the import step cleans up after itself
    if ((error instanceof DownloadError || error instanceof SplitError) && config.download && !config.keepFiles) {
      await removeSourceDirectory(collaborators.fetcher.sourceDirectory(request));
    }
    throw error;
  }

  const { tracks, warnings } = split;
  const { imported, batch } = await collaborators.importer.run(request, fetched, tracks);

  const summary = { url, directory: batch.directory, trackCount: batch.tracks.length, warnings };
  if (imported) {
    logger.success(`Imported ${batch.tracks.length} file(s) from ${url}`);
    return { status: 'imported', ...summary };
  }
  return { status: 'downloaded', ...summary };
}
