import { existsSync } from 'node:fs';
import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { getDefaults } from '../config/config-defaults.js';
import { FetchOrchestrator, sourceKey } from '../downloader/fetch-orchestrator.js';
import type { Downloader } from '../downloader/types.js';
import { DownloadError } from '../errors/custom-errors.js';
import type { ImportRequest, LibraryImporter } from '../importer/beets-importer.js';
import { ImportTrigger } from '../importer/import-trigger.js';
import type { ExtractRequest, TrackExtractor } from '../splitter/ffmpeg.js';
import { TrackSplitter } from '../splitter/track-splitter.js';
import type { EffectiveConfig } from '../types/config.types.js';
import { logger } from '../utils/logger.js';
import { type PipelineCollaborators, processSources } from './processor.js';
import { exitCodeFor } from './report.js';

const URL_A = 'https://example.com/watch?v=missing';
const URL_B = 'https://example.com/watch?v=album3';

describe('processSources', () => {
  let cacheDir: string;
  let config: EffectiveConfig;

  beforeEach(async () => {
    cacheDir = await mkdtemp(join(tmpdir(), 'ytimport-pipeline-'));
    config = { ...getDefaults({}), cacheDir };
    vi.spyOn(logger, 'debug').mockImplementation(() => {});
    vi.spyOn(logger, 'info').mockImplementation(() => {});
    vi.spyOn(logger, 'success').mockImplementation(() => {});
    vi.spyOn(logger, 'warning').mockImplementation(() => {});
    vi.spyOn(logger, 'error').mockImplementation(() => {});
    vi.spyOn(logger, 'highlight').mockImplementation(() => {});
    vi.spyOn(logger, 'progress').mockImplementation(() => {});
    vi.spyOn(logger, 'endProgress').mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(cacheDir, { recursive: true, force: true });
  });

  function buildPipeline(librarySources: string[] = []) {
    const download = vi.fn(async (url: string, dir: string) => {
      if (url === URL_A) {
        await mkdir(dir, { recursive: true });
        await writeFile(join(dir, 'Missing [missing].webm.part'), 'partial');
        throw new Error('HTTP Error 404: Not Found');
      }
      await mkdir(dir, { recursive: true });
      await writeFile(join(dir, 'Album [album3].m4a'), 'audio');
      await writeFile(
        join(dir, 'Album [album3].info.json'),
        JSON.stringify({
          id: 'album3',
          title: 'Album',
          chapters: [
            { start_time: 0, end_time: 100, title: 'First' },
            { start_time: 100, end_time: 200, title: 'Second' },
            { start_time: 200, end_time: 300, title: 'Third' },
          ],
        }),
      );
      return { files: [join(dir, 'Album [album3].m4a')] };
    });
    const downloader: Downloader = { getName: () => 'fake-dl', download };

    const extract = vi.fn(async (request: ExtractRequest) => {
      await writeFile(request.output, '');
    });
    const extractor: TrackExtractor = { extract };

    const imported: { request: ImportRequest; files: string[] }[] = [];
    const importDirectory = vi.fn(async (request: ImportRequest) => {
      imported.push({
        request,
        files: ['First.m4a', 'Second.m4a', 'Third.m4a'].filter((name) => existsSync(join(request.directory, name))),
      });
    });
    const contains = vi.fn(async (_field: string, value: string) => librarySources.includes(value));
    const importer: LibraryImporter = { getName: () => 'fake-beet', importDirectory, contains };

    const collaborators: PipelineCollaborators = {
      fetcher: new FetchOrchestrator(downloader),
      splitter: new TrackSplitter(extractor),
      importer: new ImportTrigger(importer),
    };
    return { collaborators, download, extract, importDirectory, imported };
  }

  it('should fail one source and import the chapters of the next', async () => {
    const { collaborators, extract, importDirectory, imported } = buildPipeline();

    const report = await processSources([URL_A, URL_B], config, collaborators);

    const tracksDir = join(cacheDir, sourceKey(URL_B), 'tracks');
    expect(report.outcomes).toHaveLength(2);
    expect(report.outcomes[0]?.status).toBe('failed');
    const failure = report.outcomes[0];
    if (failure?.status !== 'failed') {
      throw new Error('expected a failed outcome');
    }
    expect(failure.error).toBeInstanceOf(DownloadError);
    expect(failure.url).toBe(URL_A);
    expect(existsSync(join(cacheDir, sourceKey(URL_A)))).toBe(false);

    expect(report.outcomes[1]).toEqual({
      status: 'imported',
      url: URL_B,
      directory: tracksDir,
      trackCount: 3,
      warnings: [],
    });
    expect(extract).toHaveBeenCalledTimes(3);
    expect(importDirectory).toHaveBeenCalledTimes(1);
    expect(imported[0]?.files).toEqual(['First.m4a', 'Second.m4a', 'Third.m4a']);
    expect(imported[0]?.request.singleton).toBe(false);
    expect(existsSync(join(cacheDir, sourceKey(URL_B)))).toBe(false);
    expect(exitCodeFor(report)).toBe(1);
  });

  it('should keep a failed download when files are kept', async () => {
    const { collaborators } = buildPipeline();

    await processSources([URL_A], { ...config, keepFiles: true }, collaborators);

    expect(existsSync(join(cacheDir, sourceKey(URL_A), 'Missing [missing].webm.part'))).toBe(true);
  });

  it('should skip sources already in the library', async () => {
    const { collaborators, download, importDirectory } = buildPipeline([URL_B]);

    const report = await processSources([URL_B], config, collaborators);

    expect(report.outcomes).toEqual([{ status: 'skipped', url: URL_B }]);
    expect(download).not.toHaveBeenCalled();
    expect(importDirectory).not.toHaveBeenCalled();
    expect(exitCodeFor(report)).toBe(0);
  });

  it('should fetch and import again when forced', async () => {
    const { collaborators, download, importDirectory } = buildPipeline([URL_B]);

    const report = await processSources([URL_B], { ...config, forceDownload: true }, collaborators);

    expect(report.outcomes[0]?.status).toBe('imported');
    expect(download).toHaveBeenCalledTimes(1);
    expect(importDirectory).toHaveBeenCalledTimes(1);
  });

  it('should keep downloaded tracks when import is disabled', async () => {
    const { collaborators, importDirectory } = buildPipeline();

    const report = await processSources([URL_B], { ...config, import: false }, collaborators);

    expect(report.outcomes[0]?.status).toBe('downloaded');
    expect(importDirectory).not.toHaveBeenCalled();
    expect(existsSync(join(cacheDir, sourceKey(URL_B), 'tracks', 'Second.m4a'))).toBe(true);
    expect(exitCodeFor(report)).toBe(0);
  });

  it('should only validate when download and import are both off', async () => {
    const { collaborators, download, extract, importDirectory } = buildPipeline();
    const untouched = join(cacheDir, 'never-created');

    const report = await processSources(
      [URL_A, URL_B],
      { ...config, cacheDir: untouched, download: false, import: false },
      collaborators,
    );

    expect(report.outcomes).toEqual([
      { status: 'validated', url: URL_A },
      { status: 'validated', url: URL_B },
    ]);
    expect(download).not.toHaveBeenCalled();
    expect(extract).not.toHaveBeenCalled();
    expect(importDirectory).not.toHaveBeenCalled();
    expect(existsSync(untouched)).toBe(false);
  });

  it('should propagate errors that are not tied to a source', async () => {
    const collaborators: PipelineCollaborators = {
      ...buildPipeline().collaborators,
      fetcher: {
        fetch: vi.fn(async () => {
          throw new TypeError('unexpected');
        }),
        sourceDirectory: () => join(cacheDir, 'unused'),
      },
    };

    await expect(processSources([URL_B], config, collaborators)).rejects.toThrow(TypeError);
  });
});
