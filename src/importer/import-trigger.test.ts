import { existsSync } from 'node:fs';
import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { getDefaults } from '../config/config-defaults.js';
import { ImportError } from '../errors/custom-errors.js';
import { createSourceRequest } from '../sources/source-list.js';
import type { EffectiveConfig } from '../types/config.types.js';
import type { FetchResult, TrackFile } from '../types/pipeline.types.js';
import { logger } from '../utils/logger.js';
import type { ImportRequest, LibraryImporter } from './beets-importer.js';
import { ImportTrigger, SOURCE_FIELD, stageImportBatch } from './import-trigger.js';

const SOURCE_URL = 'https://example.com/playlist?list=PL7';

describe('stageImportBatch', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'ytimport-stage-'));
    await mkdir(join(dir, 'tracks'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should use the shared directory as is', async () => {
    const tracks: TrackFile[] = [
      { path: join(dir, 'tracks', 'One.opus'), title: 'One' },
      { path: join(dir, 'tracks', 'Two.opus'), title: 'Two' },
    ];

    expect(await stageImportBatch(dir, tracks)).toEqual({ directory: join(dir, 'tracks'), tracks, singleton: false });
  });

  it('should flag a single track as a singleton', async () => {
    const tracks: TrackFile[] = [{ path: join(dir, 'Song [x].mp3'), title: 'Song' }];

    expect(await stageImportBatch(dir, tracks)).toEqual({ directory: dir, tracks, singleton: true });
  });

  it('should move stragglers into the tracks directory without clobbering split tracks', async () => {
    await writeFile(join(dir, 'tracks', 'Intro.opus'), 'split');
    await writeFile(join(dir, 'Intro.opus'), 'whole');
    await writeFile(join(dir, 'Outro.opus'), 'whole');

    const batch = await stageImportBatch(dir, [
      { path: join(dir, 'tracks', 'Intro.opus'), title: 'Intro' },
      { path: join(dir, 'Intro.opus'), title: 'Intro' },
      { path: join(dir, 'Outro.opus'), title: 'Outro' },
    ]);

    expect(batch).toEqual({
      directory: join(dir, 'tracks'),
      singleton: false,
      tracks: [
        { path: join(dir, 'tracks', 'Intro.opus'), title: 'Intro' },
        { path: join(dir, 'tracks', 'Intro (2).opus'), title: 'Intro' },
        { path: join(dir, 'tracks', 'Outro.opus'), title: 'Outro' },
      ],
    });
    expect(existsSync(join(dir, 'Intro.opus'))).toBe(false);
    expect(existsSync(join(dir, 'tracks', 'Intro (2).opus'))).toBe(true);
  });
});

describe('ImportTrigger', () => {
  let cacheDir: string;
  let directory: string;
  let config: EffectiveConfig;
  let fetched: FetchResult;
  let tracks: TrackFile[];

  beforeEach(async () => {
    cacheDir = await mkdtemp(join(tmpdir(), 'ytimport-import-'));
    directory = join(cacheDir, 'source');
    await mkdir(join(directory, 'tracks'), { recursive: true });
    tracks = [
      { path: join(directory, 'tracks', 'A.mp3'), title: 'A' },
      { path: join(directory, 'tracks', 'B.mp3'), title: 'B' },
    ];
    for (const track of tracks) {
      await writeFile(track.path, 'audio');
    }
    config = { ...getDefaults({}), cacheDir };
    fetched = { url: SOURCE_URL, directory, files: [] };
    vi.spyOn(logger, 'info').mockImplementation(() => {});
    vi.spyOn(logger, 'warning').mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(cacheDir, { recursive: true, force: true });
  });

  function fakeImporter(failure?: Error, librarySources: string[] = []) {
    const importDirectory = vi.fn(async (_request: ImportRequest) => {
      if (failure) {
        throw failure;
      }
    });
    const contains = vi.fn(async (field: string, value: string) => field === SOURCE_FIELD && librarySources.includes(value));
    const importer: LibraryImporter = { getName: () => 'fake-beet', importDirectory, contains };
    return { importer, importDirectory, contains };
  }

  it('should import once with the source tag and remove the source directory', async () => {
    const { importer, importDirectory } = fakeImporter();

    const outcome = await new ImportTrigger(importer).run(createSourceRequest(SOURCE_URL, config), fetched, tracks);

    expect(outcome.imported).toBe(true);
    expect(importDirectory).toHaveBeenCalledTimes(1);
    expect(importDirectory).toHaveBeenCalledWith({
      directory: join(directory, 'tracks'),
      singleton: false,
      fields: { [SOURCE_FIELD]: SOURCE_URL },
      verbose: false,
    });
    expect(existsSync(directory)).toBe(false);
  });

  it('should keep files when asked to', async () => {
    const { importer } = fakeImporter();

    await new ImportTrigger(importer).run(createSourceRequest(SOURCE_URL, { ...config, keepFiles: true }), fetched, tracks);

    expect(existsSync(tracks[0]?.path ?? '')).toBe(true);
  });

  it('should leave files in place without importing when import is disabled', async () => {
    const { importer, importDirectory } = fakeImporter();

    const outcome = await new ImportTrigger(importer).run(
      createSourceRequest(SOURCE_URL, { ...config, import: false }),
      fetched,
      tracks,
    );

    expect(outcome).toEqual({ imported: false, batch: { directory: join(directory, 'tracks'), tracks, singleton: false } });
    expect(importDirectory).not.toHaveBeenCalled();
    expect(existsSync(directory)).toBe(true);
  });

  it('should not move unsplit files when import is disabled', async () => {
    const { importer } = fakeImporter();
    const whole = join(directory, 'Whole [id].opus');
    await writeFile(whole, 'audio');
    const mixed: TrackFile[] = [tracks[0] ?? { path: '', title: '' }, { path: whole, title: 'Whole' }];

    const outcome = await new ImportTrigger(importer).run(
      createSourceRequest(SOURCE_URL, { ...config, import: false }),
      fetched,
      mixed,
    );

    expect(outcome).toEqual({ imported: false, batch: { directory, tracks: mixed, singleton: false } });
    expect(existsSync(whole)).toBe(true);
    expect(existsSync(join(directory, 'tracks', 'Whole [id].opus'))).toBe(false);
  });

  it('should look sources up by their source field', async () => {
    const { importer, contains } = fakeImporter(undefined, [SOURCE_URL]);
    const trigger = new ImportTrigger(importer);

    await expect(trigger.isImported(SOURCE_URL)).resolves.toBe(true);
    await expect(trigger.isImported('https://example.com/other')).resolves.toBe(false);
    expect(contains).toHaveBeenCalledWith(SOURCE_FIELD, SOURCE_URL);
  });

  it('should report a failing library query as ImportError', async () => {
    const importer: LibraryImporter = {
      getName: () => 'fake-beet',
      importDirectory: vi.fn(async () => {}),
      contains: vi.fn(async () => {
        throw new Error('database is locked');
      }),
    };

    await expect(new ImportTrigger(importer).isImported(SOURCE_URL)).rejects.toThrow(
      `Cannot query the library for ${SOURCE_URL}: database is locked`,
    );
  });

  it('should wrap importer failures and still clean up', async () => {
    const { importer } = fakeImporter(new Error('Command failed with exit code 1'));

    const failure = new ImportTrigger(importer).run(createSourceRequest(SOURCE_URL, config), fetched, tracks);

    await expect(failure).rejects.toBeInstanceOf(ImportError);
    await expect(failure).rejects.toThrow(`Import of ${join(directory, 'tracks')} failed: Command failed with exit code 1`);
    expect(existsSync(directory)).toBe(false);
  });
});
