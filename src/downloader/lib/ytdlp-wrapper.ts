import * as fsPromises from 'node:fs/promises';
import { join } from 'node:path';
import { execa } from 'execa';
import { errorMessage } from '../../errors/custom-errors.js';
import type { Downloader, DownloaderOptions, DownloadResult } from '../types.js';
import { toYtdlpArgs } from '../ytdlp-options.js';

/**
 * Output template inside the source directory
 */
export const OUTPUT_TEMPLATE = '%(title)s [%(id)s].%(ext)s';

const FILE_PATTERNS = [
  /\[download\] Destination:\s*(.+)/,
  /\[ExtractAudio\] Destination:\s*(.+)/,
  /\[(?:Merger|merge)\] Merging formats into "(.*)"/,
  /\[download\] (.+) has already been downloaded/,
];

const PROGRESS_PATTERN = /\[download\]\s+(\d+\.?\d*)%\s+of\s+~?\s*([\d.]+\w+)\s+at\s+~?\s*([\d.]+\w+\/s)\s+ETA\s+(\S+)/;

/**
 * Low-level wrapper for the yt-dlp CLI
 */
export class YtdlpWrapper implements Downloader {
  getName(): string {
    return 'yt-dlp';
  }

  /**
   * Build the argument list for one invocation
   */
  buildArgs(url: string, dir: string, options: DownloaderOptions = {}): string[] {
    const { args } = toYtdlpArgs(options.options ?? {});
    return [
      '--newline',
      '--no-warnings',
      '--write-info-json',
      '-o',
      join(dir, OUTPUT_TEMPLATE),
      ...args,
      // Source identifiers may start with "-"
      '--',
      url,
    ];
  }

  /**
   * Download using yt-dlp
   *
   * @param url - Source identifier
   * @param dir - Target directory
   * @param options - Wrapper options
   * @returns Files yt-dlp reported writing
   */
  async download(url: string, dir: string, options: DownloaderOptions = {}): Promise<DownloadResult> {
    const { onProgress, onLog } = options;

    await fsPromises.mkdir(dir, { recursive: true });

    const files: Set<string> = new Set();
    const outputBuffer: string[] = [];

    try {
      const subprocess = execa('yt-dlp', this.buildArgs(url, dir, options), { all: true });

      for await (const line of subprocess.iterable({ from: 'all' })) {
        const text = line.trim();
        if (!text) continue;

        outputBuffer.push(text);

        for (const pattern of FILE_PATTERNS) {
          const match = text.match(pattern);
          if (match?.[1]) {
            files.add(match[1]);
          }
        }

        const progressMatch = text.match(PROGRESS_PATTERN);
        if (progressMatch) {
          const [, percentage, totalSize, speed, eta] = progressMatch;
          onProgress?.(`[download] ${percentage}% of ${totalSize} at ${speed} ETA ${eta}`);
          continue;
        }

        onLog?.(text);
      }

      await subprocess;

      return { files: Array.from(files) };
    } catch (error) {
      const fullLog = outputBuffer.join('\n');
      throw new Error(`yt-dlp failed: ${errorMessage(error)}\n\nLog output:\n${fullLog}`);
    }
  }

  /**
   * URL of the first entry of a playlist or search page, without downloading anything
   */
  async findFirstEntry(url: string): Promise<string | undefined> {
    const { stdout } = await execa('yt-dlp', ['--flat-playlist', '--playlist-items', '1', '--print', 'url', '--no-warnings', '--', url]);
    const first = stdout
      .split('\n')
      .map((line) => line.trim())
      .find((line) => line !== '' && line !== 'NA');
    return first;
  }

  /**
   * Check if yt-dlp is installed
   */
  static async checkInstalled(): Promise<boolean> {
    try {
      await execa('yt-dlp', ['--version']);
      return true;
    } catch {
      return false;
    }
  }
}
