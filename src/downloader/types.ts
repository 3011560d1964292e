import type { YtdlpOptions } from '../types/config.types.js';

export type DownloadResult = {
  /** Files the downloader reported writing (informational; the directory is scanned afterwards) */
  files: string[];
};

export type DownloaderOptions = {
  /** Options forwarded to the downloader */
  options?: YtdlpOptions;
  /** Callback for progress updates (e.g. percentage, ETA) - usually printed on same line */
  onProgress?: (progress: string) => void;
  /** Callback for log messages (e.g. info, extracting) - printed as new lines */
  onLog?: (message: string) => void;
};

export type Downloader = {
  /**
   * Get downloader name
   */
  getName(): string;

  /**
   * Download everything a source identifier points at into a directory
   * @param url Source identifier
   * @param dir Target directory
   * @param options Download options
   */
  download(url: string, dir: string, options?: DownloaderOptions): Promise<DownloadResult>;
};
