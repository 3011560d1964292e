/**
 * Base error class for ytimport
 */
export class YtImportError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'YtImportError';
  }
}

/**
 * Configuration error (fatal, raised before any source is processed)
 */
export class ConfigError extends YtImportError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Neither command arguments nor configured urls name anything to process
 */
export class NoSourcesError extends YtImportError {
  constructor(message: string) {
    super(message);
    this.name = 'NoSourcesError';
  }
}

/**
 * Failure that ends processing of a single source
 */
export abstract class SourceError extends YtImportError {
  constructor(
    message: string,
    public readonly url: string,
  ) {
    super(message);
  }
}

/**
 * Download error
 */
export class DownloadError extends SourceError {
  constructor(message: string, url: string) {
    super(message, url);
    this.name = 'DownloadError';
  }
}

/**
 * Split error (unreadable source file or failed extraction)
 */
export class SplitError extends SourceError {
  constructor(message: string, url: string) {
    super(message, url);
    this.name = 'SplitError';
  }
}

/**
 * Import error raised by the host library
 */
export class ImportError extends SourceError {
  constructor(message: string, url: string) {
    super(message, url);
    this.name = 'ImportError';
  }
}

/**
 * Skipped chapter. Collected and reported, never thrown.
 */
export class SplitWarning extends YtImportError {
  constructor(
    message: string,
    public readonly url: string,
    public readonly chapterIndex: number,
  ) {
    super(message);
    this.name = 'SplitWarning';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
