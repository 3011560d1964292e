import type { SourceError, SplitWarning } from '../errors/custom-errors.js';

/**
 * Result of processing one source
 */
export type SourceOutcome =
  | { status: 'imported'; url: string; directory: string; trackCount: number; warnings: SplitWarning[] }
  | { status: 'downloaded'; url: string; directory: string; trackCount: number; warnings: SplitWarning[] }
  | { status: 'validated'; url: string }
  | { status: 'skipped'; url: string }
  | { status: 'failed'; url: string; error: SourceError };

export type ProcessingReport = {
  outcomes: SourceOutcome[];
};

function plural(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? '' : 's'}`;
}

/**
 * One-line summary of an outcome
 */
export function describeOutcome(outcome: SourceOutcome): string {
  switch (outcome.status) {
    case 'imported':
      return `${outcome.url}: imported ${plural(outcome.trackCount, 'track')} from ${outcome.directory}`;
    case 'downloaded':
      return `${outcome.url}: ${plural(outcome.trackCount, 'track')} ready in ${outcome.directory} (import skipped)`;
    case 'validated':
      return `${outcome.url}: configuration valid, nothing to do`;
    case 'skipped':
      return `${outcome.url}: already in the library, skipped`;
    case 'failed':
      return `${outcome.url}: ${outcome.error.name}: ${outcome.error.message}`;
  }
}

export function hasFailures(report: ProcessingReport): boolean {
  return report.outcomes.some((outcome) => outcome.status === 'failed');
}

export function exitCodeFor(report: ProcessingReport): number {
  return hasFailures(report) ? 1 : 0;
}
