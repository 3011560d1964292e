import type { YtdlpOptions } from '../types/config.types.js';

/**
 * Options that decide where yt-dlp writes files; the fetch orchestrator owns those.
 */
export const RESERVED_OPTIONS: ReadonlySet<string> = new Set([
  'o',
  'output',
  'P',
  'paths',
  'write-info-json',
  'no-write-info-json',
]);

export type TranslatedOptions = {
  args: string[];
  /** Reserved keys that were dropped */
  ignored: string[];
};

/**
 * Translate the opaque options map into yt-dlp command-line arguments
 *
 * - `format: bestaudio` → `--format bestaudio` (`_` in keys becomes `-`, one-letter keys use `-k`)
 * - `true` → `--flag`, `false` → `--no-flag` (or `--flag` for keys already starting with `no-`)
 * - arrays repeat the flag, mappings emit `name:value` per entry
 * - null/undefined are skipped
 */
export function toYtdlpArgs(options: YtdlpOptions): TranslatedOptions {
  const args: string[] = [];
  const ignored: string[] = [];

  for (const [key, value] of Object.entries(options)) {
    const name = key.replace(/_/g, '-');

    if (RESERVED_OPTIONS.has(name)) {
      ignored.push(key);
      continue;
    }

    const short = name.length === 1;
    const flag = short ? `-${name}` : `--${name}`;

    if (value === null || value === undefined) {
      continue;
    }

    if (value === true) {
      args.push(flag);
    } else if (value === false) {
      if (!short) {
        args.push(name.startsWith('no-') ? `--${name.slice(3)}` : `--no-${name}`);
      }
    } else if (Array.isArray(value)) {
      for (const item of value) {
        args.push(flag, stringifyValue(item));
      }
    } else if (isMapping(value)) {
      for (const [entryKey, entryValue] of Object.entries(value)) {
        args.push(flag, `${entryKey}:${stringifyValue(entryValue)}`);
      }
    } else {
      args.push(flag, stringifyValue(value));
    }
  }

  return { args, ignored };
}

function isMapping(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringifyValue(value: unknown): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'bigint' || typeof value === 'boolean') return String(value);
  return JSON.stringify(value);
}
