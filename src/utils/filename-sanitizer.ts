const MAX_FILENAME_LENGTH = 200;

/**
 * Utility to sanitize filenames for cross-platform compatibility
 * Specifically targets Windows restrictions which are stricter than *nix
 */
export function sanitizeFilename(name: string): string {
  return (
    name
      // Replace Windows illegal characters: < > : " / \ | ? *
      .replace(/[<>:"/\\|?*]/g, '_')
      // Remove control characters (0-31 in ASCII)
      // biome-ignore lint/suspicious/noControlCharactersInRegex: Needed to strip control characters
      .replace(/[\x00-\x1F]/g, '')
      // Leading dots would hide the file on *nix
      .replace(/^[\s.]+/, '')
      .slice(0, MAX_FILENAME_LENGTH)
      // Remove trailing spaces and dots (Windows doesn't like them)
      .replace(/[\s.]+$/, '')
  );
}

/**
 * Claim a file name that is not yet in `taken`, appending " (2)", " (3)", ...
 * on collision. Comparison is case-insensitive; the claimed name is added to `taken`.
 *
 * @param base - Sanitized name without extension
 * @param ext - Extension including the leading dot (may be empty)
 * @param taken - Lower-cased names already in use
 */
export function uniqueFilename(base: string, ext: string, taken: Set<string>): string {
  let candidate = `${base}${ext}`;
  let counter = 2;

  while (taken.has(candidate.toLowerCase())) {
    candidate = `${base} (${counter})${ext}`;
    counter++;
  }

  taken.add(candidate.toLowerCase());
  return candidate;
}
