/**
 * Zod schema for the persisted plugin section of the beets config.yaml
 *
 * Keys follow beets' snake_case convention. Unknown top-level keys are rejected;
 * `youtubedl_options` is an opaque map forwarded to yt-dlp.
 */

import { z } from 'zod';

export const PersistedConfigSchema = z.strictObject({
  download: z.boolean().optional().describe('Download sources with yt-dlp'),
  split_files: z.boolean().optional().describe('Split files with chapter markers into tracks'),
  import: z.boolean().optional().describe('Run beet import on the resulting tracks'),
  keep_files: z.boolean().optional().describe('Keep files after the import'),
  force_download: z.boolean().optional().describe('Fetch sources already in the library again'),
  verbose: z.boolean().optional().describe('Print debug output'),
  urls: z.array(z.string().min(1, 'Cannot be empty')).optional().describe('Default source list'),
  youtubedl_options: z.record(z.string(), z.unknown()).optional().describe('Options forwarded to yt-dlp'),
  cache_dir: z.string().min(1, 'Cannot be empty').optional().describe('Directory for downloads'),
  beet_command: z.string().min(1, 'Cannot be empty').optional().describe('beets executable'),
});

export type PersistedConfig = z.infer<typeof PersistedConfigSchema>;

/**
 * Validate the plugin section
 *
 * @param raw - Raw value found under the plugin key (null/undefined means "not configured")
 */
export function validatePersistedConfig(raw: unknown): { success: true; data: PersistedConfig } | { success: false; error: string } {
  const result = PersistedConfigSchema.safeParse(raw ?? {});
  if (result.success) {
    return { success: true, data: result.data };
  }
  return { success: false, error: formatZodError(result.error) };
}

/**
 * Format Zod error into a readable message
 */
export function formatZodError(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.length > 0 ? `"${issue.path.join('.')}"` : 'value';
      const code = issue.code.toUpperCase();
      return `${path} ${issue.message} [${code}]`;
    })
    .join('; ');
}
