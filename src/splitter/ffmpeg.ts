import { execa } from 'execa';
import { toFfmpegTime } from '../utils/time-utils.js';

/**
 * One time range to cut out of a media file
 */
export type ExtractRequest = {
  input: string;
  output: string;
  /** Start offset in seconds (inclusive) */
  start: number;
  /** End offset in seconds (exclusive) */
  end: number;
  /** Tags written to the output file */
  metadata: Record<string, string>;
};

export type TrackExtractor = {
  extract(request: ExtractRequest): Promise<void>;
};

/**
 * Cuts tracks with ffmpeg, copying the audio stream without re-encoding
 */
export class FfmpegExtractor implements TrackExtractor {
  constructor(private readonly command: string = 'ffmpeg') {}

  buildArgs(request: ExtractRequest): string[] {
    const metadataArgs = Object.entries(request.metadata).flatMap(([key, value]) => ['-metadata', `${key}=${value}`]);

    return [
      '-hide_banner',
      '-loglevel',
      'error',
      '-y',
      '-i',
      request.input,
      '-ss',
      toFfmpegTime(request.start),
      '-to',
      toFfmpegTime(request.end),
      '-vn',
      // Drop the container's chapter list and album-wide tags
      '-map_metadata',
      '-1',
      '-map_chapters',
      '-1',
      '-c:a',
      'copy',
      ...metadataArgs,
      request.output,
    ];
  }

  async extract(request: ExtractRequest): Promise<void> {
    await execa(this.command, this.buildArgs(request));
  }
}

/**
 * Check if ffmpeg is installed
 */
export async function checkFfmpegInstalled(command: string = 'ffmpeg'): Promise<boolean> {
  try {
    await execa(command, ['-version']);
    return true;
  } catch {
    return false;
  }
}
