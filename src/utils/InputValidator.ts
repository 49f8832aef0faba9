import { z } from 'zod';
import { logger } from './logger';

export const DEFAULT_FILENAME = 'trimmed_video';
const MAX_FILENAME_LENGTH = 100;

// Seconds as a JSON number or a numeric string; null, '' and words are rejected
const TimeValueSchema = z
  .union([z.number(), z.string().trim().regex(/^-?(\d+(\.\d*)?|\.\d+)$/)])
  .pipe(z.coerce.number().finite());

/**
 * Body of a start-trim request as received over HTTP
 */
export const TrimRequestSchema = z.object({
  url: z.string().trim().min(1, 'URL is required'),
  startTime: TimeValueSchema.default(0),
  endTime: TimeValueSchema,
  quality: z.string().default('best'),
  filename: z.string().optional(),
});

export const VideoInfoRequestSchema = z.object({
  url: z.string().trim().min(1, 'URL is required'),
});

/**
 * InputValidator - Validates and sanitizes user inputs
 */
export class InputValidator {
  /**
   * Truncate to 100 characters and replace characters that are not
   * allowed in file names
   */
  static sanitizeFilename(input: string | undefined): string {
    const truncated = String(input ?? '').trim().substring(0, MAX_FILENAME_LENGTH);
    const sanitized = truncated.replace(/[<>:"/\\|?*\x00-\x1F]/g, '_');

    if (sanitized.length === 0 || /^\.+$/.test(sanitized)) {
      logger.debug('Empty filename replaced with default', { input });
      return DEFAULT_FILENAME;
    }

    return sanitized;
  }

  /**
   * A trim window must start at or after zero and end after it starts
   */
  static isValidTimeRange(startTime: number, endTime: number): boolean {
    return (
      Number.isFinite(startTime) &&
      Number.isFinite(endTime) &&
      startTime >= 0 &&
      endTime > startTime
    );
  }

  /**
   * Seconds as ffmpeg / yt-dlp accept them (no exponent, trimmed decimals)
   */
  static formatSeconds(value: number): string {
    return Number.isInteger(value) ? String(value) : value.toFixed(3).replace(/\.?0+$/, '');
  }
}
