import { logger } from './logger';

export interface ValidationResult {
  valid: boolean;
  error?: 'empty_url' | 'invalid_format' | 'unsupported_platform';
  message?: string;
  videoId?: string;
}

/**
 * URLValidator - Checks that a URL points at a YouTube video, short or live stream
 */
export class URLValidator {
  private readonly supportedPatterns = [
    /(^|\.)youtube\.com$/,
    /(^|\.)youtu\.be$/,
    /(^|\.)youtube-nocookie\.com$/,
  ];

  private readonly videoIdPatterns = [
    /(?:youtube\.com\/watch\?(?:.*&)?v=|youtu\.be\/|youtube\.com\/embed\/|youtube-nocookie\.com\/embed\/)([a-zA-Z0-9_-]{11})/,
    /youtube\.com\/(?:shorts|live)\/([a-zA-Z0-9_-]{11})/,
    /[?&]v=([a-zA-Z0-9_-]{11})/,
  ];

  validate(url: string): ValidationResult {
    if (!url || url.trim().length === 0) {
      return {
        valid: false,
        error: 'empty_url',
        message: 'URL is required',
      };
    }

    let hostname: string;
    try {
      const urlObj = new URL(url.trim());
      if (urlObj.protocol !== 'https:' && urlObj.protocol !== 'http:') {
        throw new Error(`Unsupported protocol ${urlObj.protocol}`);
      }
      hostname = urlObj.hostname.toLowerCase();
    } catch (error) {
      logger.debug('Invalid URL format', {
        url,
        error: error instanceof Error ? error.message : String(error),
      });
      return {
        valid: false,
        error: 'invalid_format',
        message: 'Invalid YouTube URL',
      };
    }

    if (!this.supportedPatterns.some((pattern) => pattern.test(hostname))) {
      return {
        valid: false,
        error: 'unsupported_platform',
        message: 'Invalid YouTube URL',
      };
    }

    return {
      valid: true,
      videoId: this.extractVideoId(url) ?? undefined,
    };
  }

  isValid(url: string): boolean {
    return this.validate(url).valid;
  }

  /**
   * Extract the 11-character video id, used for mirror lookups
   */
  extractVideoId(url: string): string | null {
    for (const pattern of this.videoIdPatterns) {
      const match = url.match(pattern);
      if (match) return match[1];
    }
    return null;
  }
}
