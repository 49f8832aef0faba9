import fs from 'fs';
import os from 'os';
import path from 'path';
import { AppConfig } from '../types/config';
import { logger } from './logger';

const DEFAULT_PIPED_INSTANCES = [
  'https://pipedapi.kavin.rocks',
  'https://api.piped.private.coffee',
  'https://pipedapi.adminforge.de',
];

const DEFAULT_INVIDIOUS_INSTANCES = [
  'https://inv.nadeko.net',
  'https://invidious.nerdvpn.de',
  'https://yewtu.be',
];

/**
 * Initialize YouTube cookies from environment variable
 * Writes plaintext or base64-encoded cookies to a file yt-dlp can read
 */
function initializeYoutubeCookies(
  cookiesContent: string,
  tempDir: string,
): string | undefined {
  try {
    if (!fs.existsSync(tempDir)) {
      fs.mkdirSync(tempDir, { recursive: true });
    }

    const cookiesPath = path.join(tempDir, 'youtube_cookies.txt');

    // Netscape cookie files are tab separated; anything else is treated as base64
    const decodedContent =
      cookiesContent.includes('\t') || cookiesContent.includes('youtube.com')
        ? cookiesContent
        : Buffer.from(cookiesContent, 'base64').toString('utf-8');

    fs.writeFileSync(cookiesPath, decodedContent, 'utf-8');
    return cookiesPath;
  } catch (error) {
    logger.warn('Failed to initialize YouTube cookies', {
      error: error instanceof Error ? error.message : String(error),
    });
    return undefined;
  }
}

function parseList(value: string | undefined, fallback: string[]): string[] {
  if (value === undefined) {
    return fallback;
  }
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

function parseNumber(value: string | undefined, fallback: number): number {
  const parsed = parseInt(value || '', 10);
  return Number.isFinite(parsed) && parsed >= 0 ? parsed : fallback;
}

/**
 * Load configuration from environment variables
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const tempDirectory =
    env.TEMP_DIRECTORY || path.join(os.tmpdir(), 'clip-trimmer');

  return {
    port: parseNumber(env.PORT, 2000),
    host: env.HOST || '0.0.0.0',
    tempDirectory,
    ytDlpPath: env.YTDLP_PATH || 'yt-dlp',
    ffmpegPath: env.FFMPEG_PATH || 'ffmpeg',
    metadataTimeout: parseNumber(env.METADATA_TIMEOUT, 30000), // per strategy attempt
    metadataDeadline: parseNumber(env.METADATA_DEADLINE, 60000), // whole lookup, mirrors included
    trimTimeout: parseNumber(env.TRIM_TIMEOUT, 300000), // 5 min per strategy attempt
    fallbackTimeout: parseNumber(env.FALLBACK_TIMEOUT, 600000), // 10 min
    pipelineTimeout: parseNumber(env.PIPELINE_TIMEOUT, 1800000), // 30 min hard ceiling
    retryBackoff: parseNumber(env.RETRY_BACKOFF, 2000),
    sweepInterval: parseNumber(env.SWEEP_INTERVAL, 300000), // 5 min
    taskTtl: parseNumber(env.TASK_TTL, 1800000), // 30 min
    progressInterval: parseNumber(env.PROGRESS_INTERVAL, 500),
    clientStrategies: parseList(env.CLIENT_STRATEGIES, []),
    mirrors: {
      enabled: env.ENABLE_MIRROR_FALLBACK !== 'false',
      timeout: parseNumber(env.MIRROR_TIMEOUT, 20000),
      pipedInstances: parseList(env.PIPED_INSTANCES, DEFAULT_PIPED_INSTANCES),
      invidiousInstances: parseList(
        env.INVIDIOUS_INSTANCES,
        DEFAULT_INVIDIOUS_INSTANCES,
      ),
    },
    youtubeCookiesPath: env.YOUTUBE_COOKIES
      ? initializeYoutubeCookies(env.YOUTUBE_COOKIES, tempDirectory)
      : undefined,
    sentryDsn: env.SENTRY_DSN || undefined,
  };
}
