import fs from 'fs';
import os from 'os';
import path from 'path';
import { toTrimSystemConfig } from '../src/types/config';
import { loadConfig } from '../src/utils/config';

describe('Configuration', () => {
  let tempDirectory: string;

  beforeEach(() => {
    tempDirectory = fs.mkdtempSync(path.join(os.tmpdir(), 'clip-trimmer-config-'));
  });

  afterEach(() => {
    fs.rmSync(tempDirectory, { recursive: true, force: true });
  });

  it('should apply defaults for an empty environment', () => {
    const config = loadConfig({ TEMP_DIRECTORY: tempDirectory });

    expect(config).toMatchObject({
      port: 2000,
      host: '0.0.0.0',
      tempDirectory,
      ytDlpPath: 'yt-dlp',
      ffmpegPath: 'ffmpeg',
      metadataTimeout: 30000,
      metadataDeadline: 60000,
      trimTimeout: 300000,
      fallbackTimeout: 600000,
      pipelineTimeout: 1800000,
      retryBackoff: 2000,
      sweepInterval: 300000,
      taskTtl: 1800000,
      progressInterval: 500,
      clientStrategies: [],
    });
    expect(config.mirrors.enabled).toBe(true);
    expect(config.mirrors.pipedInstances.length).toBeGreaterThan(0);
    expect(config.youtubeCookiesPath).toBeUndefined();
    expect(config.sentryDsn).toBeUndefined();
  });

  it('should read overrides from the environment', () => {
    const config = loadConfig({
      TEMP_DIRECTORY: tempDirectory,
      PORT: '8080',
      TRIM_TIMEOUT: '1000',
      CLIENT_STRATEGIES: 'ios, web',
      ENABLE_MIRROR_FALLBACK: 'false',
      PIPED_INSTANCES: 'https://piped.test',
      INVIDIOUS_INSTANCES: '',
    });

    expect(config.port).toBe(8080);
    expect(config.trimTimeout).toBe(1000);
    expect(config.clientStrategies).toEqual(['ios', 'web']);
    expect(config.mirrors).toEqual({
      enabled: false,
      timeout: 20000,
      pipedInstances: ['https://piped.test'],
      invidiousInstances: [],
    });
  });

  it('should ignore invalid numbers', () => {
    const config = loadConfig({ TEMP_DIRECTORY: tempDirectory, PORT: 'abc', RETRY_BACKOFF: '-5' });
    expect(config.port).toBe(2000);
    expect(config.retryBackoff).toBe(2000);
  });

  it('should write plaintext cookies to a file', () => {
    const cookies = '.youtube.com\tTRUE\t/\tTRUE\t0\tSID\ttest-secret';
    const config = loadConfig({ TEMP_DIRECTORY: tempDirectory, YOUTUBE_COOKIES: cookies });

    expect(config.youtubeCookiesPath).toBe(path.join(tempDirectory, 'youtube_cookies.txt'));
    expect(fs.readFileSync(path.join(tempDirectory, 'youtube_cookies.txt'), 'utf-8')).toBe(cookies);
  });

  it('should decode base64 cookies', () => {
    const cookies = '# Netscape HTTP Cookie File';
    const config = loadConfig({
      TEMP_DIRECTORY: tempDirectory,
      YOUTUBE_COOKIES: Buffer.from(cookies).toString('base64'),
    });

    expect(config.youtubeCookiesPath).toBeDefined();
    expect(fs.readFileSync(path.join(tempDirectory, 'youtube_cookies.txt'), 'utf-8')).toBe(cookies);
  });

  it('should derive the pipeline configuration', () => {
    const config = loadConfig({
      TEMP_DIRECTORY: tempDirectory,
      METADATA_DEADLINE: '45000',
      ENABLE_MIRROR_FALLBACK: 'false',
    });
    expect(toTrimSystemConfig(config)).toEqual({
      ffmpegPath: 'ffmpeg',
      metadataTimeout: 30000,
      metadataDeadline: 45000,
      trimTimeout: 300000,
      fallbackTimeout: 600000,
      pipelineTimeout: 1800000,
      mirrorFallbackEnabled: false,
    });
  });
});
