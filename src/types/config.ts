import { TrimSystemConfig } from '../download/core/types';

export interface MirrorConfig {
  enabled: boolean;
  timeout: number;
  pipedInstances: string[];
  invidiousInstances: string[];
}

export interface AppConfig {
  port: number;
  host: string;
  tempDirectory: string;
  ytDlpPath: string;
  ffmpegPath: string;
  metadataTimeout: number;
  metadataDeadline: number;
  trimTimeout: number;
  fallbackTimeout: number;
  pipelineTimeout: number;
  retryBackoff: number;
  sweepInterval: number;
  taskTtl: number;
  progressInterval: number;
  clientStrategies: string[];
  mirrors: MirrorConfig;
  youtubeCookiesPath?: string;
  sentryDsn?: string;
}

/**
 * Subset of AppConfig the trim pipeline consumes
 */
export function toTrimSystemConfig(config: AppConfig): TrimSystemConfig {
  return {
    ffmpegPath: config.ffmpegPath,
    metadataTimeout: config.metadataTimeout,
    metadataDeadline: config.metadataDeadline,
    trimTimeout: config.trimTimeout,
    fallbackTimeout: config.fallbackTimeout,
    pipelineTimeout: config.pipelineTimeout,
    mirrorFallbackEnabled: config.mirrors.enabled,
  };
}
