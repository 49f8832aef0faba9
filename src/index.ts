import 'dotenv/config';
import * as Sentry from '@sentry/node';
import { selectStrategies } from './download/core/ClientStrategies';
import { RetryOrchestrator } from './download/core/RetryOrchestrator';
import { TaskRegistry } from './download/core/TaskRegistry';
import { ToolInvoker } from './download/core/ToolInvoker';
import { TrimPipeline } from './download/core/TrimPipeline';
import { MirrorFallbackResolver } from './download/mirrors/MirrorFallbackResolver';
import { Server } from './server';
import { toTrimSystemConfig } from './types/config';
import { loadConfig } from './utils/config';
import { FileManager } from './utils/FileManager';
import { logger } from './utils/logger';

function initializeSentry(dsn: string | undefined): void {
  if (!dsn) return;
  Sentry.init({
    dsn,
    tracesSampleRate: 1.0,
  });
}

function setupEmergencyHandlers(): void {
  process.on('exit', (code) => {
    logger.info(`Process exiting with code ${code}`);
  });

  process.on('unhandledRejection', (reason) => {
    logger.error('Unhandled Rejection', { reason });
    Sentry.captureException(reason);
  });
}

async function main() {
  try {
    const config = loadConfig();
    initializeSentry(config.sentryDsn);
    logger.info('🚀 Starting clip trimmer...');

    const fileManager = new FileManager(config.tempDirectory);
    await fileManager.initialize();
    await fileManager.cleanupOldFiles(config.taskTtl / 60000);

    const registry = new TaskRegistry({
      sweepInterval: config.sweepInterval,
      staleAfter: config.taskTtl,
      disposeWorkDir: (dir) => fileManager.removeTaskDir(dir),
    });

    const invoker = new ToolInvoker();
    const orchestrator = new RetryOrchestrator(invoker, {
      command: config.ytDlpPath,
      strategies: selectStrategies(config.clientStrategies),
      backoff: config.retryBackoff,
      cookiesPath: config.youtubeCookiesPath,
    });

    const mirrors = MirrorFallbackResolver.fromInstances(
      config.mirrors.pipedInstances,
      config.mirrors.invidiousInstances,
      { timeout: config.mirrors.timeout },
    );

    const pipeline = new TrimPipeline({
      registry,
      orchestrator,
      invoker,
      fileManager,
      mirrors,
      config: toTrimSystemConfig(config),
    });

    const server = new Server(pipeline, {
      port: config.port,
      host: config.host,
      progressInterval: config.progressInterval,
    });

    await server.start();
    registry.startSweep();

    logger.info('✅ Clip trimmer ready', {
      strategies: orchestrator.getStrategies().map((s) => s.name),
      mirrorFallback: config.mirrors.enabled,
    });

    const shutdown = async (signal: string) => {
      logger.info(`${signal} received, shutting down gracefully...`);
      try {
        await server.stop();
        await pipeline.shutdown();
        await Sentry.close(2000);
        process.exit(0);
      } catch (error) {
        logger.error('Error during shutdown', { error });
        Sentry.captureException(error);
        process.exit(1);
      }
    };

    process.on('SIGTERM', () => {
      void shutdown('SIGTERM');
    });
    process.on('SIGINT', () => {
      void shutdown('SIGINT');
    });

    setupEmergencyHandlers();
  } catch (error) {
    logger.error('Failed to start clip trimmer', { error });
    Sentry.captureException(error);
    process.exit(1);
  }
}

void main();
