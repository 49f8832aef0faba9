import express, { NextFunction, Request, RequestHandler, Response } from 'express';
import http from 'http';
import { TrimPipeline } from './download/core/TrimPipeline';
import { isTrimError } from './download/core/errors';
import { TrimRequestSchema, VideoInfoRequestSchema } from './utils/InputValidator';
import { logError, logger } from './utils/logger';

export interface ServerOptions {
  port: number;
  host: string;
  progressInterval: number;
}

type AsyncHandler = (req: Request, res: Response, next: NextFunction) => Promise<void>;

/**
 * Forward rejected handlers to the error middleware
 */
function asyncHandler(handler: AsyncHandler): RequestHandler {
  return (req, res, next) => {
    handler(req, res, next).catch(next);
  };
}

/**
 * Express server exposing the trim pipeline over HTTP
 */
export class Server {
  private app: express.Application;
  private pipeline: TrimPipeline;
  private options: ServerOptions;
  private httpServer: http.Server | null = null;

  constructor(pipeline: TrimPipeline, options: ServerOptions) {
    this.app = express();
    this.pipeline = pipeline;
    this.options = options;

    this.setupMiddleware();
    this.setupRoutes();
    this.setupErrorHandling();
  }

  getApp(): express.Application {
    return this.app;
  }

  /**
   * Setup Express middleware
   */
  private setupMiddleware(): void {
    this.app.use((req: Request, res: Response, next: NextFunction) => {
      res.setHeader('Access-Control-Allow-Origin', '*');
      res.setHeader('Access-Control-Allow-Methods', 'GET, POST, OPTIONS');
      res.setHeader('Access-Control-Allow-Headers', 'Content-Type');
      res.setHeader('Cache-Control', 'no-cache, no-store, must-revalidate');

      if (req.method === 'OPTIONS') {
        res.sendStatus(204);
        return;
      }
      next();
    });
    this.app.use(express.json());
  }

  /**
   * Setup Express routes
   */
  private setupRoutes(): void {
    this.app.post(
      '/api/get-video-info',
      asyncHandler(async (req, res) => {
        const parsed = VideoInfoRequestSchema.safeParse(req.body);
        if (!parsed.success) {
          res.status(400).json({ error: parsed.error.issues[0]?.message ?? 'URL is required' });
          return;
        }

        const metadata = await this.pipeline.getMetadata(parsed.data.url);
        res.json({ success: true, ...metadata });
      }),
    );

    this.app.post(
      '/api/start-trim',
      asyncHandler(async (req, res) => {
        const parsed = TrimRequestSchema.safeParse(req.body);
        if (!parsed.success) {
          const issue = parsed.error.issues[0];
          const field = issue?.path[0];
          const message =
            field === 'startTime' || field === 'endTime'
              ? 'Invalid time parameters'
              : issue?.message ?? 'Invalid request';
          res.status(400).json({ error: message });
          return;
        }

        const taskId = await this.pipeline.start(parsed.data);
        res.json({ taskId });
      }),
    );

    this.app.get(
      '/api/progress/:taskId',
      asyncHandler(async (req, res) => {
        res.setHeader('Content-Type', 'text/event-stream');
        res.setHeader('Connection', 'keep-alive');
        res.setHeader('X-Accel-Buffering', 'no');
        res.flushHeaders();

        const controller = new AbortController();
        req.on('close', () => controller.abort());

        for await (const snapshot of this.pipeline.watch(
          req.params.taskId,
          this.options.progressInterval,
          controller.signal,
        )) {
          res.write(`data: ${JSON.stringify(snapshot)}\n\n`);
        }
        res.end();
      }),
    );

    this.app.get(
      '/api/download/:taskId',
      asyncHandler(async (req, res, next) => {
        const artifact = await this.pipeline.getArtifact(req.params.taskId);

        res.setHeader('Content-Type', artifact.mimeType);
        res.download(artifact.filePath, artifact.fileName, (error) => {
          if (error && !res.headersSent) {
            next(error);
          } else if (error) {
            logger.warn('Download interrupted', {
              taskId: req.params.taskId,
              error: error.message,
            });
          }
        });
      }),
    );

    this.app.post(
      '/api/cleanup/:taskId',
      asyncHandler(async (req, res) => {
        await this.pipeline.cleanup(req.params.taskId);
        res.json({ ok: true });
      }),
    );

    // Health check endpoint
    this.app.get('/api/health', (_req: Request, res: Response) => {
      const uptime = process.uptime();
      const memoryUsage = process.memoryUsage();

      res.status(200).json({
        status: 'ok',
        uptime: Math.floor(uptime),
        memory: {
          heapUsed: `${(memoryUsage.heapUsed / 1024 / 1024).toFixed(2)}MB`,
          heapTotal: `${(memoryUsage.heapTotal / 1024 / 1024).toFixed(2)}MB`,
        },
        activeTasks: this.pipeline.activeTasks(),
        mirrors: this.pipeline.mirrorHealth(),
        timestamp: new Date().toISOString(),
      });
    });
  }

  private setupErrorHandling(): void {
    this.app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
      if (res.headersSent) {
        logger.warn('Error after response started', {
          path: req.path,
          error: error instanceof Error ? error.message : String(error),
        });
        res.end();
        return;
      }
      if (isTrimError(error)) {
        res.status(error.httpStatus).json({ error: error.message });
        return;
      }
      if (error instanceof SyntaxError) {
        res.status(400).json({ error: 'Invalid JSON body' });
        return;
      }

      logError(error instanceof Error ? error : new Error(String(error)), {
        method: req.method,
        path: req.path,
      });
      res.status(500).json({ error: 'Internal server error' });
    });
  }

  /**
   * Start listening
   */
  async start(): Promise<void> {
    return new Promise((resolve) => {
      this.httpServer = this.app.listen(this.options.port, this.options.host, () => {
        logger.info(`🚀 Server running on ${this.options.host}:${this.options.port}`);
        resolve();
      });
    });
  }

  /**
   * Stop accepting connections
   */
  async stop(): Promise<void> {
    logger.info('🛑 Server shutting down...');
    const server = this.httpServer;
    if (!server) return;

    this.httpServer = null;
    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });
  }
}
