/**
 * TrimPipeline - Main coordinator for trim requests
 * Validates input, registers a task and runs one background worker per task:
 * extractor first (through the RetryOrchestrator), mirror streams + ffmpeg
 * when every client strategy is exhausted, then artifact lookup.
 */

import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import { FileManager } from '../../utils/FileManager';
import { DEFAULT_FILENAME, InputValidator } from '../../utils/InputValidator';
import { logError, logger, logOperation } from '../../utils/logger';
import { URLValidator } from '../../utils/UrlValidator';
import { MirrorHealth } from '../mirrors/BaseMirror';
import { MirrorSource } from '../mirrors/MirrorFallbackResolver';
import { isQuality, QualityManager, QualityProfile } from '../quality/QualityManager';
import { describeFailure } from './ErrorClassifier';
import { errorMessage, isTrimError, TrimError } from './errors';
import { PROGRESS_TEMPLATE, ProgressParser } from './ProgressParser';
import { RetryOrchestrator } from './RetryOrchestrator';
import { TaskRegistry, TERMINAL_STATUSES, watchTask } from './TaskRegistry';
import {
    Artifact,
    IToolInvoker,
    ParsedLine,
    ProgressSnapshot,
    Quality,
    StreamSelection,
    Task,
    TaskStatus,
    TrimRequest,
    TrimSystemConfig,
    VideoMetadata,
} from './types';

const EXHAUSTED_MESSAGE = 'All download strategies failed. The video service may be blocking this server.';
const TIMEOUT_MESSAGE = 'Processing timeout. Try a smaller range or lower quality.';
const METADATA_TIMEOUT_MESSAGE = 'Timed out fetching video information';
const METADATA_CACHE_TTL = 30 * 60 * 1000;

const ExtractorInfoSchema = z.object({
    title: z.string().default('Video'),
    duration: z.number().nullish(),
    thumbnail: z.string().nullish(),
    uploader: z.string().nullish(),
});

export interface TrimPipelineDeps {
    registry: TaskRegistry;
    orchestrator: RetryOrchestrator;
    invoker: IToolInvoker;
    fileManager: FileManager;
    mirrors?: MirrorSource | null;
    urlValidator?: URLValidator;
    qualityManager?: QualityManager;
    config: TrimSystemConfig;
}

export interface MetadataOptions {
    // Used instead of failing when no source reports a duration
    fallbackDuration?: number;
}

interface TrimJob {
    id: string;
    url: string;
    startTime: number;
    endTime: number;
    quality: Quality;
    profile: QualityProfile;
    workDir: string;
    baseName: string;
    expectedPath: string;
}

function resetProgress(task: Task): void {
    task.progress = 0;
    task.speed = '';
    task.eta = '';
    task.size = '';
    task.downloaded = '';
}

export class TrimPipeline {
    private readonly registry: TaskRegistry;
    private readonly orchestrator: RetryOrchestrator;
    private readonly invoker: IToolInvoker;
    private readonly fileManager: FileManager;
    private readonly mirrors: MirrorSource | null;
    private readonly urlValidator: URLValidator;
    private readonly qualityManager: QualityManager;
    private readonly config: TrimSystemConfig;
    private readonly workers = new Map<string, Promise<void>>();
    private readonly metadataCache = new Map<string, { data: VideoMetadata; expires: number }>();

    constructor(deps: TrimPipelineDeps) {
        this.registry = deps.registry;
        this.orchestrator = deps.orchestrator;
        this.invoker = deps.invoker;
        this.fileManager = deps.fileManager;
        this.config = deps.config;
        this.mirrors = deps.config.mirrorFallbackEnabled ? deps.mirrors ?? null : null;
        this.urlValidator = deps.urlValidator ?? new URLValidator();
        this.qualityManager = deps.qualityManager ?? new QualityManager();
    }

    // ========================================================================
    // Metadata
    // ========================================================================

    /**
     * Resolve title, duration, thumbnail and uploader for a URL.
     * The whole lookup, mirrors included, is bounded by metadataDeadline.
     */
    async getMetadata(url: string, options: MetadataOptions = {}): Promise<VideoMetadata> {
        const validation = this.urlValidator.validate(url);
        if (!validation.valid) {
            throw new TrimError('validation', validation.message ?? 'Invalid YouTube URL');
        }

        const cached = this.metadataCache.get(url);
        if (cached) {
            if (cached.expires > Date.now()) {
                return cached.data;
            }
            this.metadataCache.delete(url);
        }

        const controller = new AbortController();
        const deadline = setTimeout(() => controller.abort(), this.config.metadataDeadline);

        try {
            const metadata = await this.lookupMetadata(url, controller.signal);
            if (metadata.duration > 0) {
                this.metadataCache.set(url, { data: metadata, expires: Date.now() + METADATA_CACHE_TTL });
                return metadata;
            }

            if (options.fallbackDuration !== undefined && options.fallbackDuration > 0) {
                logger.warn('Duration unknown, using fallback', { url, fallback: options.fallbackDuration });
                return { ...metadata, duration: Math.floor(options.fallbackDuration) };
            }
            throw new TrimError('validation', 'Could not determine video duration');
        } finally {
            clearTimeout(deadline);
        }
    }

    /**
     * Extractor first, mirrors when every strategy is exhausted or no duration
     * came back. Mirrors are walked at most once per lookup.
     */
    private async lookupMetadata(url: string, signal: AbortSignal): Promise<VideoMetadata> {
        const result = await this.orchestrator.resolve(
            ['--dump-json', '--skip-download', '--no-playlist', '--no-warnings'],
            url,
            this.config.metadataTimeout,
            'Metadata',
            { signal },
        );

        let metadata: VideoMetadata | null = null;
        let mirrorsAsked = false;

        if (result.success) {
            metadata = this.parseExtractorInfo(result.stdout);
            if (!metadata) {
                throw new TrimError('remote', 'Failed to fetch video information');
            }
        } else if (signal.aborted) {
            throw new TrimError('timeout', METADATA_TIMEOUT_MESSAGE);
        } else if (result.exhausted) {
            metadata = await this.metadataFromMirrors(url, signal);
            mirrorsAsked = true;
            if (!metadata && signal.aborted) {
                throw new TrimError('timeout', METADATA_TIMEOUT_MESSAGE);
            }
            if (!metadata) {
                throw new TrimError('remote', EXHAUSTED_MESSAGE);
            }
        } else {
            throw new TrimError('remote', describeFailure(result.error));
        }

        if (metadata.duration > 0 || mirrorsAsked || signal.aborted) {
            return metadata;
        }

        const mirrored = await this.metadataFromMirrors(url, signal);
        return mirrored && mirrored.duration > 0 ? { ...metadata, duration: mirrored.duration } : metadata;
    }

    private parseExtractorInfo(stdout: string): VideoMetadata | null {
        const firstLine = stdout.trim().split('\n')[0] ?? '';

        let raw: unknown;
        try {
            raw = JSON.parse(firstLine);
        } catch {
            logger.error('Failed to parse extractor output', { output: firstLine.slice(0, 200) });
            return null;
        }

        const parsed = ExtractorInfoSchema.safeParse(raw);
        if (!parsed.success) return null;

        return {
            title: parsed.data.title,
            duration: Math.max(0, Math.floor(parsed.data.duration ?? 0)),
            thumbnail: parsed.data.thumbnail ?? '',
            uploader: parsed.data.uploader ?? 'Unknown',
        };
    }

    private async metadataFromMirrors(url: string, signal: AbortSignal): Promise<VideoMetadata | null> {
        const videoId = this.urlValidator.extractVideoId(url);
        if (!this.mirrors || !videoId) return null;
        return this.mirrors.resolveMetadata(videoId, signal);
    }

    // ========================================================================
    // Task lifecycle
    // ========================================================================

    /**
     * Validate and accept a trim request. Returns as soon as the worker is launched.
     */
    async start(request: TrimRequest): Promise<string> {
        if (!this.urlValidator.isValid(request.url)) {
            throw new TrimError('validation', 'Invalid YouTube URL');
        }
        if (!InputValidator.isValidTimeRange(request.startTime, request.endTime)) {
            throw new TrimError('validation', 'Invalid time parameters');
        }
        if (!isQuality(request.quality)) {
            throw new TrimError('validation', 'Invalid quality');
        }

        const quality = request.quality;
        const profile = this.qualityManager.getProfile(quality);
        const baseName = InputValidator.sanitizeFilename(request.filename ?? DEFAULT_FILENAME);
        const id = uuidv4();
        const workDir = await this.fileManager.createTaskDir(id);

        const job: TrimJob = {
            id,
            url: request.url.trim(),
            startTime: request.startTime,
            endTime: request.endTime,
            quality,
            profile,
            workDir,
            baseName,
            expectedPath: path.join(workDir, `${baseName}.${profile.extension}`),
        };

        this.registry.create(id, {
            id,
            url: job.url,
            quality,
            status: TaskStatus.STARTING,
            progress: 0,
            speed: '',
            eta: '',
            size: '',
            downloaded: '',
            phase: 'Starting download...',
            error: null,
            filePath: null,
            fileName: null,
            fileSize: 0,
            mimeType: null,
            workDir,
            baseName,
            createdAt: Date.now(),
        });

        logOperation('Trim task accepted', {
            taskId: id,
            url: job.url,
            startTime: job.startTime,
            endTime: job.endTime,
            quality,
        });

        const worker = this.runTask(job)
            .catch((error: unknown) => {
                logError(error instanceof Error ? error : new Error(String(error)), { taskId: id });
            })
            .finally(() => {
                this.workers.delete(id);
            });
        this.workers.set(id, worker);

        return id;
    }

    getTask(id: string): Task | null {
        return this.registry.get(id);
    }

    watch(id: string, interval: number, signal?: AbortSignal): AsyncGenerator<ProgressSnapshot> {
        return watchTask(this.registry, id, interval, signal);
    }

    /**
     * Resolves once the worker of a task has finished (immediately if none is running)
     */
    async whenSettled(id: string): Promise<void> {
        await this.workers.get(id);
    }

    async getArtifact(id: string): Promise<Artifact> {
        const task = this.registry.get(id);
        if (!task) {
            throw new TrimError('not_found', 'Task not found');
        }
        if (task.status !== TaskStatus.DONE) {
            throw new TrimError('not_ready', 'File not ready');
        }

        const size = task.filePath ? await this.fileManager.statFile(task.filePath) : null;
        if (!task.filePath || size === null) {
            throw new TrimError('not_found', 'File not found');
        }

        return {
            filePath: task.filePath,
            fileName: task.fileName ?? path.basename(task.filePath),
            mimeType: task.mimeType ?? 'application/octet-stream',
            fileSize: size,
        };
    }

    /**
     * Drop a task and its working directory. Safe to call more than once.
     */
    async cleanup(id: string): Promise<void> {
        const task = this.registry.remove(id);
        if (!task) return;

        await this.fileManager.removeTaskDir(task.workDir);
        logger.info('Task cleaned up', { taskId: id });
    }

    activeTasks(): number {
        return this.registry.size();
    }

    mirrorHealth(): MirrorHealth[] {
        return this.mirrors ? this.mirrors.getHealth() : [];
    }

    /**
     * Stop the stale sweep and wait for running workers to finish
     */
    async shutdown(): Promise<void> {
        this.registry.stopSweep();
        await Promise.allSettled([...this.workers.values()]);
        logger.info('Trim pipeline shutdown complete');
    }

    // ========================================================================
    // Worker
    // ========================================================================

    private async runTask(job: TrimJob): Promise<void> {
        const controller = new AbortController();
        const deadline = setTimeout(() => controller.abort(), this.config.pipelineTimeout);

        try {
            this.update(job.id, (task) => {
                task.status = TaskStatus.DOWNLOADING;
                task.phase = 'Downloading...';
            });

            const primary = await this.runPrimary(job, controller.signal);

            if (!primary.success) {
                if (controller.signal.aborted) {
                    throw new TrimError('timeout', TIMEOUT_MESSAGE);
                }
                if (!primary.exhausted) {
                    throw new TrimError('remote', describeFailure(primary.error));
                }
                if (!this.mirrors) {
                    throw new TrimError('remote', EXHAUSTED_MESSAGE);
                }
                await this.runFallback(job, this.mirrors, controller.signal);
            }

            await this.finalize(job);
        } catch (error) {
            if (!isTrimError(error)) {
                logError(error instanceof Error ? error : new Error(String(error)), {
                    taskId: job.id,
                    url: job.url,
                    quality: job.quality,
                });
            }
            this.fail(job.id, errorMessage(error));
        } finally {
            clearTimeout(deadline);
        }

        // Cleaned up mid-run: the tool may have recreated the directory since
        if (!this.registry.get(job.id)) {
            await this.fileManager.removeTaskDir(job.workDir);
        }
    }

    private async runPrimary(job: TrimJob, signal: AbortSignal) {
        const parser = new ProgressParser(job.endTime - job.startTime);

        const result = await this.orchestrator.resolve(
            this.buildTrimArgs(job),
            job.url,
            this.config.trimTimeout,
            `Task ${job.id}`,
            {
                cwd: job.workDir,
                signal,
                onAttempt: (strategy, index) => {
                    parser.reset();
                    if (index > 0) {
                        this.update(job.id, (task) => {
                            resetProgress(task);
                            task.status = TaskStatus.DOWNLOADING;
                            task.phase = `Retrying with ${strategy.name} client...`;
                        });
                    }
                },
                onOutput: (chunk) => this.applyEvents(job.id, parser.feed(chunk)),
            },
        );

        this.applyEvents(job.id, parser.flush());
        return result;
    }

    private buildTrimArgs(job: TrimJob): string[] {
        const start = InputValidator.formatSeconds(job.startTime);
        const end = InputValidator.formatSeconds(job.endTime);
        // '%' starts an output template field
        const outputTemplate = path.join(job.workDir, `${job.baseName.replace(/%/g, '%%')}.%(ext)s`);

        const args = [
            '-f', job.profile.formatSelector,
            '--download-sections', `*${start}-${end}`,
            '--concurrent-fragments', '16',
            '--fragment-retries', '5',
            '--retries', '5',
            '--socket-timeout', '30',
            '--no-warnings',
            '--no-playlist',
            '--no-check-certificates',
            '--newline',
            '--progress-template', PROGRESS_TEMPLATE,
            '--ffmpeg-location', this.config.ffmpegPath,
        ];

        if (job.profile.audioOnly) {
            args.push(
                '-x',
                '--audio-format', 'mp3',
                '--audio-quality', '0',
                '--postprocessor-args', 'ffmpeg:-b:a 192k',
            );
        } else {
            args.push(
                '--merge-output-format', 'mp4',
                '--postprocessor-args', 'ffmpeg:-movflags +faststart',
            );
        }

        args.push('-o', outputTemplate);
        return args;
    }

    private async runFallback(job: TrimJob, mirrors: MirrorSource, signal: AbortSignal): Promise<void> {
        const videoId = this.urlValidator.extractVideoId(job.url);
        if (!videoId) {
            throw new TrimError('remote', EXHAUSTED_MESSAGE);
        }

        this.update(job.id, (task) => {
            resetProgress(task);
            task.status = TaskStatus.DOWNLOADING;
            task.phase = 'Fetching streams from mirrors...';
        });

        const candidates = await mirrors.resolveStreams(videoId, signal);
        if (signal.aborted) {
            throw new TrimError('timeout', TIMEOUT_MESSAGE);
        }
        if (!candidates) {
            throw new TrimError('remote', EXHAUSTED_MESSAGE);
        }

        const selection = this.qualityManager.selectBestStreams(candidates, job.quality);
        const args = this.buildFallbackArgs(job, selection);

        this.update(job.id, (task) => {
            task.phase = 'Trimming from mirror stream...';
        });
        logger.info(`Task ${job.id}: trimming from mirror streams`, {
            videoHeight: selection.video?.height,
            audioBitrate: selection.audio?.bitrate,
        });

        const parser = new ProgressParser(job.endTime - job.startTime);
        const result = await this.invoker.run({
            command: this.config.ffmpegPath,
            args,
            timeout: this.config.fallbackTimeout,
            cwd: job.workDir,
            signal,
            onOutput: (chunk) => this.applyEvents(job.id, parser.feed(chunk)),
        });
        this.applyEvents(job.id, parser.flush());

        if (result.aborted || result.timedOut) {
            throw new TrimError('timeout', TIMEOUT_MESSAGE);
        }
        if (result.exitCode !== 0) {
            logger.warn(`Task ${job.id}: ffmpeg failed`, { error: result.stderr.slice(-300) });
            throw new TrimError('remote', 'Failed to trim video from mirror stream');
        }
    }

    private buildFallbackArgs(job: TrimJob, selection: StreamSelection): string[] {
        const start = InputValidator.formatSeconds(job.startTime);
        const duration = InputValidator.formatSeconds(job.endTime - job.startTime);
        const args = ['-hide_banner', '-nostdin', '-y'];

        if (job.profile.audioOnly) {
            if (!selection.audio) {
                throw new TrimError('remote', 'No audio stream available from mirrors');
            }
            args.push(
                '-ss', start, '-i', selection.audio.url,
                '-t', duration,
                '-vn', '-c:a', 'libmp3lame', '-b:a', '192k',
                job.expectedPath,
            );
            return args;
        }

        const { video, audio } = selection;
        if (!video) {
            const ceiling = job.quality === 'best' ? 'any quality' : `${job.quality}p or below`;
            throw new TrimError('remote', `No video stream available at ${ceiling}`);
        }

        args.push('-ss', start, '-i', video.url);
        if (audio) {
            args.push('-ss', start, '-i', audio.url);
        }
        args.push('-t', duration, '-map', '0:v:0');

        if (audio) {
            // AAC already fits an MP4 container; other codecs get re-encoded
            const audioCodec = audio.mimeType.startsWith('audio/mp4') ? 'copy' : 'aac';
            args.push('-map', '1:a:0', '-c:v', 'copy', '-c:a', audioCodec);
        } else {
            logger.warn(`Task ${job.id}: no audio stream, producing video-only output`);
            args.push('-c:v', 'copy');
        }

        args.push('-movflags', '+faststart', job.expectedPath);
        return args;
    }

    private async finalize(job: TrimJob): Promise<void> {
        this.update(job.id, (task) => {
            task.status = TaskStatus.PROCESSING;
            task.phase = 'Finalizing...';
        });

        const located = await this.fileManager.findArtifact(job.workDir, job.expectedPath, job.baseName);
        if (!located || located.size === 0) {
            throw new TrimError('artifact', 'Failed to create output file');
        }

        const fileName = `${job.baseName}.${job.profile.extension}`;
        this.update(job.id, (task) => {
            task.status = TaskStatus.DONE;
            task.progress = 100;
            task.phase = 'Complete!';
            task.filePath = located.filePath;
            task.fileName = fileName;
            task.fileSize = located.size;
            task.mimeType = job.profile.mimeType;
        });

        logOperation('Trim task completed', {
            taskId: job.id,
            fileName,
            sizeMb: (located.size / (1024 * 1024)).toFixed(2),
        });
    }

    // ========================================================================
    // Task state helpers
    // ========================================================================

    /**
     * Mutate a task unless it is terminal or already removed
     */
    private update(id: string, fn: (task: Task) => void): void {
        this.registry.mutate(id, (task) => {
            if (TERMINAL_STATUSES.has(task.status)) return;
            fn(task);
        });
    }

    private applyEvents(id: string, events: ParsedLine[]): void {
        for (const event of events) {
            if (event.kind === 'log') {
                logger.debug(`Task ${id}: ${event.line}`);
                continue;
            }

            this.update(id, (task) => {
                if (event.percent !== undefined) {
                    task.progress = Math.max(task.progress, Math.min(event.percent, 100));
                }
                if (event.speed !== undefined) task.speed = event.speed;
                if (event.eta !== undefined) task.eta = event.eta;
                if (event.size !== undefined) task.size = event.size;
                if (event.downloaded !== undefined) task.downloaded = event.downloaded;
                if (event.phase !== undefined) {
                    task.phase = event.phase;
                    task.status = TaskStatus.PROCESSING;
                }
            });
        }
    }

    private fail(id: string, message: string): void {
        this.update(id, (task) => {
            task.status = TaskStatus.ERROR;
            task.error = message;
            task.phase = 'Failed';
        });
        logger.warn(`Task ${id} failed`, { error: message });
    }
}
