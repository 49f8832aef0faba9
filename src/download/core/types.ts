/**
 * Core Types for the Trim System
 * Shared interfaces for the extractor, mirrors, progress parsing and task tracking
 */

// ============================================================================
// Enums
// ============================================================================

export enum TaskStatus {
    STARTING = 'starting',
    DOWNLOADING = 'downloading',
    PROCESSING = 'processing',
    DONE = 'done',
    ERROR = 'error',
}

export const QUALITIES = ['best', '1080', '720', '480', 'audio'] as const;

export type Quality = (typeof QUALITIES)[number];

// ============================================================================
// Video & Stream Types
// ============================================================================

export interface VideoMetadata {
    title: string;
    duration: number;
    thumbnail: string;
    uploader: string;
}

export interface StreamCandidate {
    url: string;
    kind: 'video' | 'audio';
    mimeType: string;
    container: string;
    height?: number;
    fps?: number;
    bitrate?: number;
}

export interface VideoStream {
    url: string;
    height: number;
    fps: number;
    mimeType: string;
}

export interface AudioStream {
    url: string;
    bitrate: number;
    mimeType: string;
}

export interface StreamSelection {
    video: VideoStream | null;
    audio: AudioStream | null;
}

export interface MirrorPayload {
    metadata: VideoMetadata;
    candidates: StreamCandidate[];
}

// ============================================================================
// Extractor Types
// ============================================================================

export interface ClientStrategy {
    readonly name: string;
    readonly extractorArgs?: string;
    readonly userAgent?: string;
    readonly useCookies?: boolean;
    readonly extraArgs: readonly string[];
}

export type FailureClass = 'retriable' | 'terminal' | 'unknown';

export type ErrorClassifier = (text: string) => FailureClass;

export interface ToolRunOptions {
    command: string;
    args: string[];
    timeout: number;
    cwd?: string;
    signal?: AbortSignal;
    onOutput?: (chunk: Buffer) => void;
}

export interface ToolRunResult {
    exitCode: number | null;
    stdout: string;
    stderr: string;
    timedOut: boolean;
    aborted: boolean;
}

export interface IToolInvoker {
    run(options: ToolRunOptions): Promise<ToolRunResult>;
}

export interface ResolveHooks {
    onAttempt?: (strategy: ClientStrategy, index: number) => void;
    onOutput?: (chunk: Buffer) => void;
    signal?: AbortSignal;
    cwd?: string;
}

export interface ResolveResult {
    success: boolean;
    stdout: string;
    error?: string;
    exhausted: boolean;
    attempts: number;
    strategy?: string;
}

// ============================================================================
// Progress Types
// ============================================================================

export interface ProgressUpdate {
    kind: 'progress';
    percent?: number;
    speed?: string;
    eta?: string;
    size?: string;
    downloaded?: string;
    phase?: string;
}

export interface LogLine {
    kind: 'log';
    line: string;
}

export type ParsedLine = ProgressUpdate | LogLine;

// ============================================================================
// Task Types
// ============================================================================

export interface Task {
    id: string;
    url: string;
    quality: Quality;
    status: TaskStatus;
    progress: number;
    speed: string;
    eta: string;
    size: string;
    downloaded: string;
    phase: string;
    error: string | null;
    filePath: string | null;
    fileName: string | null;
    fileSize: number;
    mimeType: string | null;
    workDir: string;
    baseName: string;
    createdAt: number;
}

export interface ProgressSnapshot {
    status: TaskStatus;
    progress: number;
    speed: string;
    eta: string;
    size: string;
    downloaded: string;
    phase: string;
    error?: string;
    fileName?: string;
    fileSize?: number;
}

export interface TrimRequest {
    url: string;
    startTime: number;
    endTime: number;
    quality: string;
    filename?: string;
}

export interface Artifact {
    filePath: string;
    fileName: string;
    mimeType: string;
    fileSize: number;
}

// ============================================================================
// Configuration Types
// ============================================================================

export interface TrimSystemConfig {
    ffmpegPath: string;
    metadataTimeout: number;
    metadataDeadline: number;
    trimTimeout: number;
    fallbackTimeout: number;
    pipelineTimeout: number;
    mirrorFallbackEnabled: boolean;
}
