/**
 * BaseMirror - Abstract base class for proxy API mirrors
 * Handles the bounded request, error payloads and a per-instance circuit breaker
 */

import { logger } from '../../utils/logger';
import { errorMessage } from '../core/errors';
import { MirrorPayload } from '../core/types';
import { HttpClient, nodeFetchClient } from './httpClient';

// Circuit breaker configuration
const CIRCUIT_BREAKER_THRESHOLD = 3;    // consecutive failures before skipping the instance
const CIRCUIT_BREAKER_TIMEOUT = 120000; // 2 minute cooldown

export interface MirrorOptions {
    timeout?: number;
    http?: HttpClient;
    now?: () => number;
}

export interface MirrorHealth {
    name: string;
    baseUrl: string;
    failureCount: number;
    isCircuitOpen: boolean;
    lastSuccess?: Date;
    lastFailure?: Date;
}

export abstract class BaseMirror {
    abstract readonly kind: string;

    readonly baseUrl: string;
    protected readonly timeout: number;
    protected readonly http: HttpClient;
    private readonly now: () => number;

    protected failureCount = 0;
    protected lastSuccess?: Date;
    protected lastFailure?: Date;
    protected circuitOpenedAt?: number;

    constructor(baseUrl: string, options: MirrorOptions = {}) {
        this.baseUrl = baseUrl.replace(/\/+$/, '');
        this.timeout = options.timeout ?? 20000;
        this.http = options.http ?? nodeFetchClient;
        this.now = options.now ?? Date.now;
    }

    get name(): string {
        return `${this.kind}:${this.baseUrl}`;
    }

    /**
     * API path for one video
     */
    protected abstract buildPath(videoId: string): string;

    /**
     * Normalize a raw payload, or null when it is not usable
     */
    protected abstract parse(payload: unknown): MirrorPayload | null;

    /**
     * Query the mirror once. Never throws; every failure yields null.
     * An abort from the caller's signal does not count against the mirror.
     */
    async lookup(videoId: string, signal?: AbortSignal): Promise<MirrorPayload | null> {
        if (signal?.aborted) return null;
        if (this.isCircuitOpen()) {
            logger.debug(`[${this.name}] Circuit open, skipping`);
            return null;
        }

        const controller = new AbortController();
        const timer = setTimeout(() => controller.abort(), this.timeout);
        const onAbort = (): void => controller.abort();
        signal?.addEventListener('abort', onAbort, { once: true });

        try {
            const res = await this.http(`${this.baseUrl}${this.buildPath(videoId)}`, {
                signal: controller.signal,
                headers: { 'User-Agent': 'Mozilla/5.0 (compatible; ClipTrimmer/1.0)' },
            });

            if (!res.ok) {
                this.recordFailure(`HTTP ${res.status}`);
                return null;
            }

            const payload = await res.json();

            if (typeof payload === 'object' && payload !== null && 'error' in payload) {
                this.recordFailure(`Mirror error: ${String(payload.error)}`);
                return null;
            }

            const parsed = this.parse(payload);
            if (!parsed) {
                this.recordFailure('Malformed payload');
                return null;
            }

            this.recordSuccess();
            return parsed;
        } catch (error) {
            if (signal?.aborted) {
                logger.debug(`[${this.name}] Lookup aborted by caller`);
                return null;
            }
            this.recordFailure(controller.signal.aborted ? `Timed out after ${this.timeout}ms` : errorMessage(error));
            return null;
        } finally {
            clearTimeout(timer);
            signal?.removeEventListener('abort', onAbort);
        }
    }

    getHealth(): MirrorHealth {
        return {
            name: this.kind,
            baseUrl: this.baseUrl,
            failureCount: this.failureCount,
            isCircuitOpen: this.isCircuitOpen(),
            lastSuccess: this.lastSuccess,
            lastFailure: this.lastFailure,
        };
    }

    protected isCircuitOpen(): boolean {
        if (this.circuitOpenedAt === undefined) return false;

        if (this.now() - this.circuitOpenedAt > CIRCUIT_BREAKER_TIMEOUT) {
            // Half-open: let the next request through
            this.circuitOpenedAt = undefined;
            return false;
        }

        return true;
    }

    private recordSuccess(): void {
        this.failureCount = 0;
        this.lastSuccess = new Date(this.now());
    }

    private recordFailure(reason: string): void {
        this.failureCount++;
        this.lastFailure = new Date(this.now());
        logger.warn(`[${this.name}] Lookup failed`, { reason });

        if (this.failureCount >= CIRCUIT_BREAKER_THRESHOLD) {
            this.circuitOpenedAt = this.now();
            logger.warn(`[${this.name}] Circuit breaker opened`, {
                failureCount: this.failureCount,
            });
        }
    }
}

/**
 * Container name from a mime type such as `audio/mp4; codecs="mp4a.40.2"`
 */
export function containerFromMime(mimeType: string): string {
    const [type, subtype = ''] = mimeType.split(';')[0].trim().toLowerCase().split('/');
    if (type === 'audio' && subtype === 'mp4') return 'm4a';
    return subtype;
}

/**
 * Height from labels like `720p`, `1080p60` or `1920x1080`
 */
export function heightFromLabel(label: string | undefined): number | undefined {
    if (!label) return undefined;

    const dims = label.match(/\d+x(\d+)/);
    if (dims) return parseInt(dims[1], 10);

    const match = label.match(/(\d+)p/);
    return match ? parseInt(match[1], 10) : undefined;
}
