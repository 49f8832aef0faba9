/**
 * MirrorFallbackResolver - Asks alternate proxy APIs for metadata and stream URLs
 * once the extractor has run out of client strategies. Mirrors are tried in
 * order and the first usable payload wins.
 */

import { logger } from '../../utils/logger';
import { MirrorPayload, StreamCandidate, VideoMetadata } from '../core/types';
import { BaseMirror, MirrorHealth, MirrorOptions } from './BaseMirror';
import { InvidiousMirror } from './InvidiousMirror';
import { PipedMirror } from './PipedMirror';

export interface MirrorSource {
    resolveMetadata(videoId: string, signal?: AbortSignal): Promise<VideoMetadata | null>;
    resolveStreams(videoId: string, signal?: AbortSignal): Promise<StreamCandidate[] | null>;
    getHealth(): MirrorHealth[];
}

export class MirrorFallbackResolver implements MirrorSource {
    private readonly mirrors: BaseMirror[];

    constructor(mirrors: BaseMirror[]) {
        this.mirrors = mirrors;
    }

    /**
     * Piped instances first, then Invidious
     */
    static fromInstances(
        pipedInstances: string[],
        invidiousInstances: string[],
        options: MirrorOptions = {},
    ): MirrorFallbackResolver {
        return new MirrorFallbackResolver([
            ...pipedInstances.map((url) => new PipedMirror(url, options)),
            ...invidiousInstances.map((url) => new InvidiousMirror(url, options)),
        ]);
    }

    async resolveMetadata(videoId: string, signal?: AbortSignal): Promise<VideoMetadata | null> {
        const payload = await this.firstPayload(videoId, 'metadata', signal);
        return payload ? payload.metadata : null;
    }

    async resolveStreams(videoId: string, signal?: AbortSignal): Promise<StreamCandidate[] | null> {
        const payload = await this.firstPayload(videoId, 'streams', signal);
        return payload ? payload.candidates : null;
    }

    getHealth(): MirrorHealth[] {
        return this.mirrors.map((m) => m.getHealth());
    }

    private async firstPayload(
        videoId: string,
        purpose: string,
        signal?: AbortSignal,
    ): Promise<MirrorPayload | null> {
        for (const mirror of this.mirrors) {
            if (signal?.aborted) {
                logger.warn('Mirror lookup aborted', { videoId, purpose });
                return null;
            }
            logger.debug(`[${mirror.name}] Trying mirror`, { videoId, purpose });

            const payload = await mirror.lookup(videoId, signal);
            if (payload) {
                logger.info(`[${mirror.name}] Mirror resolved ${purpose}`, {
                    videoId,
                    candidates: payload.candidates.length,
                });
                return payload;
            }
        }

        logger.warn('All mirrors failed', { videoId, purpose, mirrors: this.mirrors.length });
        return null;
    }
}
