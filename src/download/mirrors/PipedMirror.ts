import { z } from 'zod';
import { BaseMirror, containerFromMime, heightFromLabel } from './BaseMirror';
import { MirrorPayload, StreamCandidate } from '../core/types';

const PipedStreamSchema = z.object({
    url: z.string().min(1),
    mimeType: z.string().default(''),
    quality: z.string().optional(),
    bitrate: z.number().optional(),
    fps: z.number().optional(),
    height: z.number().optional(),
    videoOnly: z.boolean().optional(),
});

const PipedResponseSchema = z.object({
    title: z.string().min(1),
    duration: z.number().default(0),
    thumbnailUrl: z.string().default(''),
    uploader: z.string().default('Unknown'),
    audioStreams: z.array(PipedStreamSchema).default([]),
    videoStreams: z.array(PipedStreamSchema).default([]),
});

type PipedStream = z.infer<typeof PipedStreamSchema>;

/**
 * Piped API instance (`/streams/:videoId`)
 */
export class PipedMirror extends BaseMirror {
    readonly kind = 'piped';

    protected buildPath(videoId: string): string {
        return `/streams/${encodeURIComponent(videoId)}`;
    }

    protected parse(payload: unknown): MirrorPayload | null {
        const result = PipedResponseSchema.safeParse(payload);
        if (!result.success) return null;

        const data = result.data;
        return {
            metadata: {
                title: data.title,
                duration: Math.max(0, Math.floor(data.duration)),
                thumbnail: data.thumbnailUrl,
                uploader: data.uploader,
            },
            candidates: [
                ...data.audioStreams.map((s) => this.toCandidate(s, 'audio')),
                ...data.videoStreams.map((s) => this.toCandidate(s, 'video')),
            ],
        };
    }

    private toCandidate(stream: PipedStream, kind: StreamCandidate['kind']): StreamCandidate {
        return {
            url: stream.url,
            kind,
            mimeType: stream.mimeType,
            container: containerFromMime(stream.mimeType),
            height: kind === 'video' ? stream.height ?? heightFromLabel(stream.quality) : undefined,
            fps: stream.fps,
            bitrate: stream.bitrate,
        };
    }
}
