import { z } from 'zod';
import { BaseMirror, containerFromMime, heightFromLabel } from './BaseMirror';
import { MirrorPayload, StreamCandidate } from '../core/types';

const NumberLike = z.union([z.number(), z.string()]).transform((value) => {
    const n = typeof value === 'number' ? value : parseInt(value, 10);
    return Number.isFinite(n) ? n : undefined;
});

const InvidiousFormatSchema = z.object({
    url: z.string().min(1),
    type: z.string().default(''),
    container: z.string().optional(),
    resolution: z.string().optional(),
    qualityLabel: z.string().optional(),
    fps: z.number().optional(),
    bitrate: NumberLike.optional(),
});

const InvidiousVideoSchema = z.object({
    title: z.string().min(1),
    lengthSeconds: z.number().default(0),
    author: z.string().default('Unknown'),
    videoThumbnails: z.array(z.object({ url: z.string(), quality: z.string().optional() })).default([]),
    adaptiveFormats: z.array(InvidiousFormatSchema).default([]),
    formatStreams: z.array(InvidiousFormatSchema).default([]),
});

type InvidiousFormat = z.infer<typeof InvidiousFormatSchema>;

/**
 * Invidious API instance (`/api/v1/videos/:videoId`)
 */
export class InvidiousMirror extends BaseMirror {
    readonly kind = 'invidious';

    protected buildPath(videoId: string): string {
        return `/api/v1/videos/${encodeURIComponent(videoId)}`;
    }

    protected parse(payload: unknown): MirrorPayload | null {
        const result = InvidiousVideoSchema.safeParse(payload);
        if (!result.success) return null;

        const data = result.data;
        const thumbnail = data.videoThumbnails.find((t) => t.quality === 'maxres')?.url
            ?? data.videoThumbnails[0]?.url
            ?? '';

        return {
            metadata: {
                title: data.title,
                duration: Math.max(0, Math.floor(data.lengthSeconds)),
                thumbnail,
                uploader: data.author,
            },
            candidates: [...data.adaptiveFormats, ...data.formatStreams].map((f) => this.toCandidate(f)),
        };
    }

    private toCandidate(format: InvidiousFormat): StreamCandidate {
        const mimeType = format.type.split(';')[0].trim();
        const kind: StreamCandidate['kind'] = mimeType.startsWith('audio/') ? 'audio' : 'video';

        return {
            url: format.url,
            kind,
            mimeType,
            container: containerFromMime(mimeType) || (format.container ?? ''),
            height: kind === 'video' ? heightFromLabel(format.resolution ?? format.qualityLabel) : undefined,
            fps: format.fps,
            bitrate: format.bitrate,
        };
    }
}
