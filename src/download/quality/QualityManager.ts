/**
 * QualityManager - Maps the quality allow-set onto extractor selectors,
 * output containers and mirror stream choices
 */

import {
    AudioStream,
    Quality,
    QUALITIES,
    StreamCandidate,
    StreamSelection,
    VideoStream,
} from '../core/types';

export interface QualityProfile {
    formatSelector: string;
    heightCeiling: number;
    audioOnly: boolean;
    extension: 'mp4' | 'mp3';
    mimeType: 'video/mp4' | 'audio/mpeg';
}

const PROFILES: Record<Quality, QualityProfile> = {
    best: {
        formatSelector: 'bestvideo[ext=mp4]+bestaudio[ext=m4a]/bestvideo+bestaudio/best',
        heightCeiling: Number.POSITIVE_INFINITY,
        audioOnly: false,
        extension: 'mp4',
        mimeType: 'video/mp4',
    },
    '1080': {
        formatSelector: 'bestvideo[height<=1080][ext=mp4]+bestaudio[ext=m4a]/bestvideo[height<=1080]+bestaudio/best[height<=1080]',
        heightCeiling: 1080,
        audioOnly: false,
        extension: 'mp4',
        mimeType: 'video/mp4',
    },
    '720': {
        formatSelector: 'bestvideo[height<=720][ext=mp4]+bestaudio[ext=m4a]/bestvideo[height<=720]+bestaudio/best[height<=720]',
        heightCeiling: 720,
        audioOnly: false,
        extension: 'mp4',
        mimeType: 'video/mp4',
    },
    '480': {
        formatSelector: 'bestvideo[height<=480][ext=mp4]+bestaudio[ext=m4a]/bestvideo[height<=480]+bestaudio/best[height<=480]',
        heightCeiling: 480,
        audioOnly: false,
        extension: 'mp4',
        mimeType: 'video/mp4',
    },
    audio: {
        formatSelector: 'bestaudio[ext=m4a]/bestaudio',
        heightCeiling: 0,
        audioOnly: true,
        extension: 'mp3',
        mimeType: 'audio/mpeg',
    },
};

// Tie-breakers only: prefer broadly playable containers at equal quality
const AUDIO_CONTAINER_BONUS = 1000;
const VIDEO_CONTAINER_BONUS = 1000;
const COMPATIBLE_AUDIO = new Set(['m4a', 'mp4']);
const COMPATIBLE_VIDEO = new Set(['mp4']);

export function isQuality(value: string): value is Quality {
    return (QUALITIES as readonly string[]).includes(value);
}

export class QualityManager {
    getProfile(quality: Quality): QualityProfile {
        return PROFILES[quality];
    }

    /**
     * Pick the best audio and (unless audio-only) video stream under the quality ceiling
     */
    selectBestStreams(candidates: StreamCandidate[], quality: Quality): StreamSelection {
        const profile = PROFILES[quality];

        return {
            audio: this.selectAudio(candidates),
            video: profile.audioOnly ? null : this.selectVideo(candidates, profile.heightCeiling),
        };
    }

    private selectAudio(candidates: StreamCandidate[]): AudioStream | null {
        let best: StreamCandidate | null = null;
        let bestScore = Number.NEGATIVE_INFINITY;

        for (const candidate of candidates) {
            if (candidate.kind !== 'audio') continue;

            const score = (candidate.bitrate ?? 0)
                + (COMPATIBLE_AUDIO.has(candidate.container) ? AUDIO_CONTAINER_BONUS : 0);
            if (score > bestScore) {
                best = candidate;
                bestScore = score;
            }
        }

        return best
            ? { url: best.url, bitrate: best.bitrate ?? 0, mimeType: best.mimeType }
            : null;
    }

    private selectVideo(candidates: StreamCandidate[], ceiling: number): VideoStream | null {
        let best: VideoStream | null = null;
        let bestScore = Number.NEGATIVE_INFINITY;

        for (const candidate of candidates) {
            if (candidate.kind !== 'video' || candidate.height === undefined) continue;
            if (candidate.height > ceiling) continue;

            const fps = candidate.fps ?? 0;
            const score = candidate.height * 100 + fps
                + (COMPATIBLE_VIDEO.has(candidate.container) ? VIDEO_CONTAINER_BONUS : 0);
            if (score > bestScore) {
                best = {
                    url: candidate.url,
                    height: candidate.height,
                    fps,
                    mimeType: candidate.mimeType,
                };
                bestScore = score;
            }
        }

        return best;
    }
}

export const qualityManager = new QualityManager();

export function selectBestStreams(candidates: StreamCandidate[], quality: Quality): StreamSelection {
    return qualityManager.selectBestStreams(candidates, quality);
}
