/**
 * ProgressParser - Turns raw yt-dlp / ffmpeg output into typed progress events
 *
 * Tools redraw their progress line in place with `\r` or print one line per
 * update with `\n`, so the stream is split on both. Recognized shapes, in order:
 *   1. progress template   ` 45.2%|1.20MiB/s|00:10|10.00MiB|4.52MiB`
 *   2. ffmpeg status line  `size= 1024kB time=00:00:04.00 ... speed=2.0x`
 *   3. yt-dlp default line `[download]  45.2% of ...`
 *   4. post-processor line `[Merger] Merging formats into ...`
 */

import { StringDecoder } from 'string_decoder';
import { ParsedLine, ProgressUpdate } from './types';

export const MERGING_PHASE = 'Merging & processing...';
export const TRANSCODE_CEILING = 90;
export const MERGE_FLOOR = 95;

const NOT_AVAILABLE = new Set(['NA', 'N/A']);
const POSTPROCESS_MARKERS = ['[Merger]', '[ExtractAudio]', '[ffmpeg]', '[FixupM3u8]', '[VideoConvertor]'];

/**
 * Template passed to yt-dlp's --progress-template so each update matches shape 1
 */
export const PROGRESS_TEMPLATE =
    'download:%(progress._percent_str)s|%(progress._speed_str)s|%(progress._eta_str)s|%(progress._total_bytes_str)s|%(progress._downloaded_bytes_str)s';

function clean(field: string | undefined): string {
    const value = (field ?? '').trim();
    return NOT_AVAILABLE.has(value) ? '' : value;
}

function parsePercent(text: string): number | undefined {
    const match = text.match(/(\d+(?:\.\d+)?)\s*%/);
    if (!match) return undefined;
    const value = parseFloat(match[1]);
    return Number.isFinite(value) ? Math.min(value, 100) : undefined;
}

/**
 * Parse `HH:MM:SS(.ff)` into seconds
 */
export function parseClock(text: string): number | null {
    const match = text.match(/^(\d+):(\d{1,2}):(\d{1,2}(?:\.\d+)?)$/);
    if (!match) return null;
    return parseInt(match[1], 10) * 3600 + parseInt(match[2], 10) * 60 + parseFloat(match[3]);
}

export function formatClock(totalSeconds: number): string {
    const seconds = Math.max(0, Math.round(totalSeconds));
    const h = Math.floor(seconds / 3600);
    const m = Math.floor((seconds % 3600) / 60);
    const s = seconds % 60;
    const mm = String(m).padStart(2, '0');
    const ss = String(s).padStart(2, '0');
    return h > 0 ? `${String(h).padStart(2, '0')}:${mm}:${ss}` : `${mm}:${ss}`;
}

export class ProgressParser {
    private readonly targetDuration: number;
    private decoder = new StringDecoder('utf8');
    private buffer = '';

    /**
     * @param targetDuration - length in seconds of the range being produced
     */
    constructor(targetDuration: number) {
        this.targetDuration = targetDuration;
    }

    /**
     * Feed a chunk of raw output; returns events for every completed line
     */
    feed(chunk: Buffer | string): ParsedLine[] {
        this.buffer += typeof chunk === 'string' ? chunk : this.decoder.write(chunk);

        const pieces = this.buffer.split(/\r\n|\r|\n/);
        this.buffer = pieces.pop() ?? '';

        return this.parseAll(pieces);
    }

    /**
     * Parse whatever is left once the stream has ended
     */
    flush(): ParsedLine[] {
        const rest = this.buffer + this.decoder.end();
        this.buffer = '';
        return this.parseAll([rest]);
    }

    /**
     * Drop partial input before a new attempt starts
     */
    reset(): void {
        this.buffer = '';
        this.decoder = new StringDecoder('utf8');
    }

    parseLine(raw: string): ParsedLine | null {
        const line = raw.trim();
        if (!line) return null;

        const template = this.parseTemplateLine(line);
        if (template) return template;

        const transcode = this.parseTranscodeLine(line);
        if (transcode) return transcode;

        if (line.includes('[download]') && line.includes('%')) {
            const percent = parsePercent(line);
            if (percent !== undefined) {
                return { kind: 'progress', percent };
            }
        }

        if (POSTPROCESS_MARKERS.some((marker) => line.includes(marker))) {
            return { kind: 'progress', percent: MERGE_FLOOR, phase: MERGING_PHASE };
        }

        return { kind: 'log', line };
    }

    private parseAll(lines: string[]): ParsedLine[] {
        const events: ParsedLine[] = [];
        for (const line of lines) {
            const event = this.parseLine(line);
            if (event) events.push(event);
        }
        return events;
    }

    private parseTemplateLine(line: string): ProgressUpdate | null {
        if (!line.includes('|') || !line.includes('%')) return null;

        const parts = line.split('|');
        if (parts.length < 5) return null;

        const percent = parsePercent(parts[0]);
        if (percent === undefined) return null;

        return {
            kind: 'progress',
            percent,
            speed: clean(parts[1]),
            eta: clean(parts[2]),
            size: clean(parts[3]),
            downloaded: clean(parts[4]),
        };
    }

    private parseTranscodeLine(line: string): ProgressUpdate | null {
        if (!line.includes('time=') || !line.includes('speed=')) return null;

        const timeMatch = line.match(/time=\s*(\d+:\d{1,2}:\d{1,2}(?:\.\d+)?)/);
        if (!timeMatch) return null;

        const elapsed = parseClock(timeMatch[1]);
        if (elapsed === null) return null;

        const speedMatch = line.match(/speed=\s*(\d+(?:\.\d+)?)x/);
        const sizeMatch = line.match(/size=\s*(\S+)/);

        const update: ProgressUpdate = {
            kind: 'progress',
            percent: this.transcodePercent(elapsed),
        };

        if (speedMatch) {
            const factor = parseFloat(speedMatch[1]);
            update.speed = `${speedMatch[1]}x`;
            if (factor > 0 && this.targetDuration > 0) {
                update.eta = formatClock(Math.max(0, this.targetDuration - elapsed) / factor);
            }
        }
        if (sizeMatch && !NOT_AVAILABLE.has(sizeMatch[1])) {
            update.downloaded = sizeMatch[1];
        }

        return update;
    }

    private transcodePercent(elapsed: number): number {
        if (this.targetDuration <= 0) return 0;
        const percent = (elapsed / this.targetDuration) * TRANSCODE_CEILING;
        return Math.min(TRANSCODE_CEILING, Math.round(percent * 10) / 10);
    }
}
