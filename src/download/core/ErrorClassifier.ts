/**
 * ErrorClassifier - Turns captured extractor output into a retry decision
 */

import { ErrorClassifier, FailureClass } from './types';

export interface ClassifierKeywords {
    terminal: readonly string[];
    retriable: readonly string[];
}

// Request-inherent failures; several of them also mention "sign in"
// or "not available", so they are checked before the retriable set.
export const TERMINAL_KEYWORDS: readonly string[] = [
    'private video',
    'video is private',
    'copyright',
    'available in your country',
    'blocked it in your country',
    'live event will begin',
    'premieres in',
    'this live event has ended',
    'account associated with this video has been terminated',
    'video has been removed',
];

export const BOT_KEYWORDS: readonly string[] = [
    'sign in',
    'bot',
    'confirm',
    'cookies',
    'authentication',
];

export const FORMAT_KEYWORDS: readonly string[] = [
    'requested format',
    'not available',
    'format is not',
    'no video formats',
    'unavailable',
];

export const DEFAULT_KEYWORDS: ClassifierKeywords = {
    terminal: TERMINAL_KEYWORDS,
    retriable: [...BOT_KEYWORDS, ...FORMAT_KEYWORDS],
};

/**
 * Build a case-insensitive substring classifier from keyword lists
 */
export function createKeywordClassifier(
    keywords: ClassifierKeywords = DEFAULT_KEYWORDS,
): ErrorClassifier {
    const terminal = keywords.terminal.map((k) => k.toLowerCase());
    const retriable = keywords.retriable.map((k) => k.toLowerCase());

    return (text: string): FailureClass => {
        const haystack = text.toLowerCase();

        if (terminal.some((k) => haystack.includes(k))) return 'terminal';
        if (retriable.some((k) => haystack.includes(k))) return 'retriable';
        return 'unknown';
    };
}

export const classifyFailure = createKeywordClassifier();

const FAILURE_MESSAGES: Array<[RegExp, string]> = [
    [/private video|video is private/i, 'This video is private'],
    [/copyright/i, 'This video is blocked on copyright grounds'],
    [/in your country/i, 'Video not available in your region'],
    [/live event will begin|premieres in/i, 'This live stream has not started yet'],
    [/has been terminated|has been removed/i, 'This video has been removed'],
    [/sign in|bot|confirm|cookies|authentication/i, 'The video service is blocking this server. Try again later'],
    [/requested format|format is not|no video formats/i, 'The requested quality is not available for this video'],
    [/not available|unavailable/i, 'Video unavailable'],
];

/**
 * Human-readable message for captured failure output
 */
export function describeFailure(text: string | undefined): string {
    if (text) {
        for (const [pattern, message] of FAILURE_MESSAGES) {
            if (pattern.test(text)) return message;
        }
    }
    return 'Failed to trim video. Check video availability.';
}
