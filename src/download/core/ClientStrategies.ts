/**
 * ClientStrategies - Spoofed client identities tried in order by the RetryOrchestrator
 * Most-likely-to-succeed first; the table always ends with the no-override default
 */

import { ClientStrategy } from './types';

export const DEFAULT_STRATEGY_NAME = 'default';

export const CLIENT_STRATEGIES: readonly ClientStrategy[] = Object.freeze([
    {
        name: 'android',
        extractorArgs: 'youtube:player_client=android',
        userAgent: 'Mozilla/5.0 (Linux; Android 13; SM-S901B) AppleWebKit/537.36',
        extraArgs: [],
    },
    {
        name: 'ios',
        extractorArgs: 'youtube:player_client=ios',
        userAgent: 'Mozilla/5.0 (iPhone; CPU iPhone OS 16_0 like Mac OS X)',
        extraArgs: [],
    },
    {
        name: 'tv_embedded',
        extractorArgs: 'youtube:player_client=tv_embedded',
        extraArgs: [],
    },
    {
        name: 'mweb',
        extractorArgs: 'youtube:player_client=mweb',
        userAgent: 'Mozilla/5.0 (Linux; Android 10; K) AppleWebKit/537.36 Mobile Safari/537.36',
        extraArgs: [],
    },
    {
        name: 'web',
        extractorArgs: 'youtube:player_client=web',
        userAgent: 'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36',
        useCookies: true,
        extraArgs: [
            '--add-header', 'Accept-Language:en-US,en;q=0.9',
            '--add-header', 'Origin:https://www.youtube.com',
        ],
    },
    {
        name: DEFAULT_STRATEGY_NAME,
        extraArgs: [],
    },
]);

/**
 * Narrow the table to the named strategies, keeping table order.
 * The default strategy is always kept as the last resort.
 */
export function selectStrategies(names?: string[]): ClientStrategy[] {
    if (!names || names.length === 0) {
        return [...CLIENT_STRATEGIES];
    }

    const wanted = new Set(names.map((n) => n.trim().toLowerCase()));
    wanted.add(DEFAULT_STRATEGY_NAME);

    return CLIENT_STRATEGIES.filter((s) => wanted.has(s.name));
}

/**
 * Identity arguments for one strategy
 */
export function buildStrategyArgs(
    strategy: ClientStrategy,
    cookiesPath?: string,
): string[] {
    const args: string[] = [];

    if (strategy.extractorArgs) {
        args.push('--extractor-args', strategy.extractorArgs);
    }
    if (strategy.userAgent) {
        args.push('--user-agent', strategy.userAgent);
    }
    if (strategy.useCookies && cookiesPath) {
        args.push('--cookies', cookiesPath);
    }
    args.push(...strategy.extraArgs);

    return args;
}
