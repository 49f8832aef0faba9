/**
 * RetryOrchestrator - Walks the client strategy table until the extractor succeeds
 * Retriable failures (bot checks, missing formats, timeouts) move on to the next
 * strategy; anything else stops the loop.
 */

import { logger } from '../../utils/logger';
import { delay } from '../../utils/retryHelper';
import { buildStrategyArgs, CLIENT_STRATEGIES } from './ClientStrategies';
import { classifyFailure } from './ErrorClassifier';
import {
    ClientStrategy,
    ErrorClassifier,
    IToolInvoker,
    ResolveHooks,
    ResolveResult,
} from './types';

export interface RetryOrchestratorOptions {
    command: string;
    strategies?: readonly ClientStrategy[];
    classifier?: ErrorClassifier;
    backoff?: number;
    cookiesPath?: string;
    sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

export class RetryOrchestrator {
    private readonly invoker: IToolInvoker;
    private readonly command: string;
    private readonly strategies: readonly ClientStrategy[];
    private readonly classifier: ErrorClassifier;
    private readonly backoff: number;
    private readonly cookiesPath?: string;
    private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;

    constructor(invoker: IToolInvoker, options: RetryOrchestratorOptions) {
        this.invoker = invoker;
        this.command = options.command;
        this.strategies = options.strategies ?? CLIENT_STRATEGIES;
        this.classifier = options.classifier ?? classifyFailure;
        this.backoff = options.backoff ?? 2000;
        this.cookiesPath = options.cookiesPath;
        this.sleep = options.sleep ?? delay;
    }

    getStrategies(): readonly ClientStrategy[] {
        return this.strategies;
    }

    /**
     * Run the extractor once per strategy until one attempt succeeds
     */
    async resolve(
        operationArgs: string[],
        targetUrl: string,
        timeout: number,
        description: string,
        hooks: ResolveHooks = {},
    ): Promise<ResolveResult> {
        let lastError = '';
        let attempts = 0;

        for (const [index, strategy] of this.strategies.entries()) {
            if (hooks.signal?.aborted) {
                return { success: false, stdout: '', error: 'Operation aborted', exhausted: false, attempts };
            }

            if (index > 0) {
                await this.sleep(this.backoff, hooks.signal);
            }

            attempts++;
            hooks.onAttempt?.(strategy, index);
            logger.info(`${description}: trying ${strategy.name} client`, {
                attempt: attempts,
                of: this.strategies.length,
            });

            const result = await this.invoker.run({
                command: this.command,
                args: [
                    ...buildStrategyArgs(strategy, this.cookiesPath),
                    ...operationArgs,
                    targetUrl,
                ],
                timeout,
                cwd: hooks.cwd,
                signal: hooks.signal,
                onOutput: hooks.onOutput,
            });

            if (result.aborted) {
                return { success: false, stdout: '', error: 'Operation aborted', exhausted: false, attempts };
            }

            if (result.exitCode === 0 && !result.timedOut) {
                logger.info(`${description}: ${strategy.name} client succeeded`);
                return {
                    success: true,
                    stdout: result.stdout,
                    exhausted: false,
                    attempts,
                    strategy: strategy.name,
                };
            }

            if (result.timedOut) {
                lastError = `Timed out after ${timeout}ms`;
                logger.warn(`${description}: ${strategy.name} client timed out`);
                continue;
            }

            lastError = result.stderr.trim() || result.stdout.trim() || `exited with code ${result.exitCode}`;
            const verdict = this.classifier(lastError);

            if (verdict !== 'retriable') {
                logger.warn(`${description}: ${strategy.name} client failed with a non-retriable error`, {
                    error: lastError.slice(0, 300),
                });
                return {
                    success: false,
                    stdout: result.stdout,
                    error: lastError,
                    exhausted: false,
                    attempts,
                    strategy: strategy.name,
                };
            }

            logger.warn(`${description}: ${strategy.name} client failed, trying next`, {
                error: lastError.slice(0, 200),
            });
        }

        logger.warn(`${description}: all client strategies exhausted`, { attempts });
        return { success: false, stdout: '', error: lastError, exhausted: true, attempts };
    }
}
