/**
 * ToolInvoker - Runs an external binary (yt-dlp, ffmpeg) with a timeout,
 * streaming its output and capturing stdout/stderr for the caller
 */

import { spawn } from 'child_process';
import { logger } from '../../utils/logger';
import { errorMessage } from './errors';
import { IToolInvoker, ToolRunOptions, ToolRunResult } from './types';

// Keep only the tail of long outputs (progress lines add up)
const MAX_CAPTURE = 1024 * 1024;

function appendCapped(current: string, text: string): string {
    const next = current + text;
    return next.length > MAX_CAPTURE ? next.slice(next.length - MAX_CAPTURE) : next;
}

export class ToolInvoker implements IToolInvoker {
    run(options: ToolRunOptions): Promise<ToolRunResult> {
        const { command, args, timeout, cwd, signal, onOutput } = options;

        return new Promise((resolve) => {
            let stdout = '';
            let stderr = '';
            let timedOut = false;
            let aborted = false;
            let settled = false;

            if (signal?.aborted) {
                resolve({ exitCode: null, stdout, stderr, timedOut, aborted: true });
                return;
            }

            // Own process group, so a kill also reaches helpers such as the
            // ffmpeg that yt-dlp starts for --download-sections
            const proc = spawn(command, args, {
                cwd,
                stdio: ['ignore', 'pipe', 'pipe'],
                detached: true,
            });
            let killed = false;

            const finish = (exitCode: number | null): void => {
                if (settled) return;
                settled = true;
                clearTimeout(timer);
                signal?.removeEventListener('abort', onAbort);
                resolve({ exitCode, stdout, stderr, timedOut, aborted });
            };

            const killTree = (): void => {
                killed = true;
                if (proc.pid !== undefined) {
                    try {
                        process.kill(-proc.pid, 'SIGKILL');
                        return;
                    } catch (error) {
                        logger.debug(`Process group kill failed for ${command}`, { error: errorMessage(error) });
                    }
                }
                proc.kill('SIGKILL');
            };

            const onAbort = (): void => {
                aborted = true;
                killTree();
            };

            const timer = setTimeout(() => {
                timedOut = true;
                logger.warn(`${command} timed out`, { timeout });
                killTree();
            }, timeout);

            signal?.addEventListener('abort', onAbort, { once: true });

            proc.stdout.on('data', (data: Buffer) => {
                stdout = appendCapped(stdout, data.toString());
                onOutput?.(data);
            });

            proc.stderr.on('data', (data: Buffer) => {
                stderr = appendCapped(stderr, data.toString());
                onOutput?.(data);
            });

            proc.on('error', (err: Error) => {
                logger.error(`Failed to start ${command}`, { error: err.message });
                stderr = appendCapped(stderr, err.message);
                finish(null);
            });

            // After a kill, a surviving grandchild may still hold the pipes open
            // and delay 'close' indefinitely
            proc.on('exit', (code: number | null) => {
                if (!killed) return;
                proc.stdout.destroy();
                proc.stderr.destroy();
                finish(code);
            });

            proc.on('close', (code: number | null) => {
                finish(code);
            });
        });
    }
}
