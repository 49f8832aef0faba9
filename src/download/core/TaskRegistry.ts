/**
 * TaskRegistry - In-memory task store guarded by an exclusive lock
 * Readers get copies, writers go through mutate(); a periodic sweep drops
 * stale tasks together with their working directories.
 */

import { logger } from '../../utils/logger';
import { delay } from '../../utils/retryHelper';
import { errorMessage } from './errors';
import { ProgressSnapshot, Task, TaskStatus } from './types';

/**
 * Exclusive section around every access to the task map.
 * Swap in a distributed lock when the map moves to a shared store.
 */
export interface ExclusiveLock {
    runExclusive<T>(fn: () => T): T;
}

/**
 * Monitor for a single event loop: a critical section cannot be
 * interleaved, but re-entry from inside one is still rejected.
 */
export class MonitorLock implements ExclusiveLock {
    private held = false;

    runExclusive<T>(fn: () => T): T {
        if (this.held) {
            throw new Error('TaskRegistry lock is not re-entrant');
        }
        this.held = true;
        try {
            return fn();
        } finally {
            this.held = false;
        }
    }
}

export interface TaskStore {
    create(id: string, initial: Task): void;
    get(id: string): Task | null;
    mutate(id: string, fn: (task: Task) => void): Task | null;
    remove(id: string): Task | null;
    size(): number;
}

export interface TaskRegistryOptions {
    lock?: ExclusiveLock;
    sweepInterval?: number;
    staleAfter?: number;
    disposeWorkDir?: (workDir: string) => Promise<void>;
    now?: () => number;
}

export const TERMINAL_STATUSES: ReadonlySet<TaskStatus> = new Set([TaskStatus.DONE, TaskStatus.ERROR]);

export class TaskRegistry implements TaskStore {
    private readonly tasks = new Map<string, Task>();
    private readonly lock: ExclusiveLock;
    private readonly sweepInterval: number;
    private readonly staleAfter: number;
    private readonly disposeWorkDir?: (workDir: string) => Promise<void>;
    private readonly now: () => number;
    private sweepTimer: NodeJS.Timeout | null = null;

    constructor(options: TaskRegistryOptions = {}) {
        this.lock = options.lock ?? new MonitorLock();
        this.sweepInterval = options.sweepInterval ?? 5 * 60 * 1000;
        this.staleAfter = options.staleAfter ?? 30 * 60 * 1000;
        this.disposeWorkDir = options.disposeWorkDir;
        this.now = options.now ?? Date.now;
    }

    create(id: string, initial: Task): void {
        this.lock.runExclusive(() => {
            if (this.tasks.has(id)) {
                throw new Error(`Task ${id} already exists`);
            }
            this.tasks.set(id, { ...initial });
        });
    }

    get(id: string): Task | null {
        return this.lock.runExclusive(() => {
            const task = this.tasks.get(id);
            return task ? { ...task } : null;
        });
    }

    /**
     * Atomic read-modify-write. Unknown ids are ignored and yield null.
     */
    mutate(id: string, fn: (task: Task) => void): Task | null {
        return this.lock.runExclusive(() => {
            const task = this.tasks.get(id);
            if (!task) return null;
            fn(task);
            return { ...task };
        });
    }

    remove(id: string): Task | null {
        return this.lock.runExclusive(() => {
            const task = this.tasks.get(id);
            if (!task) return null;
            this.tasks.delete(id);
            return task;
        });
    }

    size(): number {
        return this.lock.runExclusive(() => this.tasks.size);
    }

    /**
     * Remove every task created before the staleness window
     */
    async sweep(): Promise<number> {
        const cutoff = this.now() - this.staleAfter;

        const stale = this.lock.runExclusive(() => {
            const removed: Task[] = [];
            for (const [id, task] of this.tasks) {
                if (task.createdAt < cutoff) {
                    this.tasks.delete(id);
                    removed.push(task);
                }
            }
            return removed;
        });

        if (this.disposeWorkDir) {
            const dispose = this.disposeWorkDir;
            await Promise.allSettled(stale.map((task) => dispose(task.workDir)));
        }

        if (stale.length > 0) {
            logger.info('Stale tasks swept', { count: stale.length });
        }
        return stale.length;
    }

    startSweep(): void {
        if (this.sweepTimer) return;

        this.sweepTimer = setInterval(() => {
            this.sweep().catch((error: unknown) => {
                logger.error('Task sweep failed', { error: errorMessage(error) });
            });
        }, this.sweepInterval);
        this.sweepTimer.unref();

        logger.info('Task sweep started', {
            intervalMs: this.sweepInterval,
            staleAfterMs: this.staleAfter,
        });
    }

    stopSweep(): void {
        if (this.sweepTimer) {
            clearInterval(this.sweepTimer);
            this.sweepTimer = null;
        }
    }
}

export function toSnapshot(task: Task): ProgressSnapshot {
    const snapshot: ProgressSnapshot = {
        status: task.status,
        progress: task.progress,
        speed: task.speed,
        eta: task.eta,
        size: task.size,
        downloaded: task.downloaded,
        phase: task.phase,
    };

    if (task.status === TaskStatus.DONE) {
        snapshot.fileName = task.fileName ?? '';
        snapshot.fileSize = task.fileSize;
    } else if (task.status === TaskStatus.ERROR) {
        snapshot.error = task.error ?? 'Unknown error';
    }

    return snapshot;
}

/**
 * Lazy sequence of task snapshots, re-read every interval until the task
 * reaches a terminal state. A late observer only sees current state onwards.
 */
export async function* watchTask(
    store: TaskStore,
    id: string,
    interval: number = 500,
    signal?: AbortSignal,
): AsyncGenerator<ProgressSnapshot> {
    while (!signal?.aborted) {
        const task = store.get(id);

        if (!task) {
            yield {
                status: TaskStatus.ERROR,
                progress: 0,
                speed: '',
                eta: '',
                size: '',
                downloaded: '',
                phase: '',
                error: 'Task not found',
            };
            return;
        }

        yield toSnapshot(task);

        if (TERMINAL_STATUSES.has(task.status)) return;

        await delay(interval, signal);
    }
}
