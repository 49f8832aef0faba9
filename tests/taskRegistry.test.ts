import {
  MonitorLock,
  TaskRegistry,
  toSnapshot,
  watchTask,
} from '../src/download/core/TaskRegistry';
import { ProgressSnapshot, Task, TaskStatus } from '../src/download/core/types';

function makeTask(overrides: Partial<Task> = {}): Task {
  return {
    id: 'task-1',
    url: 'https://www.youtube.com/watch?v=dQw4w9WgXcQ',
    quality: '720',
    status: TaskStatus.STARTING,
    progress: 0,
    speed: '',
    eta: '',
    size: '',
    downloaded: '',
    phase: 'Starting download...',
    error: null,
    filePath: null,
    fileName: null,
    fileSize: 0,
    mimeType: null,
    workDir: '/tmp/clip-trimmer/task-1',
    baseName: 'clip',
    createdAt: 1000,
    ...overrides,
  };
}

async function collect(source: AsyncGenerator<ProgressSnapshot>): Promise<ProgressSnapshot[]> {
  const items: ProgressSnapshot[] = [];
  for await (const item of source) {
    items.push(item);
  }
  return items;
}

describe('TaskRegistry', () => {
  let registry: TaskRegistry;

  beforeEach(() => {
    registry = new TaskRegistry();
  });

  afterEach(() => {
    registry.stopSweep();
  });

  it('should hand out copies that do not alias stored state', () => {
    registry.create('task-1', makeTask());

    const copy = registry.get('task-1');
    if (copy) copy.progress = 50;

    expect(registry.get('task-1')?.progress).toBe(0);
  });

  it('should reject duplicate ids', () => {
    registry.create('task-1', makeTask());
    expect(() => registry.create('task-1', makeTask())).toThrow('Task task-1 already exists');
  });

  it('should apply mutations atomically and return the new state', () => {
    registry.create('task-1', makeTask());

    const updated = registry.mutate('task-1', (task) => {
      task.status = TaskStatus.DOWNLOADING;
      task.progress = 12.5;
    });

    expect(updated).toMatchObject({ status: TaskStatus.DOWNLOADING, progress: 12.5 });
    expect(registry.get('task-1')?.progress).toBe(12.5);
  });

  it('should ignore mutations of unknown or removed tasks', () => {
    registry.create('task-1', makeTask());
    registry.remove('task-1');

    const fn = jest.fn();
    expect(registry.mutate('task-1', fn)).toBeNull();
    expect(fn).not.toHaveBeenCalled();
    expect(registry.size()).toBe(0);
  });

  it('should return null when removing twice', () => {
    registry.create('task-1', makeTask());
    expect(registry.remove('task-1')?.id).toBe('task-1');
    expect(registry.remove('task-1')).toBeNull();
  });

  describe('sweep', () => {
    it('should drop stale tasks and dispose their directories', async () => {
      const disposeWorkDir = jest.fn(async () => undefined);
      const swept = new TaskRegistry({
        staleAfter: 1000,
        disposeWorkDir,
        now: () => 5000,
      });
      swept.create('old', makeTask({ id: 'old', createdAt: 3000, workDir: '/tmp/old' }));
      swept.create('fresh', makeTask({ id: 'fresh', createdAt: 4500, workDir: '/tmp/fresh' }));

      await expect(swept.sweep()).resolves.toBe(1);

      expect(swept.get('old')).toBeNull();
      expect(swept.get('fresh')).not.toBeNull();
      expect(disposeWorkDir).toHaveBeenCalledTimes(1);
      expect(disposeWorkDir).toHaveBeenCalledWith('/tmp/old');
    });

    it('should keep sweeping when a directory cannot be disposed', async () => {
      const swept = new TaskRegistry({
        staleAfter: 0,
        disposeWorkDir: async () => {
          throw new Error('EBUSY');
        },
        now: () => 5000,
      });
      swept.create('a', makeTask({ id: 'a' }));
      swept.create('b', makeTask({ id: 'b' }));

      await expect(swept.sweep()).resolves.toBe(2);
      expect(swept.size()).toBe(0);
    });
  });

  describe('MonitorLock', () => {
    it('should reject re-entry', () => {
      const lock = new MonitorLock();
      expect(() => lock.runExclusive(() => lock.runExclusive(() => 1))).toThrow(
        'TaskRegistry lock is not re-entrant',
      );
      expect(lock.runExclusive(() => 2)).toBe(2);
    });
  });

  describe('toSnapshot', () => {
    it('should add file details only when done', () => {
      const done = toSnapshot(
        makeTask({
          status: TaskStatus.DONE,
          progress: 100,
          phase: 'Complete!',
          fileName: 'clip.mp4',
          fileSize: 2048,
        }),
      );
      expect(done).toEqual({
        status: TaskStatus.DONE,
        progress: 100,
        speed: '',
        eta: '',
        size: '',
        downloaded: '',
        phase: 'Complete!',
        fileName: 'clip.mp4',
        fileSize: 2048,
      });
    });

    it('should add the error message only when failed', () => {
      const failed = toSnapshot(makeTask({ status: TaskStatus.ERROR, error: 'Video unavailable' }));
      expect(failed.error).toBe('Video unavailable');
      expect(failed.fileName).toBeUndefined();
    });
  });

  describe('watchTask', () => {
    it('should yield a single error for unknown tasks', async () => {
      const items = await collect(watchTask(registry, 'missing', 1));
      expect(items).toHaveLength(1);
      expect(items[0]).toMatchObject({ status: TaskStatus.ERROR, error: 'Task not found' });
    });

    it('should follow the task until it reaches a terminal state', async () => {
      registry.create('task-1', makeTask({ status: TaskStatus.DOWNLOADING, progress: 10 }));
      const items: ProgressSnapshot[] = [];

      for await (const item of watchTask(registry, 'task-1', 1)) {
        items.push(item);
        if (items.length === 1) {
          registry.mutate('task-1', (task) => {
            task.progress = 60;
          });
        } else if (items.length === 2) {
          registry.mutate('task-1', (task) => {
            task.status = TaskStatus.DONE;
            task.progress = 100;
          });
        }
      }

      expect(items.map((item) => [item.status, item.progress])).toEqual([
        [TaskStatus.DOWNLOADING, 10],
        [TaskStatus.DOWNLOADING, 60],
        [TaskStatus.DONE, 100],
      ]);
    });

    it('should stop when the signal aborts', async () => {
      registry.create('task-1', makeTask({ status: TaskStatus.DOWNLOADING }));
      const controller = new AbortController();
      const items: ProgressSnapshot[] = [];

      for await (const item of watchTask(registry, 'task-1', 1, controller.signal)) {
        items.push(item);
        controller.abort();
      }

      expect(items).toHaveLength(1);
    });
  });
});
