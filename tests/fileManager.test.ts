import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { FileManager } from '../src/utils/FileManager';

describe('FileManager', () => {
  let root: string;
  let fileManager: FileManager;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'clip-trimmer-test-'));
    fileManager = new FileManager(path.join(root, 'work'));
    await fileManager.initialize();
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it('should create one exclusive directory per task', async () => {
    const dir = await fileManager.createTaskDir('task-1');

    expect(dir).toBe(path.join(root, 'work', 'task-1'));
    await expect(fs.stat(dir)).resolves.toBeTruthy();
    await expect(fileManager.createTaskDir('task-1')).rejects.toThrow();
  });

  it('should remove task directories and tolerate missing ones', async () => {
    const dir = await fileManager.createTaskDir('task-1');
    await fs.writeFile(path.join(dir, 'clip.mp4'), 'data');

    await fileManager.removeTaskDir(dir);
    await fileManager.removeTaskDir(dir);

    await expect(fs.stat(dir)).rejects.toThrow();
  });

  it('should stat files but not directories', async () => {
    const dir = await fileManager.createTaskDir('task-1');
    await fs.writeFile(path.join(dir, 'clip.mp4'), 'abcd');

    await expect(fileManager.statFile(path.join(dir, 'clip.mp4'))).resolves.toBe(4);
    await expect(fileManager.statFile(dir)).resolves.toBeNull();
    await expect(fileManager.statFile(path.join(dir, 'none.mp4'))).resolves.toBeNull();
  });

  describe('findArtifact', () => {
    it('should prefer the exact expected path', async () => {
      const dir = await fileManager.createTaskDir('task-1');
      await fs.writeFile(path.join(dir, 'clip.mp3.mp3'), 'xx');
      await fs.writeFile(path.join(dir, 'clip.mp3'), 'xyz');

      await expect(
        fileManager.findArtifact(dir, path.join(dir, 'clip.mp3'), 'clip'),
      ).resolves.toEqual({ filePath: path.join(dir, 'clip.mp3'), size: 3 });
    });

    it('should fall back to the first file with the expected prefix', async () => {
      const dir = await fileManager.createTaskDir('task-1');
      await fs.writeFile(path.join(dir, 'clip.f137.mp4.part'), 'partial');
      await fs.writeFile(path.join(dir, 'clip.mkv'), 'whole');
      await fs.writeFile(path.join(dir, 'other.mp4'), 'other');

      await expect(
        fileManager.findArtifact(dir, path.join(dir, 'clip.mp4'), 'clip'),
      ).resolves.toEqual({ filePath: path.join(dir, 'clip.mkv'), size: 5 });
    });

    it('should return null when nothing matches', async () => {
      const dir = await fileManager.createTaskDir('task-1');
      await fs.writeFile(path.join(dir, 'other.mp4'), 'other');

      await expect(
        fileManager.findArtifact(dir, path.join(dir, 'clip.mp4'), 'clip'),
      ).resolves.toBeNull();
    });
  });

  it('should clean up directories older than the cutoff', async () => {
    const oldDir = await fileManager.createTaskDir('old');
    const freshDir = await fileManager.createTaskDir('fresh');
    const twoHoursAgo = new Date(Date.now() - 2 * 60 * 60 * 1000);
    await fs.utimes(oldDir, twoHoursAgo, twoHoursAgo);

    await fileManager.cleanupOldFiles(30);

    await expect(fs.stat(oldDir)).rejects.toThrow();
    await expect(fs.stat(freshDir)).resolves.toBeTruthy();
  });
});
