import fs from 'fs/promises';
import path from 'path';
import { logger } from './logger';

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export interface LocatedFile {
  filePath: string;
  size: number;
}

/**
 * FileManager - Manages per-task working directories under the temp root
 * Each task owns exactly one directory until cleanup or the stale sweep
 */
export class FileManager {
  private readonly tempDir: string;

  constructor(tempDirectory: string) {
    this.tempDir = tempDirectory;
  }

  /**
   * Initialize temp directory (create if doesn't exist)
   */
  async initialize(): Promise<void> {
    try {
      await fs.mkdir(this.tempDir, { recursive: true });
      logger.info('📁 Temp directory initialized', { path: this.tempDir });
    } catch (error) {
      logger.error('Failed to create temp directory', { error });
      throw error;
    }
  }

  /**
   * Create the working directory of a task. Fails if it already exists.
   */
  async createTaskDir(taskId: string): Promise<string> {
    const taskDir = path.join(this.tempDir, taskId);
    try {
      await fs.mkdir(this.tempDir, { recursive: true });
      await fs.mkdir(taskDir);
      return taskDir;
    } catch (error) {
      logger.error('Failed to create task directory', { taskId, error });
      throw error;
    }
  }

  /**
   * Remove a task directory and everything in it
   */
  async removeTaskDir(taskDir: string): Promise<void> {
    try {
      await fs.rm(taskDir, { recursive: true, force: true });
      logger.info('🗑️ Task directory removed', { path: taskDir });
    } catch (error: unknown) {
      logger.error('Failed to remove task directory', {
        path: taskDir,
        error: describe(error),
      });
    }
  }

  /**
   * Size of a file, or null when it does not exist
   */
  async statFile(filePath: string): Promise<number | null> {
    try {
      const stats = await fs.stat(filePath);
      return stats.isFile() ? stats.size : null;
    } catch {
      return null;
    }
  }

  /**
   * Find the file a tool produced: the exact expected path first, then the
   * first file in the directory starting with the expected name (the tool
   * may have changed the extension).
   */
  async findArtifact(
    taskDir: string,
    expectedPath: string,
    prefix: string,
  ): Promise<LocatedFile | null> {
    const exactSize = await this.statFile(expectedPath);
    if (exactSize !== null) {
      return { filePath: expectedPath, size: exactSize };
    }

    let entries: string[];
    try {
      entries = (await fs.readdir(taskDir)).sort();
    } catch (error) {
      logger.warn('Failed to scan task directory', {
        path: taskDir,
        error: describe(error),
      });
      return null;
    }

    for (const entry of entries) {
      if (!entry.startsWith(prefix) || entry.endsWith('.part')) continue;

      const filePath = path.join(taskDir, entry);
      const size = await this.statFile(filePath);
      if (size !== null) {
        return { filePath, size };
      }
    }

    return null;
  }

  /**
   * Clean up old task directories left behind by a previous run
   */
  async cleanupOldFiles(maxAgeMinutes: number = 30): Promise<void> {
    try {
      const files = await fs.readdir(this.tempDir);
      const now = Date.now();

      const cleanupPromises = files.map(async (file) => {
        const filePath = path.join(this.tempDir, file);
        try {
          const stats = await fs.stat(filePath);
          const ageMinutes = (now - stats.mtimeMs) / 1000 / 60;

          if (ageMinutes > maxAgeMinutes && stats.isDirectory()) {
            await fs.rm(filePath, { recursive: true, force: true });
            logger.info('🗑️ Old task directory cleaned', {
              path: filePath,
              ageMinutes: ageMinutes.toFixed(1),
            });
          }
        } catch (err: unknown) {
          logger.warn('Failed to process file for cleanup', {
            filePath,
            error: describe(err),
          });
        }
      });

      await Promise.allSettled(cleanupPromises);
    } catch (error: unknown) {
      logger.error('Failed to cleanup old files', { error });
    }
  }
}
