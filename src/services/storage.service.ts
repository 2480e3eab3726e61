/**
 * Storage service for recorded audio frames
 */
import fs from 'fs-extra';
import path from 'path';
import { AudioFrame, RecordingStats } from '../types/index.js';
import { errorMessage } from '../utils/errors.js';
import { contextLogger } from '../utils/logger.js';

const log = contextLogger('StorageService');

/**
 * Storage service for disk operations
 */
export class StorageService {
  private basePath: string;
  private recordingsPath: string;
  private logsPath: string;
  private cleanupTimer: NodeJS.Timeout | null = null;

  constructor(config: { basePath: string; recordingsPath: string; logsPath: string }) {
    this.basePath = config.basePath;
    this.recordingsPath = config.recordingsPath;
    this.logsPath = config.logsPath;
  }

  /**
   * Initialize storage directories
   */
  async initialize(): Promise<void> {
    log('info', 'Initializing storage directories');

    for (const dir of [this.basePath, this.recordingsPath, this.logsPath]) {
      await fs.ensureDir(dir);
      log('debug', `Created directory: ${dir}`);
    }

    log('info', 'Storage directories initialized');
  }

  getDeviceDirectory(deviceId: string): string {
    return path.join(this.recordingsPath, sanitizeSegment(deviceId));
  }

  /**
   * Path of one recorded frame; names sort in capture order
   */
  getFramePath(deviceId: string, capturedAt: number, sequence: number): string {
    const name = `${capturedAt}-${String(sequence).padStart(8, '0')}.pcm`;
    return path.join(this.getDeviceDirectory(deviceId), name);
  }

  /**
   * Persist a recorded frame's raw payload
   */
  async saveFrame(frame: AudioFrame): Promise<string> {
    const filePath = this.getFramePath(frame.deviceId, frame.capturedAt, frame.sequence);
    await fs.ensureDir(path.dirname(filePath));
    await fs.writeFile(filePath, frame.payload);
    log('debug', `Saved frame ${frame.sequence} for ${frame.deviceId} (${frame.payload.length} bytes)`);
    return filePath;
  }

  /**
   * Recorded frame files for a device, oldest first
   */
  async listRecordings(deviceId: string): Promise<string[]> {
    const dir = this.getDeviceDirectory(deviceId);
    if (!(await fs.pathExists(dir))) {
      return [];
    }
    const names = await fs.readdir(dir);
    return names.filter((name) => name.endsWith('.pcm')).sort().map((name) => path.join(dir, name));
  }

  /**
   * Concatenate a device's recorded frames into one PCM buffer
   */
  async readRecording(deviceId: string): Promise<Buffer> {
    const files = await this.listRecordings(deviceId);
    const chunks: Buffer[] = [];
    for (const file of files) {
      chunks.push(await fs.readFile(file));
    }
    return Buffer.concat(chunks);
  }

  /**
   * Get recording statistics
   */
  async getStats(): Promise<RecordingStats> {
    const stats: RecordingStats = { totalSize: 0, fileCount: 0, byDevice: {} };

    if (!(await fs.pathExists(this.recordingsPath))) {
      return stats;
    }

    const items = await fs.readdir(this.recordingsPath, { withFileTypes: true });
    for (const item of items) {
      if (!item.isDirectory()) {
        continue;
      }
      const dir = path.join(this.recordingsPath, item.name);
      const size = await this.getDirectorySize(dir);
      stats.byDevice[item.name] = size;
      stats.totalSize += size;
      stats.fileCount += await this.countFiles(dir);
    }

    log('debug', 'Recording statistics calculated', stats);
    return stats;
  }

  /**
   * Get total size of directory recursively
   */
  private async getDirectorySize(dirPath: string): Promise<number> {
    if (!(await fs.pathExists(dirPath))) {
      return 0;
    }

    let totalSize = 0;
    const items = await fs.readdir(dirPath, { withFileTypes: true });

    for (const item of items) {
      const itemPath = path.join(dirPath, item.name);
      if (item.isFile()) {
        const stats = await fs.stat(itemPath);
        totalSize += stats.size;
      } else if (item.isDirectory()) {
        totalSize += await this.getDirectorySize(itemPath);
      }
    }

    return totalSize;
  }

  /**
   * Count files recursively
   */
  private async countFiles(dirPath: string): Promise<number> {
    let count = 0;
    const items = await fs.readdir(dirPath, { withFileTypes: true });

    for (const item of items) {
      if (item.isFile()) {
        count++;
      } else if (item.isDirectory()) {
        count += await this.countFiles(path.join(dirPath, item.name));
      }
    }

    return count;
  }

  /**
   * Delete recorded frames older than the given age
   * @returns number of files removed
   */
  async cleanOldFiles(maxAgeHours: number, now: number = Date.now()): Promise<number> {
    log('info', `Cleaning recordings older than ${maxAgeHours} hours`);

    if (!(await fs.pathExists(this.recordingsPath))) {
      return 0;
    }

    const deletedCount = await this.cleanDirectory(this.recordingsPath, now, maxAgeHours * 60 * 60 * 1000);

    log('info', `Cleaned ${deletedCount} old files`);
    return deletedCount;
  }

  private async cleanDirectory(dirPath: string, now: number, maxAgeMs: number): Promise<number> {
    let count = 0;
    const items = await fs.readdir(dirPath, { withFileTypes: true });

    for (const item of items) {
      const itemPath = path.join(dirPath, item.name);

      if (item.isFile()) {
        const stats = await fs.stat(itemPath);
        if (now - stats.mtimeMs > maxAgeMs) {
          await fs.remove(itemPath);
          count++;
        }
      } else if (item.isDirectory()) {
        count += await this.cleanDirectory(itemPath, now, maxAgeMs);

        // Remove empty directories
        const remaining = await fs.readdir(itemPath);
        if (remaining.length === 0) {
          await fs.remove(itemPath);
        }
      }
    }

    return count;
  }

  /**
   * Periodically delete recordings past the retention age
   */
  startCleanup(intervalMs: number, maxAgeHours: number): void {
    if (this.cleanupTimer || intervalMs <= 0 || maxAgeHours <= 0) {
      return;
    }

    this.cleanupTimer = setInterval(() => {
      this.cleanOldFiles(maxAgeHours).catch((error: unknown) => {
        log('error', `Recording cleanup failed: ${errorMessage(error)}`);
      });
    }, intervalMs);
    this.cleanupTimer.unref();
  }

  stopCleanup(): void {
    if (this.cleanupTimer) {
      clearInterval(this.cleanupTimer);
      this.cleanupTimer = null;
    }
  }
}

/**
 * Keep a device id usable as a single path segment
 */
function sanitizeSegment(value: string): string {
  const cleaned = value.replace(/[^A-Za-z0-9._-]/g, '_');
  return /^\.*$/.test(cleaned) ? cleaned.replace(/\./g, '_') || '_' : cleaned;
}
