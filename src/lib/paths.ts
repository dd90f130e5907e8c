import path from 'path';
import { Logger } from './log';
import { ensureDir, getFreeSpace, isWritable, listSubdirectories, pathExists, removeIfEmpty } from '../utils/fs';
import { sanitizeSegment } from '../utils/sanitize';
import { errorCode, errorMessage } from './errors';

const SEPARATORS = /[\\/]+/;

export interface PathInfo {
  baseDir: string;
  exists: boolean;
  writable: boolean;
  /** Free bytes, or null when the filesystem does not report it. */
  availableSpace: number | null;
}

/** Sanitize every segment of a folder spec; `..` is kept, `.` and empties are dropped. */
export function cleanFolderSpec(folderSpec: string): string[] {
  const segments: string[] = [];
  for (const part of folderSpec.split(SEPARATORS)) {
    if (!part || part === '.') continue;
    if (part === '..') {
      segments.push(part);
      continue;
    }
    const clean = sanitizeSegment(part);
    if (clean) segments.push(clean);
  }
  return segments;
}

export function isWithin(root: string, candidate: string): boolean {
  const rel = path.relative(root, candidate);
  if (rel === '') return true;
  return rel !== '..' && !rel.startsWith(`..${path.sep}`) && !path.isAbsolute(rel);
}

/**
 * Maps generated folder specs onto directories under one base output
 * directory. Specs that would leave the base directory resolve to the base
 * directory itself.
 */
export class PathResolver {
  readonly baseDir: string;

  constructor(baseDir: string, private logger: Logger) {
    this.baseDir = path.resolve(baseDir);
  }

  async init(): Promise<void> {
    await ensureDir(this.baseDir);
  }

  /** Absolute directory for `folderSpec`, without touching the filesystem. */
  resolveDirectory(folderSpec: string): string {
    const segments = cleanFolderSpec(folderSpec);
    if (segments.length === 0) return this.baseDir;

    const target = path.resolve(this.baseDir, ...segments);
    if (!isWithin(this.baseDir, target)) {
      this.logger.warn('Folder escapes the output directory, using base directory', {
        folder: folderSpec,
        baseDir: this.baseDir
      });
      return this.baseDir;
    }
    return target;
  }

  getFullOutputPath(folderSpec: string): string {
    return this.resolveDirectory(folderSpec);
  }

  /** Create `dirPath` and its parents; false when creation failed. */
  async ensureExists(dirPath: string): Promise<boolean> {
    try {
      await ensureDir(dirPath);
      return true;
    } catch (error) {
      this.logger.warn('Could not create output directory', {
        directory: dirPath,
        code: errorCode(error),
        error: errorMessage(error)
      });
      return false;
    }
  }

  /** Resolve and create the folder, falling back to the base directory on failure. */
  async createOutputPath(folderSpec: string): Promise<string> {
    const target = this.resolveDirectory(folderSpec);
    if (target === this.baseDir) {
      await ensureDir(this.baseDir);
      return this.baseDir;
    }

    if (await this.ensureExists(target)) {
      return target;
    }

    await ensureDir(this.baseDir);
    return this.baseDir;
  }

  /** Directory of `filePath` relative to the base, `''` at the root or outside it. */
  getSubfolderPath(filePath: string): string {
    const dir = path.dirname(path.resolve(filePath));
    if (!isWithin(this.baseDir, dir)) return '';
    return path.relative(this.baseDir, dir).split(path.sep).join('/');
  }

  isWithinBase(candidate: string): boolean {
    return isWithin(this.baseDir, path.resolve(this.baseDir, candidate));
  }

  async getAvailableSpace(): Promise<number | null> {
    try {
      return await getFreeSpace(this.baseDir);
    } catch (error) {
      this.logger.debug('Free space unavailable', { baseDir: this.baseDir, code: errorCode(error) });
      return null;
    }
  }

  async getPathInfo(): Promise<PathInfo> {
    const exists = await pathExists(this.baseDir);
    return {
      baseDir: this.baseDir,
      exists,
      writable: exists && await isWritable(this.baseDir),
      availableSpace: exists ? await this.getAvailableSpace() : null
    };
  }

  /**
   * Remove empty directories under the base, at most `maxDepth` levels down.
   * The base directory itself is never removed. Returns the removed paths.
   */
  async cleanupEmptyDirs(maxDepth = 3): Promise<string[]> {
    const removed: string[] = [];
    if (!await pathExists(this.baseDir)) return removed;

    const sweep = async (dir: string, depth: number): Promise<void> => {
      if (depth >= maxDepth) return;

      let children: string[];
      try {
        children = await listSubdirectories(dir);
      } catch (error) {
        this.logger.warn('Could not list directory during cleanup', { directory: dir, error: errorMessage(error) });
        return;
      }

      for (const child of children) {
        await sweep(child, depth + 1);
        try {
          if (await removeIfEmpty(child)) removed.push(child);
        } catch (error) {
          this.logger.warn('Could not remove empty directory', { directory: child, error: errorMessage(error) });
        }
      }
    };

    await sweep(this.baseDir, 0);
    if (removed.length > 0) {
      this.logger.info('Removed empty directories', { count: removed.length });
    }
    return removed;
  }
}
