import fs from 'fs-extra';
import path from 'path';
import { statfs } from 'fs/promises';

export async function ensureDir(dirPath: string): Promise<void> {
  await fs.ensureDir(dirPath);
}

export async function pathExists(filePath: string): Promise<boolean> {
  return fs.pathExists(filePath);
}

export async function readDirNames(dirPath: string): Promise<string[]> {
  return fs.readdir(dirPath);
}

/** Write `content`, failing with EEXIST instead of replacing an existing file. */
export async function writeFileExclusive(filePath: string, content: Buffer): Promise<void> {
  await fs.writeFile(filePath, content, { flag: 'wx' });
}

export async function readJson(filePath: string): Promise<unknown> {
  const content = await fs.readFile(filePath, 'utf8');
  const parsed: unknown = JSON.parse(content);
  return parsed;
}

export async function isWritable(dirPath: string): Promise<boolean> {
  try {
    await fs.access(dirPath, fs.constants.W_OK);
    return true;
  } catch {
    return false;
  }
}

/** Bytes available to this process on the filesystem holding `dirPath`. */
export async function getFreeSpace(dirPath: string): Promise<number> {
  const stats = await statfs(dirPath);
  return stats.bavail * stats.bsize;
}

export async function listSubdirectories(dirPath: string): Promise<string[]> {
  const entries = await fs.readdir(dirPath, { withFileTypes: true });
  return entries.filter(entry => entry.isDirectory()).map(entry => path.join(dirPath, entry.name));
}

/** Remove `dirPath` when it has no entries; false when it was kept. */
export async function removeIfEmpty(dirPath: string): Promise<boolean> {
  if ((await fs.readdir(dirPath)).length > 0) return false;
  await fs.rmdir(dirPath);
  return true;
}
