import { test, expect, vi } from 'vitest';
import fs from 'fs-extra';
import path from 'path';
import { PathResolver, cleanFolderSpec } from '../src/lib/paths';
import { Logger } from '../src/lib/log';
import { withTempDir } from './tmp';

function resolverFor(base: string) {
  const logger = new Logger('ERROR', { console: false });
  const warn = vi.spyOn(logger, 'warn');
  return { paths: new PathResolver(base, logger), warn };
}

test('cleanFolderSpec sanitizes segments and keeps parent references', () => {
  expect(cleanFolderSpec('a//./b\\c/../d')).toEqual(['a', 'b', 'c', '..', 'd']);
  expect(cleanFolderSpec('CON/x:y/...')).toEqual(['_CON', 'x_y']);
  expect(cleanFolderSpec('')).toEqual([]);
});

test('folders resolve under the base directory', async () => {
  await withTempDir(async base => {
    const { paths, warn } = resolverFor(base);

    expect(paths.resolveDirectory('a/b')).toBe(path.join(base, 'a', 'b'));
    expect(paths.resolveDirectory('a/../b')).toBe(path.join(base, 'b'));
    expect(paths.resolveDirectory('')).toBe(path.resolve(base));
    expect(paths.getFullOutputPath('x')).toBe(path.join(base, 'x'));
    expect(await fs.pathExists(path.join(base, 'x'))).toBe(false);
    expect(warn).not.toHaveBeenCalled();
  });
});

test('folders escaping the base directory fall back to it', async () => {
  await withTempDir(async base => {
    const { paths, warn } = resolverFor(base);

    expect(paths.resolveDirectory('../outside')).toBe(path.resolve(base));
    expect(paths.resolveDirectory('a/../../b')).toBe(path.resolve(base));
    expect(warn).toHaveBeenCalledTimes(2);
    expect(paths.isWithinBase('../x')).toBe(false);
    expect(paths.isWithinBase('a/b')).toBe(true);
  });
});

test('createOutputPath creates the folder', async () => {
  await withTempDir(async base => {
    const { paths } = resolverFor(base);

    const dir = await paths.createOutputPath('model/2024');
    expect(dir).toBe(path.join(base, 'model', '2024'));
    expect(await fs.pathExists(dir)).toBe(true);
  });
});

test('createOutputPath uses the base directory when the folder cannot be created', async () => {
  await withTempDir(async base => {
    await fs.writeFile(path.join(base, 'blocker'), '');
    const { paths, warn } = resolverFor(base);

    expect(await paths.createOutputPath('blocker/sub')).toBe(path.resolve(base));
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn.mock.calls[0][0]).toBe('Could not create output directory');
  });
});

test('getSubfolderPath is relative to the base directory', async () => {
  await withTempDir(async base => {
    const { paths } = resolverFor(base);

    expect(paths.getSubfolderPath(path.join(base, 'a', 'b', 'f.png'))).toBe('a/b');
    expect(paths.getSubfolderPath(path.join(base, 'f.png'))).toBe('');
    expect(paths.getSubfolderPath(path.join(path.dirname(base), 'f.png'))).toBe('');
  });
});

test('getPathInfo reports state and free space of the base directory', async () => {
  await withTempDir(async base => {
    const info = await resolverFor(base).paths.getPathInfo();
    expect(info.baseDir).toBe(path.resolve(base));
    expect(info.exists).toBe(true);
    expect(info.writable).toBe(true);
    expect(typeof info.availableSpace).toBe('number');

    const missing = path.join(base, 'absent');
    expect(await resolverFor(missing).paths.getPathInfo()).toEqual({
      baseDir: missing,
      exists: false,
      writable: false,
      availableSpace: null
    });
  });
});

test('cleanupEmptyDirs removes empty folders up to the given depth', async () => {
  await withTempDir(async base => {
    await fs.ensureDir(path.join(base, 'a'));
    await fs.ensureDir(path.join(base, 'b', 'c'));
    await fs.outputFile(path.join(base, 'd', 'keep.png'), '');
    await fs.ensureDir(path.join(base, 'e', 'f', 'g', 'h'));
    const { paths } = resolverFor(base);

    const removed = await paths.cleanupEmptyDirs(3);

    expect([...removed].sort()).toEqual([
      path.join(base, 'a'),
      path.join(base, 'b'),
      path.join(base, 'b', 'c')
    ]);
    expect(await fs.pathExists(path.join(base, 'd', 'keep.png'))).toBe(true);
    expect(await fs.pathExists(path.join(base, 'e', 'f', 'g', 'h'))).toBe(true);
    expect(await fs.pathExists(base)).toBe(true);
    expect(await resolverFor(path.join(base, 'absent')).paths.cleanupEmptyDirs()).toEqual([]);
  });
});
