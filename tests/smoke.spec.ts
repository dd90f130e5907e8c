import { test, expect } from 'vitest';
import fs from 'fs-extra';
import path from 'path';
import {
  DEFAULT_CONFIG,
  FileCopyWriter,
  ImageSaver,
  Logger,
  sanitizeSegment,
  toParamTree
} from '../src/index';
import { withTempDir } from './tmp';

test('workflow parameters become a folder and numbered file names', async () => {
  await withTempDir(async base => {
    const saver = new ImageSaver({
      ...DEFAULT_CONFIG,
      outputDir: base,
      filenamePrefix: 'Test',
      filenameTemplate: 'sampler_name, 3.seed, %Y-%m-%d',
      foldernameTemplate: 'ckpt_name',
      delimiter: '_',
      extension: '.png'
    }, {
      logger: new Logger('ERROR', { console: false }),
      writer: new FileCopyWriter()
    });

    const tree = toParamTree({
      '3': { class_type: 'KSampler', inputs: { seed: 1234, sampler_name: 'dpmpp_2m' } },
      '4': { class_type: 'CheckpointLoaderSimple', inputs: { ckpt_name: 'dream.ckpt' } }
    });

    const saved = await saver.saveImages(
      [{ bytes: Buffer.from('one') }, { bytes: Buffer.from('two') }],
      tree,
      { timestamp: new Date(2024, 4, 2, 9, 0, 0) }
    );

    expect(saved.map(s => path.relative(base, s.path))).toEqual([
      path.join('dream', 'Test_dpmpp_2m_1234_2024-05-02_0001.png'),
      path.join('dream', 'Test_dpmpp_2m_1234_2024-05-02_0002.png')
    ]);
    expect(await fs.readdir(path.join(base, 'dream'))).toHaveLength(2);
  });
});

test('sanitized names stay stable', () => {
  expect(sanitizeSegment(sanitizeSegment(' CON '))).toBe('_CON');
});

test('Logger writes to a log file when a directory is given', async () => {
  await withTempDir(async dir => {
    const logger = new Logger('INFO', { logDir: dir, console: false });

    logger.debug('hidden');
    logger.info('Save event complete', { count: 2 });
    logger.warn('careful');
    logger.error('failed', { error: new Error('disk full') });

    const logFile = logger.getLogFile();
    expect(logFile).not.toBeNull();
    const lines = (await fs.readFile(logFile ?? '', 'utf8')).trim().split('\n');
    expect(lines).toHaveLength(3);
    expect(lines[0]).toMatch(/^\[.+\] INFO: Save event complete \| \{"count":2\}$/);
    expect(lines[2]).toMatch(/ERROR: failed \| \{"error":\{"name":"Error","message":"disk full"\}\}$/);
    expect(logger.getStats()).toEqual({ warnings: 1, errors: 1 });
  });
});
