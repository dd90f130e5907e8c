#!/usr/bin/env node

import fs from 'fs-extra';
import path from 'path';
import minimist from 'minimist';
import dotenv from 'dotenv';
import {
  SaveConfig,
  applyPreset,
  configFromEnv,
  isCounterPosition,
  isPresetName,
  listPresets,
  validateConfig
} from './lib/config';
import { Logger, parseLogLevel } from './lib/log';
import { toParamTree } from './lib/params';
import { FileCopyWriter } from './lib/writer';
import { ConfigError, errorMessage } from './lib/errors';
import { ImageSaver } from './pipeline/run';
import { PathResolver } from './lib/paths';
import { readJson } from './utils/fs';

export type Command = 'preview' | 'validate' | 'save' | 'presets' | 'info' | 'cleanup' | 'help';

export interface CliOptions {
  command: Command;
  config: SaveConfig;
  paramsFile?: string;
  images: string[];
  dryRun: boolean;
  logDir?: string;
  depth: number;
}

const COMMANDS: readonly Command[] = ['preview', 'validate', 'save', 'presets', 'info', 'cleanup', 'help'];

const USAGE = `
Usage: imgname <command> [options]

Commands:
  preview --params <file>          Show the path the next image would get
  save --params <file> <image...>  Copy encoded images under generated names
  validate                         Check the naming configuration
  presets                          List template presets
  info                             Show the output directory state and free space
  cleanup [--depth <n>]            Remove empty folders under the output directory

Options:
  -o, --out-dir <dir>          Base output directory (default: output)
  -p, --prefix <text>          File name prefix (default: image)
  -t, --template <keys>        File name template, comma separated
  -f, --folder-template <keys> Folder name template, comma separated
  --folder-prefix <text>       Folder name prefix
  -d, --delimiter <text>       Delimiter between values (default: -)
  -e, --ext <ext>              Output extension (default: .webp)
  --digits <n>                 Counter width 1-8 (default: 4)
  --position <first|last>      Counter position (default: last)
  --per-prefix                 One counter per base name instead of per folder
  --preset <name>              simple | detailed | organized | minimal
  --dry-run                    Print target paths without writing
  --depth <n>                  Folder levels searched by cleanup (default: 3)
  -l, --log-level <level>      DEBUG | INFO | WARN | ERROR
  --log-dir <dir>              Also write logs to a file in <dir>
  -h, --help                   Show this help

Environment:
  IMGNAME_OUT_DIR, IMGNAME_PREFIX, IMGNAME_TEMPLATE, IMGNAME_FOLDER_TEMPLATE,
  IMGNAME_FOLDER_PREFIX, IMGNAME_DELIMITER, IMGNAME_EXT, IMGNAME_DIGITS,
  IMGNAME_POSITION, IMGNAME_PER_DIRECTORY, IMGNAME_QUALITY, LOG_LEVEL, LOG_DIR
`;

function isCommand(value: string): value is Command {
  return COMMANDS.some(command => command === value);
}

function optionalString(value: unknown): string | undefined {
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return String(value);
  return undefined;
}

export function parseArgs(argv: string[], env: NodeJS.ProcessEnv = process.env): CliOptions {
  const args = minimist(argv, {
    string: ['out-dir', 'prefix', 'template', 'folder-template', 'folder-prefix', 'delimiter', 'ext',
      'digits', 'position', 'preset', 'log-level', 'log-dir', 'params', 'depth'],
    boolean: ['dry-run', 'per-prefix', 'help'],
    alias: {
      h: 'help',
      o: 'out-dir',
      p: 'prefix',
      t: 'template',
      f: 'folder-template',
      d: 'delimiter',
      e: 'ext',
      l: 'log-level'
    }
  });

  const [first = 'help', ...rest] = args._.map(String);
  if (!isCommand(first)) {
    throw new ConfigError(`Unknown command: ${first}`, [USAGE.trim()]);
  }
  const command: Command = args.help ? 'help' : first;

  let config = configFromEnv(env);

  const preset = optionalString(args.preset);
  if (preset !== undefined) {
    if (!isPresetName(preset)) {
      throw new ConfigError(`Unknown preset: ${preset}`);
    }
    config = applyPreset(config, preset);
  }

  let counterPosition = config.counterPosition;
  const position = optionalString(args.position);
  if (position !== undefined) {
    if (!isCounterPosition(position)) {
      throw new ConfigError(`Invalid --position: ${position} (expected first or last)`);
    }
    counterPosition = position;
  }

  const digits = optionalString(args.digits);
  const depthArg = optionalString(args.depth);
  const depth = depthArg === undefined ? 3 : parseInt(depthArg, 10);
  if (!Number.isInteger(depth) || depth < 1) {
    throw new ConfigError(`Invalid --depth: ${depthArg} (expected a positive integer)`);
  }
  const ext = optionalString(args.ext);

  config = {
    ...config,
    outputDir: optionalString(args['out-dir']) ?? config.outputDir,
    filenamePrefix: optionalString(args.prefix) ?? config.filenamePrefix,
    filenameTemplate: optionalString(args.template) ?? config.filenameTemplate,
    foldernameTemplate: optionalString(args['folder-template']) ?? config.foldernameTemplate,
    foldernamePrefix: optionalString(args['folder-prefix']) ?? config.foldernamePrefix,
    delimiter: optionalString(args.delimiter) ?? config.delimiter,
    extension: ext === undefined ? config.extension : ext.startsWith('.') ? ext : `.${ext}`,
    counterDigits: digits === undefined ? config.counterDigits : parseInt(digits, 10),
    counterPosition,
    perDirectoryCounter: args['per-prefix'] ? false : config.perDirectoryCounter,
    logLevel: parseLogLevel(optionalString(args['log-level']), config.logLevel)
  };

  return {
    command,
    config,
    paramsFile: optionalString(args.params),
    images: rest,
    dryRun: Boolean(args['dry-run']),
    logDir: optionalString(args['log-dir']) ?? env.LOG_DIR,
    depth
  };
}

async function loadParams(file: string | undefined) {
  if (!file) {
    throw new ConfigError('Missing --params <file.json>');
  }
  if (!await fs.pathExists(file)) {
    throw new ConfigError(`Parameter file not found: ${file}`);
  }
  return toParamTree(await readJson(file));
}

function requireValidConfig(config: SaveConfig): void {
  const validation = validateConfig(config);
  if (!validation.valid) {
    throw new ConfigError('Invalid configuration', validation.errors);
  }
}

export async function run(options: CliOptions): Promise<number> {
  const { command, config } = options;

  if (command === 'help') {
    console.log(USAGE);
    return 0;
  }

  if (command === 'presets') {
    for (const [name, description] of Object.entries(listPresets())) {
      console.log(`${name.padEnd(10)} ${description}`);
    }
    return 0;
  }

  if (command === 'validate') {
    const validation = validateConfig(config);
    for (const error of validation.errors) console.log(`error: ${error}`);
    for (const warning of validation.warnings) console.log(`warning: ${warning}`);
    console.log(validation.valid ? 'Configuration OK' : 'Configuration invalid');
    return validation.valid ? 0 : 1;
  }

  requireValidConfig(config);

  const logger = new Logger(config.logLevel, { logDir: options.logDir });

  if (command === 'info') {
    const info = await new PathResolver(config.outputDir, logger).getPathInfo();
    console.log(JSON.stringify(info, null, 2));
    return 0;
  }

  if (command === 'cleanup') {
    for (const dir of await new PathResolver(config.outputDir, logger).cleanupEmptyDirs(options.depth)) {
      console.log(dir);
    }
    return 0;
  }

  const saver = new ImageSaver(config, { logger, writer: new FileCopyWriter() });
  const tree = await loadParams(options.paramsFile);

  if (command === 'preview') {
    const preview = await saver.previewSavePath(tree);
    console.log(preview.filePath);
    for (const issue of preview.issues) {
      console.log(`  skipped ${issue.token}: ${issue.message}`);
    }
    return 0;
  }

  if (options.images.length === 0) {
    throw new ConfigError('No images given to save');
  }

  if (options.dryRun) {
    for (const preview of await saver.previewBatch(tree, options.images.length)) {
      console.log(preview.filePath);
    }
    return 0;
  }

  const images = await Promise.all(options.images.map(async file => {
    if (path.extname(file).toLowerCase() !== config.extension.toLowerCase()) {
      logger.warn('Source extension differs from output extension; bytes are copied unchanged', { file });
    }
    return { bytes: await fs.readFile(file) };
  }));

  await saver.init();
  const saved = await saver.saveImages(images, tree);
  for (const image of saved) {
    console.log(image.path);
  }
  return 0;
}

export async function main(argv: string[] = process.argv.slice(2)): Promise<number> {
  dotenv.config();

  try {
    return await run(parseArgs(argv));
  } catch (error) {
    console.error(`Error: ${errorMessage(error)}`);
    if (error instanceof ConfigError) {
      for (const detail of error.details) console.error(detail);
      return 2;
    }
    return 1;
  }
}

if (require.main === module) {
  main().then(code => {
    process.exitCode = code;
  });
}

export * from './lib/params';
export * from './lib/template';
export * from './lib/strftime';
export * from './lib/resolver';
export * from './lib/nameBuilder';
export * from './lib/counter';
export * from './lib/paths';
export * from './lib/config';
export * from './lib/log';
export * from './lib/errors';
export * from './lib/writer';
export * from './pipeline/run';
export { sanitizeSegment, stripModelExtension } from './utils/sanitize';
export { KeyedLock } from './utils/lock';
