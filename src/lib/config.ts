import { CounterPosition } from './nameBuilder';
import { LogLevel, parseLogLevel } from './log';
import { Template, parseTemplate } from './template';
import { isValidDirective } from './strftime';

export interface SaveConfig {
  outputDir: string;
  filenamePrefix: string;
  filenameTemplate: string;
  foldernamePrefix: string;
  foldernameTemplate: string;
  delimiter: string;
  extension: string;
  quality: number;
  saveMetadata: boolean;
  counterDigits: number;
  counterPosition: CounterPosition;
  perDirectoryCounter: boolean;
  logLevel: LogLevel;
}

export const SUPPORTED_EXTENSIONS = ['.avif', '.webp', '.png', '.jpg', '.jpeg', '.gif', '.tiff', '.bmp'] as const;

export const DEFAULT_CONFIG: SaveConfig = {
  outputDir: 'output',
  filenamePrefix: 'image',
  filenameTemplate: 'sampler_name, cfg, steps, %F %H-%M-%S',
  foldernamePrefix: '',
  foldernameTemplate: 'ckpt_name',
  delimiter: '-',
  extension: '.webp',
  quality: 75,
  saveMetadata: true,
  counterDigits: 4,
  counterPosition: 'last',
  perDirectoryCounter: true,
  logLevel: 'INFO'
};

export type PresetName = 'simple' | 'detailed' | 'organized' | 'minimal';

export interface Preset {
  filenameTemplate: string;
  foldernameTemplate: string;
  delimiter: string;
  description: string;
}

export const PRESETS: Record<PresetName, Preset> = {
  simple: {
    filenameTemplate: 'sampler_name, steps',
    foldernameTemplate: 'ckpt_name',
    delimiter: '-',
    description: 'Sampler and step count'
  },
  detailed: {
    filenameTemplate: 'sampler_name, cfg, steps, %Y-%m-%d_%H-%M-%S',
    foldernameTemplate: 'ckpt_name, ./sampler_name',
    delimiter: '_',
    description: 'Timestamped names, one subfolder per sampler'
  },
  organized: {
    filenameTemplate: 'ckpt_name, sampler_name, cfg, steps',
    foldernameTemplate: '%Y-%m-%d, ./ckpt_name',
    delimiter: '-',
    description: 'Folders by date, then by model'
  },
  minimal: {
    filenameTemplate: '%Y%m%d_%H%M%S',
    foldernameTemplate: '',
    delimiter: '',
    description: 'Timestamp only'
  }
};

const HELP_TEXT: Record<string, string> = {
  filenameTemplate: [
    'Comma-separated keys, in order:',
    '  sampler_name, cfg, steps, seed, ckpt_name  first match anywhere in the parameters',
    '  5.seed                                     input "seed" of node 5',
    '  %Y-%m-%d, %H-%M-%S                         date and time of the save',
  ].join('\n'),
  foldernameTemplate: [
    'Same keys as the file name template, plus:',
    '  ./name     start a subfolder "name"',
    '  ../name    same, kept for older templates',
  ].join('\n'),
  delimiter: 'Joins template values; short separators such as - or _ are safest',
  quality: 'Image quality 1-100 for lossy formats',
  counterPosition: 'last = counter at the end of the name, first = at the start',
  perDirectoryCounter: 'true = one counter per folder, false = one counter per base name'
};

export function isPresetName(value: string): value is PresetName {
  return Object.prototype.hasOwnProperty.call(PRESETS, value);
}

export function applyPreset(config: SaveConfig, name: PresetName): SaveConfig {
  const preset = PRESETS[name];
  return {
    ...config,
    filenameTemplate: preset.filenameTemplate,
    foldernameTemplate: preset.foldernameTemplate,
    delimiter: preset.delimiter
  };
}

export function listPresets(): Record<PresetName, string> {
  return {
    simple: PRESETS.simple.description,
    detailed: PRESETS.detailed.description,
    organized: PRESETS.organized.description,
    minimal: PRESETS.minimal.description
  };
}

export function getHelp(field: string): string {
  return HELP_TEXT[field] ?? 'No help available';
}

export function isCounterPosition(value: string): value is CounterPosition {
  return value === 'first' || value === 'last';
}

export function filenameTokens(config: SaveConfig): Template {
  return parseTemplate(config.filenameTemplate);
}

export function foldernameTokens(config: SaveConfig): Template {
  return parseTemplate(config.foldernameTemplate);
}

export interface ValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
}

const PATH_MARKER_FORMAT = /^\.\.?\/[\w-]+$/;
const NODE_REFERENCE_SHAPE = /^\d+\./;

function validateTemplate(source: string, field: string, result: ValidationResult) {
  for (const token of parseTemplate(source)) {
    switch (token.kind) {
      case 'date':
        if (!isValidDirective(token.raw)) {
          result.errors.push(`${field}: invalid date format: ${token.raw}`);
        }
        break;
      case 'path':
        if (!PATH_MARKER_FORMAT.test(token.raw)) {
          result.warnings.push(`${field}: path segment may not work as expected: ${token.raw}`);
        }
        break;
      case 'literal':
        if (NODE_REFERENCE_SHAPE.test(token.raw)) {
          result.errors.push(`${field}: malformed node reference: ${token.raw} (expected <node id>.<input name>)`);
        }
        break;
      case 'node':
        break;
    }
  }
}

export function validateConfig(config: SaveConfig): ValidationResult {
  const result: ValidationResult = { valid: true, errors: [], warnings: [] };

  validateTemplate(config.filenameTemplate, 'filenameTemplate', result);
  validateTemplate(config.foldernameTemplate, 'foldernameTemplate', result);

  if (!SUPPORTED_EXTENSIONS.some(ext => ext === config.extension)) {
    result.errors.push(`Unsupported extension: ${config.extension}`);
  }
  if (!Number.isInteger(config.quality) || config.quality < 1 || config.quality > 100) {
    result.errors.push('quality must be an integer between 1 and 100');
  }
  if (!Number.isInteger(config.counterDigits) || config.counterDigits < 1 || config.counterDigits > 8) {
    result.errors.push('counterDigits must be an integer between 1 and 8');
  }
  if (!isCounterPosition(config.counterPosition)) {
    result.errors.push("counterPosition must be 'first' or 'last'");
  }
  if (!config.delimiter || config.delimiter.length > 3) {
    result.warnings.push('A short delimiter such as - or _ is recommended');
  }

  result.valid = result.errors.length === 0;
  return result;
}

function parseBool(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value === '') return fallback;
  return !['false', '0', 'no', 'off'].includes(value.trim().toLowerCase());
}

function parseIntOr(value: string | undefined, fallback: number): number {
  const parsed = parseInt(value || '', 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

/** Defaults overlaid with `IMGNAME_*` environment variables. */
export function configFromEnv(env: NodeJS.ProcessEnv, base: SaveConfig = DEFAULT_CONFIG): SaveConfig {
  const position = env.IMGNAME_POSITION;
  return {
    outputDir: env.IMGNAME_OUT_DIR || base.outputDir,
    filenamePrefix: env.IMGNAME_PREFIX ?? base.filenamePrefix,
    filenameTemplate: env.IMGNAME_TEMPLATE ?? base.filenameTemplate,
    foldernamePrefix: env.IMGNAME_FOLDER_PREFIX ?? base.foldernamePrefix,
    foldernameTemplate: env.IMGNAME_FOLDER_TEMPLATE ?? base.foldernameTemplate,
    delimiter: env.IMGNAME_DELIMITER ?? base.delimiter,
    extension: env.IMGNAME_EXT || base.extension,
    quality: parseIntOr(env.IMGNAME_QUALITY, base.quality),
    saveMetadata: parseBool(env.IMGNAME_SAVE_METADATA, base.saveMetadata),
    counterDigits: parseIntOr(env.IMGNAME_DIGITS, base.counterDigits),
    counterPosition: position && isCounterPosition(position) ? position : base.counterPosition,
    perDirectoryCounter: parseBool(env.IMGNAME_PER_DIRECTORY, base.perDirectoryCounter),
    logLevel: parseLogLevel(env.LOG_LEVEL, base.logLevel)
  };
}
