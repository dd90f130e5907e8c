import path from 'path';
import { SaveConfig, filenameTokens, foldernameTokens } from '../lib/config';
import { Logger } from '../lib/log';
import { ParamNode } from '../lib/params';
import { TemplateResolver } from '../lib/resolver';
import { CounterOptions, CounterRegistry } from '../lib/counter';
import { PathResolver } from '../lib/paths';
import { PATH_SEPARATOR, buildFilename, buildName } from '../lib/nameBuilder';
import { ImageData, ImageMetadata, ImageWriter } from '../lib/writer';
import { FatalStorageError, TemplateResolutionIssue, errorMessage } from '../lib/errors';
import { Template } from '../lib/template';

export interface SavedImage {
  filename: string;
  subfolder: string;
  path: string;
  type: 'output';
}

export interface SaveOptions {
  timestamp?: Date;
  metadata?: ImageMetadata | null;
}

export interface PreviewOptions {
  /** Use this counter instead of asking the registry. */
  counter?: number;
  timestamp?: Date;
}

export interface PreviewResult {
  filePath: string;
  folderPath: string;
  filename: string;
  counter: number;
  issues: TemplateResolutionIssue[];
}

interface EventNames {
  baseName: string;
  folderSpec: string;
}

export interface ImageSaverDeps {
  logger: Logger;
  writer: ImageWriter;
  resolver?: TemplateResolver;
  counters?: CounterRegistry;
  paths?: PathResolver;
}

/**
 * Coordinates one save event: names are resolved once per event, the target
 * folder is created, a block of counters is claimed and every image is
 * handed to the writer.
 */
export class ImageSaver {
  private config: SaveConfig;
  private fileTokens: Template;
  private folderTokens: Template;
  private logger: Logger;
  private writer: ImageWriter;
  private resolver: TemplateResolver;
  private counters: CounterRegistry;
  private paths: PathResolver;

  constructor(config: SaveConfig, deps: ImageSaverDeps) {
    this.config = config;
    this.fileTokens = filenameTokens(config);
    this.folderTokens = foldernameTokens(config);
    this.logger = deps.logger;
    this.writer = deps.writer;
    this.resolver = deps.resolver ?? new TemplateResolver();
    this.counters = deps.counters ?? new CounterRegistry(deps.logger);
    this.paths = deps.paths ?? new PathResolver(config.outputDir, deps.logger);
  }

  /** Create the base output directory up front. */
  async init(): Promise<void> {
    try {
      await this.paths.init();
    } catch (error) {
      throw new FatalStorageError(`Output directory unavailable: ${errorMessage(error)}`, this.paths.baseDir, [], { cause: error });
    }
  }

  async saveImages(images: ImageData[], tree: ParamNode, options: SaveOptions = {}): Promise<SavedImage[]> {
    if (images.length === 0) return [];

    const timestamp = options.timestamp ?? new Date();
    const { baseName, folderSpec } = this.generateNames(tree, timestamp);

    let outputPath: string;
    try {
      outputPath = await this.paths.createOutputPath(folderSpec);
    } catch (error) {
      throw new FatalStorageError(`Output directory unavailable: ${errorMessage(error)}`, this.paths.baseDir, [], { cause: error });
    }

    const first = await this.counters.claim(this.counterOptions(outputPath, baseName), images.length);

    const metadata = this.config.saveMetadata ? options.metadata ?? null : null;
    const results: SavedImage[] = [];

    for (const [index, image] of images.entries()) {
      const filename = buildFilename(
        baseName,
        first + index,
        this.config.counterDigits,
        this.config.counterPosition,
        this.config.extension,
        this.config.delimiter
      );
      const filePath = path.join(outputPath, filename);

      try {
        await this.writer.write(image, filePath, metadata, this.config.quality);
      } catch (error) {
        this.logger.error('Image write failed', { path: filePath, error });
        throw new FatalStorageError(`Could not write ${filePath}: ${errorMessage(error)}`, filePath, results, { cause: error });
      }

      this.logger.debug('Image saved', { path: filePath });
      results.push({
        filename,
        subfolder: this.paths.getSubfolderPath(filePath),
        path: filePath,
        type: 'output'
      });
    }

    this.logger.info('Save event complete', { folder: outputPath, count: results.length, first });
    return results;
  }

  /** Path the next save would use; creates nothing and claims no counter. */
  async previewSavePath(tree: ParamNode, options: PreviewOptions = {}): Promise<PreviewResult> {
    const [first] = await this.previewBatch(tree, 1, options);
    return first;
  }

  /**
   * Paths the next save of `count` images would use. The counter comes from
   * the registry (cache or directory scan) unless `options.counter` is given.
   */
  async previewBatch(tree: ParamNode, count: number, options: PreviewOptions = {}): Promise<PreviewResult[]> {
    const timestamp = options.timestamp ?? new Date();
    const { baseName, folderSpec } = this.generateNames(tree, timestamp);
    const folderPath = this.paths.getFullOutputPath(folderSpec);
    const issues = [
      ...this.resolver.diagnose(this.fileTokens, tree, timestamp),
      ...this.resolver.diagnose(this.folderTokens, tree, timestamp)
    ];

    const first = options.counter ?? await this.counters.peekNext(this.counterOptions(folderPath, baseName));

    return Array.from({ length: Math.max(count, 1) }, (_, index) => {
      const counter = first + index;
      const filename = buildFilename(
        baseName,
        counter,
        this.config.counterDigits,
        this.config.counterPosition,
        this.config.extension,
        this.config.delimiter
      );
      return { filePath: path.join(folderPath, filename), folderPath, filename, counter, issues };
    });
  }

  clearCaches(): void {
    this.resolver.clearCache();
    this.counters.invalidateAll();
  }

  updateConfig(config: SaveConfig): void {
    this.config = config;
    this.fileTokens = filenameTokens(config);
    this.folderTokens = foldernameTokens(config);
    if (path.resolve(config.outputDir) !== this.paths.baseDir) {
      this.paths = new PathResolver(config.outputDir, this.logger);
    }
    this.clearCaches();
  }

  getConfig(): SaveConfig {
    return { ...this.config };
  }

  private counterOptions(directory: string, baseName: string): CounterOptions {
    return {
      directory,
      digits: this.config.counterDigits,
      position: this.config.counterPosition,
      extension: this.config.extension,
      prefix: baseName,
      delimiter: this.config.delimiter,
      perDirectory: this.config.perDirectoryCounter
    };
  }

  /**
   * Base file name and folder spec for one event. Path markers in the file
   * name template move their part of the name into the folder spec.
   */
  private generateNames(tree: ParamNode, timestamp: Date): EventNames {
    const fileValues = this.resolver.resolve(this.fileTokens, tree, timestamp);
    const folderValues = this.resolver.resolve(this.folderTokens, tree, timestamp);

    const fileName = buildName(this.fileTokens, fileValues, this.config.filenamePrefix, this.config.delimiter);
    const folderName = buildName(this.folderTokens, folderValues, this.config.foldernamePrefix, this.config.delimiter, '');

    const cut = fileName.lastIndexOf(PATH_SEPARATOR);
    if (cut === -1) {
      return { baseName: fileName, folderSpec: folderName };
    }

    const fileDirs = fileName.slice(0, cut);
    return {
      baseName: fileName.slice(cut + 1),
      folderSpec: folderName ? `${folderName}${PATH_SEPARATOR}${fileDirs}` : fileDirs
    };
  }
}
