import path from 'path';
import { Logger } from './log';
import { CounterPosition } from './nameBuilder';
import { KeyedLock } from '../utils/lock';
import { pathExists, readDirNames } from '../utils/fs';
import { errorCode, errorMessage } from './errors';

export interface CounterOptions {
  directory: string;
  digits: number;
  position: CounterPosition;
  extension: string;
  /** Base name the counter is attached to; only part of the scope when `perDirectory` is false. */
  prefix: string;
  delimiter: string;
  /** One series per folder (true) or one per prefix within the folder (false). */
  perDirectory: boolean;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export function scopeKey(options: Pick<CounterOptions, 'directory' | 'position' | 'extension' | 'prefix' | 'perDirectory'>): string {
  const dir = path.resolve(options.directory);
  return options.perDirectory
    ? `${dir}|${options.position}|${options.extension}|*`
    : `${dir}|${options.position}|${options.extension}|prefix:${options.prefix}`;
}

export function counterPattern(options: Omit<CounterOptions, 'directory'>): RegExp {
  const digits = `(\\d{${options.digits}})`;
  const delim = escapeRegExp(options.delimiter);
  const ext = escapeRegExp(options.extension);
  const prefix = options.perDirectory ? '' : escapeRegExp(options.prefix);

  return options.position === 'first'
    ? new RegExp(`^${digits}${delim}${prefix}.*${ext}$`)
    : new RegExp(`^${prefix}.*${delim}${digits}${ext}$`);
}

/**
 * Hands out sequential file counters per scope (directory, position,
 * extension and optionally prefix). The first request for a scope scans the
 * directory; later ones are served from memory.
 */
export class CounterRegistry {
  private cache = new Map<string, number>();
  private locks = new KeyedLock();
  private cacheEnabled = true;

  constructor(private logger: Logger) {}

  async getNext(options: CounterOptions): Promise<number> {
    return this.claim(options, 1);
  }

  /** Reserve `count` consecutive counters and return the first one. */
  async claim(options: CounterOptions, count: number): Promise<number> {
    if (!Number.isInteger(count) || count < 1) {
      throw new RangeError(`Counter claim must be a positive integer, got ${count}`);
    }

    const key = scopeKey(options);

    return this.locks.withLock(key, async () => {
      const cached = this.cacheEnabled ? this.cache.get(key) : undefined;
      const next = cached ?? (await this.findMaxCounter(options)) + 1;

      if (this.cacheEnabled) {
        this.cache.set(key, next + count);
      }

      const last = next + count - 1;
      if (String(last).length > options.digits) {
        this.logger.warn('Counter exceeds configured digits; later scans will not see it', {
          directory: options.directory,
          counter: last,
          digits: options.digits
        });
      }

      return next;
    });
  }

  /** Counter the next claim would return. Reserves nothing and stores no scan. */
  async peekNext(options: CounterOptions): Promise<number> {
    const key = scopeKey(options);
    return this.locks.withLock(key, async () => {
      const cached = this.cacheEnabled ? this.cache.get(key) : undefined;
      return cached ?? (await this.findMaxCounter(options)) + 1;
    });
  }

  invalidate(key: string): void {
    this.cache.delete(key);
  }

  invalidateDirectory(directory: string): void {
    const dir = path.resolve(directory);
    for (const key of [...this.cache.keys()]) {
      if (key.startsWith(`${dir}|`)) {
        this.cache.delete(key);
      }
    }
  }

  invalidateAll(): void {
    this.cache.clear();
  }

  setCacheEnabled(enabled: boolean): void {
    this.cacheEnabled = enabled;
    if (!enabled) {
      this.cache.clear();
    }
  }

  /** Seed the cache for directories that already exist. */
  async preload(directories: string[], options: Omit<CounterOptions, 'directory'>): Promise<void> {
    for (const directory of directories) {
      if (!await pathExists(directory)) continue;

      const scoped = { ...options, directory };
      const key = scopeKey(scoped);
      await this.locks.withLock(key, async () => {
        if (!this.cacheEnabled || this.cache.has(key)) return;
        this.cache.set(key, (await this.findMaxCounter(scoped)) + 1);
      });
    }
  }

  getStats() {
    return {
      cacheSize: this.cache.size,
      cacheEnabled: this.cacheEnabled
    };
  }

  private async findMaxCounter(options: CounterOptions): Promise<number> {
    let names: string[];
    try {
      names = await readDirNames(options.directory);
    } catch (error) {
      if (errorCode(error) !== 'ENOENT') {
        this.logger.warn('Counter scan failed, starting from zero', {
          directory: options.directory,
          code: errorCode(error),
          error: errorMessage(error)
        });
      }
      return 0;
    }

    const pattern = counterPattern(options);
    let max = 0;
    for (const name of names) {
      const match = pattern.exec(name);
      if (match) {
        max = Math.max(max, parseInt(match[1], 10));
      }
    }

    this.logger.debug('Counter scan complete', {
      directory: options.directory,
      entries: names.length,
      max
    });

    return max;
  }
}
