import fs from 'fs';
import path from 'path';
import { logger, errorMessage } from '../utils/logger.js';

export type ConfigDocument = Record<string, unknown>;

function isDocument(value: unknown): value is ConfigDocument {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Key/value lookup over a JSON configuration document.
 *
 * One store backs the global scope (config/config.json); every plugin gets
 * its own store over plugins/<name>/config/<name>.json.
 * Missing keys read as `undefined`, never as an error.
 */
export class ConfigStore {
  private document: ConfigDocument;

  constructor(
    readonly filePath: string,
    document: ConfigDocument = {}
  ) {
    this.document = document;
  }

  /**
   * Open an existing document. A file that cannot be read or parsed yields an
   * empty store and a logged configuration error.
   */
  static open(filePath: string): ConfigStore {
    const store = new ConfigStore(filePath);
    store.reload();
    return store;
  }

  /**
   * Open a document, first creating its directory and an empty `{}` file
   * when none exists yet.
   */
  static openOrCreate(filePath: string): ConfigStore {
    if (!fs.existsSync(filePath)) {
      fs.mkdirSync(path.dirname(filePath), { recursive: true });
      fs.writeFileSync(filePath, '{}', 'utf-8');
      logger.debug('Created empty config document', { path: filePath });
    }
    return ConfigStore.open(filePath);
  }

  /**
   * Re-read the backing file
   */
  reload(): void {
    try {
      const parsed = JSON.parse(fs.readFileSync(this.filePath, 'utf-8')) as unknown;
      if (!isDocument(parsed)) {
        throw new Error('top-level value must be an object');
      }
      this.document = parsed;
    } catch (error) {
      logger.error('Failed to read config document', {
        path: this.filePath,
        error: errorMessage(error),
      });
      this.document = {};
    }
  }

  /**
   * Value at the given key path, or `undefined` when any key is absent
   * @example store.get('database', 'timeout')
   */
  get(...keys: string[]): unknown {
    let current: unknown = this.document;
    for (const key of keys) {
      if (!isDocument(current) || !Object.prototype.hasOwnProperty.call(current, key)) {
        return undefined;
      }
      current = current[key];
    }
    return current;
  }

  /**
   * Shallow copy of the whole document
   */
  snapshot(): ConfigDocument {
    return { ...this.document };
  }
}
