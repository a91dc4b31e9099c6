import { homedir } from 'node:os';
import { join, resolve } from 'node:path';

import type {
  DatabaseDirection,
  DictionaryOptions,
  ImportResult,
  ResolvedDictionaryOptions,
  StoreMode
} from '../interfaces';

import { createLogger } from '../utils/logger';
import {
  DEFAULT_DATABASE_DIRECTORY,
  DEFAULT_DATABASES,
  LANG_DIR_KEY
} from './constants';
import { DictStore } from './DictStore';
import { importDictionary } from './Importer';
import { executeQuery } from './QueryEngine';

/**
 * @description Expand a leading `~` to the user's home directory.
 */
export function expandHome(path: string): string {
  if (path === '~') return homedir();
  if (path.startsWith('~/')) return join(homedir(), path.slice(2));
  return path;
}

export function resolveOptions(
  options: DictionaryOptions = {}
): ResolvedDictionaryOptions {
  const databases = options.databases ?? DEFAULT_DATABASES.map((db) => ({ ...db }));
  if (databases.length !== 2)
    throw new Error('Exactly two databases (forward and reverse) must be configured');

  return {
    databaseDirectory: resolve(
      expandHome(options.databaseDirectory ?? DEFAULT_DATABASE_DIRECTORY)
    ),
    databases,
    durableWrites: options.durableWrites ?? false,
    logger: options.logger ?? createLogger()
  };
}

export interface DirectionStats {
  id: string;
  label: string;
  size: number;
}

/**
 * @description OfflineDictionary ties a pair of direction stores to one root
 * directory: importing a dict.cc dump into them and querying them.
 *
 * One query-mode store is kept per direction, so nested calls made while a
 * store is open share its handle.
 *
 * @example
 * const dictionary = new OfflineDictionary({ databaseDirectory: './data' });
 * await dictionary.importFile('./de-en.txt');
 * console.log(await dictionary.execute('haus'));
 * console.log(await dictionary.execute(':r:^hau', true));
 */
export class OfflineDictionary {
  readonly options: ResolvedDictionaryOptions;
  private readonly stores: Map<string, DictStore> = new Map();

  constructor(options?: DictionaryOptions) {
    this.options = resolveOptions(options);
  }

  directions(): DatabaseDirection[] {
    return this.options.databases.map((db) => ({ ...db }));
  }

  /**
   * @description Import a dict.cc dump, replacing both direction stores.
   *
   * @returns Keys written per direction, language label included
   */
  async importFile(path: string): Promise<ImportResult> {
    const [forward, reverse] = this.options.databases.map((db) =>
      this.createStore(db.id, 'import')
    );
    return importDictionary(path, { forward, reverse }, this.options.logger);
  }

  /**
   * @description Run a simple, `:r:` regex or `:f:` fulltext query against
   * every direction.
   *
   * @example
   * await dictionary.execute('haus');
   * await dictionary.execute(':f:house', true);
   */
  async execute(query: string, compact = false): Promise<string> {
    const targets = this.options.databases.map((direction) => ({
      direction,
      store: this.store(direction.id)
    }));
    return executeQuery(query, compact, targets);
  }

  /**
   * @description Count every key in a direction, language label included.
   */
  async size(direction: string): Promise<number> {
    return this.store(direction).use((db) => db.size());
  }

  /**
   * @description The stored language label, such as "DE => EN".
   */
  async header(direction: string): Promise<string | undefined> {
    return this.store(direction).use((db) => db.get(LANG_DIR_KEY, undefined));
  }

  /**
   * @description Label and size for every direction, each read under one handle.
   */
  async stats(): Promise<DirectionStats[]> {
    const stats: DirectionStats[] = [];

    for (const { id, label } of this.options.databases) {
      const entry = await this.store(id).use(async () => ({
        id,
        label: (await this.header(id)) || label,
        size: await this.size(id)
      }));
      stats.push(entry);
    }

    return stats;
  }

  private store(direction: string): DictStore {
    const existing = this.stores.get(direction);
    if (existing) return existing;

    if (!this.options.databases.some((db) => db.id === direction))
      throw new Error(
        `Unknown direction "${direction}". Available directions: ${this.options.databases.map((db) => db.id).join(', ')}`
      );

    const store = this.createStore(direction, 'query');
    this.stores.set(direction, store);
    return store;
  }

  private createStore(identity: string, mode: StoreMode): DictStore {
    return new DictStore(identity, {
      databaseDirectory: this.options.databaseDirectory,
      mode,
      durableWrites: this.options.durableWrites,
      logger: this.options.logger
    });
  }
}
