import { existsSync, mkdirSync } from 'node:fs';
import { readFile, writeFile, rename, unlink, open } from 'node:fs/promises';
import { join } from 'node:path';
import { TextDecoder } from 'node:util';

import type { Logger, StoreMode, StoreOptions } from '../interfaces';

import {
  DecodeError,
  NotFoundError,
  StoreClosedError,
  StoreMissingError
} from '../utils/errors';
import { createLogger } from '../utils/logger';
import {
  validateIdentity,
  validateKey,
  validateValue
} from '../utils/validation';

const FILE_SCHEME = (identity: string) => `dict_${identity}.db`;

/**
 * @description DictStore is a file-backed string key-value store holding one
 * translation direction.
 *
 * The handle is reference counted: nested `acquire()`/`release()` pairs (or
 * nested `use()` calls) on the same instance share one loaded table, and only
 * the outermost release writes pending changes and drops the table.
 *
 * Concurrent writers to the same store file (from several processes) are not
 * supported.
 *
 * @example
 * const store = new DictStore('a', { databaseDirectory: './data', mode: 'import' });
 * await store.use(async (db) => {
 *   db.set('haus', 'house=<>Haus');
 * });
 *
 * @example
 * const store = new DictStore('a', { databaseDirectory: './data', mode: 'query' });
 * const value = await store.use(async (db) => db.get('haus', ''));
 */
export class DictStore {
  readonly identity: string;
  readonly path: string;
  private readonly databaseDirectory: string;
  private readonly mode: StoreMode;
  private readonly useFsync: boolean;
  private readonly logger: Logger;
  private table: Map<string, string> | null = null;
  private opening: Promise<Map<string, string>> | null = null;
  private accessors = 0;
  private dirty = false;
  private discard = false;

  constructor(identity: string, options: StoreOptions) {
    validateIdentity(identity);

    this.identity = identity;
    this.databaseDirectory = options.databaseDirectory;
    this.mode = options.mode;
    this.useFsync = options.durableWrites ?? false;
    this.logger = options.logger ?? createLogger();
    this.path = join(this.databaseDirectory, FILE_SCHEME(identity));
  }

  /**
   * @description Open the store, or join an already open handle.
   * Only the first acquisition touches the disk; acquisitions that overlap
   * it wait for the same load.
   */
  async acquire(): Promise<this> {
    this.accessors++;

    try {
      this.opening ??= this.openTable();
      this.table = await this.opening;
    } catch (error) {
      this.accessors--;
      if (this.accessors === 0) this.opening = null;
      throw error;
    }

    return this;
  }

  /**
   * @description Leave the handle. The last release persists pending writes
   * and closes the store, unless some holder released with `commit: false`.
   */
  async release(options: { commit?: boolean } = {}): Promise<void> {
    if (this.accessors === 0) throw new StoreClosedError(this.identity);

    if (options.commit === false) this.discard = true;

    this.accessors--;
    if (this.accessors > 0) return;

    const commit = this.dirty && !this.discard;
    this.dirty = false;
    this.discard = false;

    try {
      if (commit) await this.persistTable();
    } finally {
      // Another holder may have joined while the table was being written.
      if (this.accessors === 0) {
        this.table = null;
        this.opening = null;
      }
    }
  }

  /**
   * @description Run `fn` with the store acquired; it is released on every
   * exit path. When `fn` throws, pending writes are dropped instead of
   * persisted.
   *
   * @example
   * const size = await store.use(async (db) => db.size());
   */
  async use<T>(fn: (store: this) => T | Promise<T>): Promise<T> {
    await this.acquire();

    let result: T;
    try {
      result = await fn(this);
    } catch (error) {
      await this.release({ commit: false });
      throw error;
    }

    await this.release();
    return result;
  }

  isOpen(): boolean {
    return this.accessors > 0;
  }

  /**
   * @description Read the value stored under `key`.
   *
   * @throws {NotFoundError} If the key is absent and no fallback was given
   *
   * @example
   * db.get('haus'); // throws NotFoundError when missing
   * db.get('haus', ''); // '' when missing
   */
  get(key: string): string;
  get<T>(key: string, fallback: T): string | T;
  get<T>(key: string, ...fallback: [] | [T]): string | T {
    const value = this.openedTable().get(key);
    if (value !== undefined) return value;

    if (fallback.length === 1) return fallback[0];
    throw new NotFoundError(key);
  }

  /**
   * @description Insert or overwrite a key. Written to disk on the last release.
   */
  set(key: string, value: string): void {
    validateKey(key);
    validateValue(value);

    this.openedTable().set(key, value);
    this.dirty = true;
  }

  /**
   * @description Iterate over every stored `[key, value]` pair. No order is promised.
   */
  *entries(): IterableIterator<[string, string]> {
    yield* this.openedTable().entries();
  }

  /**
   * @description Count the stored keys by iterating over all of them.
   */
  size(): number {
    let size = 0;
    for (const _ of this.entries()) size++;
    return size;
  }

  private openedTable(): Map<string, string> {
    if (!this.table) throw new StoreClosedError(this.identity);
    return this.table;
  }

  /**
   * @description Create or load the table according to the store mode.
   */
  private async openTable(): Promise<Map<string, string>> {
    if (this.mode === 'import') {
      if (!existsSync(this.databaseDirectory))
        mkdirSync(this.databaseDirectory, { recursive: true });

      if (existsSync(this.path))
        this.logger.info(`Will overwrite "${this.path}"`);

      // Import mode always starts from an empty table; the first release writes it.
      this.dirty = true;
      return new Map();
    }

    if (!existsSync(this.databaseDirectory))
      throw new StoreMissingError(this.databaseDirectory);

    if (!existsSync(this.path)) {
      this.logger.warn(`Path "${this.path}" does not exist, treating it as empty.`);
      return new Map();
    }

    const buffer = await readFile(this.path);
    if (buffer.length === 0) return new Map();

    return this.deserializeTable(buffer);
  }

  /**
   * @description Persist the table to disk using atomic writes.
   * Optionally uses fsync for guaranteed durability.
   */
  private async persistTable(): Promise<void> {
    const buffer = this.serializeTable(this.openedTable());
    const tempPath = `${this.path}.tmp.${Date.now()}.${Math.random().toString(36).substring(7)}`;

    try {
      await writeFile(tempPath, buffer);

      if (this.useFsync) {
        const fd = await open(tempPath, 'r+');
        try {
          await fd.sync();
        } finally {
          await fd.close();
        }
      }

      await rename(tempPath, this.path);
    } catch (error) {
      if (existsSync(tempPath)) await unlink(tempPath);
      throw error;
    }
  }

  /**
   * @description Serialize the table as a UTF-8 JSON array of [key, value] pairs.
   */
  private serializeTable(table: Map<string, string>): Buffer {
    return Buffer.from(JSON.stringify(Array.from(table.entries())), 'utf8');
  }

  /**
   * @description Deserialize disk data back to a table.
   * Invalid UTF-8 is rejected instead of being replaced.
   */
  private deserializeTable(buffer: Buffer): Map<string, string> {
    let text: string;
    try {
      text = new TextDecoder('utf-8', { fatal: true }).decode(buffer);
    } catch (error) {
      throw new DecodeError(
        `Store "${this.path}" is not valid UTF-8: ${error instanceof Error ? error.message : String(error)}`
      );
    }

    let data: unknown;
    try {
      data = JSON.parse(text);
    } catch (error) {
      throw new DecodeError(
        `Store "${this.path}" is not valid JSON: ${error instanceof Error ? error.message : String(error)}`
      );
    }

    if (!Array.isArray(data))
      throw new DecodeError(`Store "${this.path}" does not hold a list of records`);

    const table = new Map<string, string>();
    for (const record of data) {
      if (!isStringPair(record))
        throw new DecodeError(
          `Store "${this.path}" holds a record that is not a [key, value] string pair`
        );
      table.set(record[0], record[1]);
    }

    return table;
  }
}

function isStringPair(record: unknown): record is [string, string] {
  return (
    Array.isArray(record) &&
    record.length === 2 &&
    typeof record[0] === 'string' &&
    typeof record[1] === 'string'
  );
}
