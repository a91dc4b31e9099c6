import type { Logger } from './Logger';

export type { Logger };

/**
 * @description How a store is opened.
 *
 * - `import`: the root directory is created if needed and the store starts
 *   out empty, replacing whatever was stored under the same identity.
 * - `query`: the root directory must exist; the stored records are loaded.
 */
export type StoreMode = 'import' | 'query';

/**
 * Options for a single key-value store.
 */
export interface StoreOptions {
  databaseDirectory: string;
  mode: StoreMode;
  /**
   * Force writes to physical storage before the handle is released.
   *
   * @default false
   */
  durableWrites?: boolean;
  logger?: Logger;
}

/**
 * A translation direction and the label shown when the store carries no
 * language header of its own.
 */
export interface DatabaseDirection {
  id: string;
  label: string;
}

/**
 * Configuration options for OfflineDictionary.
 *
 * @example
 * // Defaults: ~/.dictcc with directions "a" (A => B) and "b" (B => A)
 * const options = {};
 *
 * @example
 * const options = {
 *   databaseDirectory: './data',
 *   durableWrites: true
 * };
 */
export interface DictionaryOptions {
  databaseDirectory?: string;
  databases?: DatabaseDirection[];
  durableWrites?: boolean;
  logger?: Logger;
}

/**
 * Fully resolved configuration, as held by OfflineDictionary.
 */
export interface ResolvedDictionaryOptions {
  databaseDirectory: string;
  databases: DatabaseDirection[];
  durableWrites: boolean;
  logger: Logger;
}

export type QueryMode = 'simple' | 'regex' | 'fulltext';

export interface ParsedQuery {
  mode: QueryMode;
  text: string;
}

/**
 * Number of distinct keys written per direction, metadata key included.
 */
export interface ImportResult {
  a: number;
  b: number;
}
