import type { DatabaseDirection, ParsedQuery, QueryMode } from '../interfaces';

import {
  InvalidQueryError,
  QueryFailedError,
  StoreMissingError
} from '../utils/errors';
import { LANG_DIR_KEY, NO_RESULTS } from './constants';
import type { DictStore } from './DictStore';
import { Entry } from './Entry';

export interface QueryTarget {
  direction: DatabaseDirection;
  store: DictStore;
}

type Strategy = (db: DictStore) => Entry[];

/**
 * @description Split the optional `:r:` or `:f:` prefix off a query.
 * The remaining text is lowercased in every mode.
 *
 * @example
 * parseQuery('Haus'); // { mode: 'simple', text: 'haus' }
 * parseQuery(':r:^ha'); // { mode: 'regex', text: '^ha' }
 */
export function parseQuery(raw: string): ParsedQuery {
  const mode = queryMode(raw.slice(0, 3));
  const text = mode === 'simple' ? raw : raw.slice(3);
  return { mode, text: text.toLowerCase() };
}

function queryMode(prefix: string): QueryMode {
  switch (prefix) {
    case ':r:':
      return 'regex';
    case ':f:':
      return 'fulltext';
    default:
      return 'simple';
  }
}

function compile(text: string, flags: string): RegExp {
  try {
    return new RegExp(text, flags);
  } catch (error) {
    throw new InvalidQueryError(
      text,
      error instanceof Error ? error.message : String(error)
    );
  }
}

/**
 * Exact lookup of a single key. O(1) on an open handle.
 */
function simple(text: string): Strategy {
  return (db) => {
    if (text === LANG_DIR_KEY) return [];
    return [Entry.fromSerialized(db.get(text, ''))];
  };
}

/**
 * Keys that match the pattern from their first character on. O(n).
 */
function regex(text: string): Strategy {
  const pattern = compile(text, 'y');

  return (db) => {
    const entries: Entry[] = [];
    for (const [key, value] of db.entries()) {
      if (key === LANG_DIR_KEY) continue;
      pattern.lastIndex = 0;
      if (pattern.test(key)) entries.push(Entry.fromSerialized(value));
    }
    return entries;
  };
}

/**
 * Values containing the pattern anywhere, ignoring case. O(n).
 */
function fulltext(text: string): Strategy {
  const pattern = compile(text, 'i');

  return (db) => {
    const entries: Entry[] = [];
    for (const [key, value] of db.entries()) {
      if (key === LANG_DIR_KEY) continue;
      if (pattern.test(value)) entries.push(Entry.fromSerialized(value));
    }
    return entries;
  };
}

/**
 * @description Resolve a parsed query to its lookup strategy.
 *
 * @throws {InvalidQueryError} If a regex or fulltext pattern does not compile
 */
export function createStrategy(query: ParsedQuery): Strategy {
  switch (query.mode) {
    case 'simple':
      return simple(query.text);
    case 'regex':
      return regex(query.text);
    case 'fulltext':
      return fulltext(query.text);
  }
}

export function formatHeader(label: string): string {
  const rule = '='.repeat(15);
  return `${rule} [ ${label} ] ${rule}`;
}

/**
 * @description Run a query against every target in order and format the
 * results, one section per direction that found something.
 *
 * A failing direction does not stop the others. Once every direction has
 * been tried, failures are reported together through a QueryFailedError;
 * a missing root directory is rethrown as is.
 *
 * @example
 * await executeQuery('haus', false, targets);
 * // =============== [ DE => EN ] ===============
 * // Haus:
 * //     - house
 */
export async function executeQuery(
  rawQuery: string,
  compact: boolean,
  targets: QueryTarget[]
): Promise<string> {
  const strategy = createStrategy(parseQuery(rawQuery));
  const sections: string[] = [];
  const failures: { direction: string; error: Error }[] = [];

  for (const { direction, store } of targets) {
    try {
      const section = await store.use((db) => {
        const formatted = strategy(db)
          .map((entry) => entry.format(compact))
          .filter((text) => text.length > 0);
        if (formatted.length === 0) return null;

        const label = db.get(LANG_DIR_KEY, '') || direction.label;
        return [formatHeader(label), ...formatted].join('\n');
      });

      if (section !== null) sections.push(section);
    } catch (error) {
      failures.push({
        direction: direction.id,
        error: error instanceof Error ? error : new Error(String(error))
      });
    }
  }

  const output = sections.length > 0 ? sections.join('\n') : NO_RESULTS;

  if (failures.length > 0) {
    if (failures.every(({ error }) => error instanceof StoreMissingError))
      throw failures[0].error;
    throw new QueryFailedError(failures, output);
  }

  return output;
}
