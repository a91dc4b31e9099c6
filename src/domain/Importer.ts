import { createReadStream } from 'node:fs';
import { createInterface } from 'node:readline';

import type { ImportResult, Logger } from '../interfaces';

import {
  FormatError,
  InvalidHeadwordError,
  MalformedLineError
} from '../utils/errors';
import { extractKey } from '../utils/extractKey';
import { validateKey } from '../utils/validation';
import { LANG_DIR_KEY } from './constants';
import type { DictStore } from './DictStore';
import { Entry } from './Entry';

const HEADER = /^# ([A-Z]{2})-([A-Z]{2}) vocabulary database/;

/**
 * @description A fully parsed dict.cc dump, one dictionary per direction.
 */
export interface ParsedDictionary {
  source: string;
  target: string;
  forward: Map<string, Entry>;
  reverse: Map<string, Entry>;
}

/**
 * @description Parse a dict.cc TSV dump into forward and reverse dictionaries
 * keyed by headword.
 *
 * @throws {FormatError} If the first non-blank line is not a dict.cc header
 * @throws {MalformedLineError} If a record does not have exactly three fields
 * @throws {InvalidHeadwordError} If a headword is not a valid store key
 */
export async function parseDictionary(
  path: string,
  logger?: Logger
): Promise<ParsedDictionary> {
  const input = createReadStream(path, { encoding: 'utf8' });
  const lines = createInterface({ input, crlfDelay: Infinity });

  let header: RegExpMatchArray | null = null;
  const forward = new Map<string, Entry>();
  const reverse = new Map<string, Entry>();
  let lineNumber = 0;

  try {
    for await (const rawLine of lines) {
      lineNumber++;
      const line = lineNumber === 1 ? rawLine.replace(/^\uFEFF/, '') : rawLine;

      if (!header) {
        if (!line.trim()) continue;
        header = line.match(HEADER);
        if (!header) throw new FormatError(path);
        continue;
      }

      if (line.startsWith('#') || !line.trim()) continue;

      const fields = line.split('\t');
      if (fields.length !== 3)
        throw new MalformedLineError(path, lineNumber, fields.length);

      const [phrase, translation] = fields;
      const source = { path, lineNumber };
      addToDictionary(forward, phrase, translation, source, logger);
      addToDictionary(reverse, translation, phrase, source, logger);
    }
  } finally {
    lines.close();
    input.destroy();
  }

  if (!header) throw new FormatError(path);

  return { source: header[1], target: header[2], forward, reverse };
}

function addToDictionary(
  dictionary: Map<string, Entry>,
  phrase: string,
  translation: string,
  source: { path: string; lineNumber: number },
  logger?: Logger
): void {
  const key = extractKey(phrase);
  if (!key) return;

  // Checked here so that nothing is written when a key would be refused later.
  try {
    validateKey(key);
  } catch (error) {
    throw new InvalidHeadwordError(
      source.path,
      source.lineNumber,
      error instanceof Error ? error.message : String(error)
    );
  }

  if (key === LANG_DIR_KEY) {
    logger?.debug(`Skipping phrase "${phrase}": its headword is reserved`);
    return;
  }

  let entry = dictionary.get(key);
  if (!entry) {
    entry = new Entry();
    dictionary.set(key, entry);
  }

  entry.add(phrase, translation);
}

/**
 * @description Write one parsed direction into an import-mode store.
 * The language label is written verbatim, every entry serialized.
 *
 * @returns The number of keys written, language label included
 */
export async function writeDictionary(
  store: DictStore,
  label: string,
  dictionary: Map<string, Entry>
): Promise<number> {
  return store.use((db) => {
    db.set(LANG_DIR_KEY, label);
    for (const [key, entry] of dictionary) db.set(key, entry.serialize());
    return dictionary.size + 1;
  });
}

/**
 * @description Import a dict.cc dump into the forward and reverse stores.
 * Nothing is written unless the whole file parses.
 *
 * @example
 * const counts = await importDictionary('./de-en.txt', { forward, reverse });
 * console.log(`Imported ${counts.a} (A => B) and ${counts.b} (B => A) entries`);
 */
export async function importDictionary(
  path: string,
  stores: { forward: DictStore; reverse: DictStore },
  logger?: Logger
): Promise<ImportResult> {
  const parsed = await parseDictionary(path, logger);
  const { source, target } = parsed;

  logger?.debug(
    `Parsed ${parsed.forward.size} ${source} and ${parsed.reverse.size} ${target} headwords from "${path}"`
  );

  const a = await writeDictionary(
    stores.forward,
    `${source} => ${target}`,
    parsed.forward
  );
  const b = await writeDictionary(
    stores.reverse,
    `${target} => ${source}`,
    parsed.reverse
  );

  return { a, b };
}
