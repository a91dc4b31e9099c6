import { existsSync } from 'node:fs';
import { rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, test } from 'vitest';

import {
  DictStore,
  Entry,
  FormatError,
  InvalidHeadwordError,
  LANG_DIR_KEY,
  MalformedLineError,
  OfflineDictionary,
  parseDictionary
} from '../src/index';

import { MemoryLogger, createTempDir, fixture } from './helpers';

describe('Importer', () => {
  let testDir: string;
  let databaseDirectory: string;
  let logger: MemoryLogger;
  let dictionary: OfflineDictionary;

  const readStore = (identity: string) =>
    new DictStore(identity, { databaseDirectory, mode: 'query', logger }).use(
      (db) => new Map(db.entries())
    );

  beforeEach(async () => {
    testDir = await createTempDir();
    databaseDirectory = join(testDir, 'store');
    logger = new MemoryLogger();
    dictionary = new OfflineDictionary({ databaseDirectory, logger });
  });

  afterEach(async () => {
    if (existsSync(testDir)) await rm(testDir, { recursive: true, force: true });
  });

  describe('Parsing', () => {
    test('It should read the language pair from the header', async () => {
      const parsed = await parseDictionary(fixture('de-en.txt'));

      expect(parsed.source).toBe('DE');
      expect(parsed.target).toBe('EN');
    });

    test('It should key the forward dictionary by the source headword', async () => {
      const parsed = await parseDictionary(fixture('de-en.txt'));

      expect(Array.from(parsed.forward.keys())).toEqual([
        'haus',
        'laufen',
        'rennen',
        'lauf'
      ]);
      expect(parsed.forward.get('haus')?.translations('Haus {n}')).toEqual([
        'house'
      ]);
    });

    test('It should key the reverse dictionary by the target headword', async () => {
      const parsed = await parseDictionary(fixture('de-en.txt'));

      expect(Array.from(parsed.reverse.keys())).toEqual([
        'house',
        'run',
        'brackets'
      ]);
      expect(parsed.reverse.get('run')?.serialize()).toBe(
        'to run=<>laufen:<>:rennen#<>#run=<>Lauf {m}'
      );
    });

    test('It should accept blank lines before the header', async () => {
      const parsed = await parseDictionary(fixture('en-fr.txt'));

      expect(parsed.source).toBe('EN');
      expect(parsed.target).toBe('FR');
      expect(Array.from(parsed.forward.keys())).toEqual(['house']);
    });

    test('It should reject input without the vocabulary header', async () => {
      const path = fixture('no-header.txt');

      await expect(parseDictionary(path)).rejects.toThrow(FormatError);
      await expect(parseDictionary(path)).rejects.toThrow(
        `"${path}" is not a dict.cc database`
      );
    });

    test('It should reject an empty file', async () => {
      const path = join(testDir, 'empty.txt');
      await writeFile(path, '');

      await expect(parseDictionary(path)).rejects.toThrow(FormatError);
    });

    test('It should report the line and field count of a malformed record', async () => {
      const error = await parseDictionary(fixture('malformed.txt')).catch(
        (caught: unknown) => caught
      );

      expect(error).toBeInstanceOf(MalformedLineError);
      if (!(error instanceof MalformedLineError)) return;
      expect(error.lineNumber).toBe(3);
      expect(error.fieldCount).toBe(2);
    });

    test('It should accept CRLF line endings', async () => {
      const path = join(testDir, 'crlf.txt');
      await writeFile(path, '# DE-EN vocabulary database\r\nBaum {m}\ttree\tnoun\r\n');

      const parsed = await parseDictionary(path);

      expect(parsed.forward.get('baum')?.translations('Baum {m}')).toEqual([
        'tree'
      ]);
      expect(parsed.reverse.get('tree')?.translations('tree')).toEqual([
        'Baum {m}'
      ]);
    });
  });

  describe('Writing Stores', () => {
    test('It should return key counts including the language label', async () => {
      const counts = await dictionary.importFile(fixture('de-en.txt'));

      expect(counts).toEqual({ a: 5, b: 4 });
    });

    test('It should store the language label verbatim', async () => {
      await dictionary.importFile(fixture('de-en.txt'));

      const a = await readStore('a');
      const b = await readStore('b');

      expect(a.get(LANG_DIR_KEY)).toBe('DE => EN');
      expect(b.get(LANG_DIR_KEY)).toBe('EN => DE');
    });

    test('It should store every other key as a serialized entry', async () => {
      await dictionary.importFile(fixture('de-en.txt'));

      const a = await readStore('a');
      const b = await readStore('b');

      expect(a.get('haus')).toBe('Haus {n}=<>house');
      expect(a.get('lauf')).toBe('Lauf {m}=<>run');
      expect(a.has('')).toBe(false);
      expect(b.get('brackets')).toBe('only brackets=<>(nur) [Klammern]');
      expect(Entry.fromSerialized(b.get('run') ?? '').phrases()).toEqual([
        'to run',
        'run'
      ]);
    });

    test('It should replace the stores of an earlier import', async () => {
      await dictionary.importFile(fixture('de-en.txt'));
      const counts = await dictionary.importFile(fixture('en-fr.txt'));

      expect(counts).toEqual({ a: 2, b: 2 });
      expect(await dictionary.size('a')).toBe(2);
      expect(await dictionary.size('b')).toBe(2);
      expect(await dictionary.header('a')).toBe('EN => FR');
    });

    test('It should not create stores when the header is missing', async () => {
      await expect(
        dictionary.importFile(fixture('no-header.txt'))
      ).rejects.toThrow(FormatError);

      expect(existsSync(databaseDirectory)).toBe(false);
    });

    test('It should not create stores when a line is malformed', async () => {
      await expect(
        dictionary.importFile(fixture('malformed.txt'))
      ).rejects.toThrow(MalformedLineError);

      expect(existsSync(join(databaseDirectory, 'dict_a.db'))).toBe(false);
      expect(existsSync(join(databaseDirectory, 'dict_b.db'))).toBe(false);
    });

    test('It should leave an earlier import intact when a later one fails', async () => {
      await dictionary.importFile(fixture('de-en.txt'));

      await expect(
        dictionary.importFile(fixture('malformed.txt'))
      ).rejects.toThrow(MalformedLineError);

      expect(await dictionary.size('a')).toBe(5);
      expect(await dictionary.header('b')).toBe('EN => DE');
    });

    test('It should import headwords longer than 1024 characters', async () => {
      const word = 'x'.repeat(1100);
      const path = join(testDir, 'long.txt');
      await writeFile(
        path,
        `# DE-EN vocabulary database\nHaus {n}\thouse\tnoun\n${word}\tlong\tnoun\n`
      );

      const counts = await dictionary.importFile(path);

      expect(counts).toEqual({ a: 3, b: 3 });
      expect((await readStore('a')).get(word)).toBe(`${word}=<>long`);
    });

    test('It should leave both stores intact when a headword cannot be stored', async () => {
      await dictionary.importFile(fixture('de-en.txt'));
      const path = join(testDir, 'null-byte.txt');
      await writeFile(
        path,
        '# DE-EN vocabulary database\nBaum {m}\ttree\tnoun\nab\0cd\tbroken\tnoun\n'
      );

      await expect(dictionary.importFile(path)).rejects.toThrow(
        InvalidHeadwordError
      );

      expect(await dictionary.size('a')).toBe(5);
      expect(await dictionary.size('b')).toBe(4);
      expect((await readStore('a')).has('baum')).toBe(false);
    });
  });
});
