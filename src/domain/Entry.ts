import { DecodeError } from '../utils/errors';

export const PHRASE_SEPARATOR = '#<>#';
export const TRANSLATIONS_SEPARATOR = '=<>';
export const TRANSLATION_SEPARATOR = ':<>:';

/**
 * @description An Entry collects every phrase, and the translations of each
 * phrase, that share one headword.
 *
 * Stored format: phrases are separated by `#<>#`, a phrase from its
 * translations by `=<>` and translations from each other by `:<>:`.
 * The separators are not escaped, so phrases and translations containing
 * one of them cannot be stored faithfully.
 *
 * @example
 * const entry = new Entry();
 * entry.add('to run', 'laufen');
 * entry.add('to run', 'rennen');
 * entry.serialize(); // 'to run=<>laufen:<>:rennen'
 */
export class Entry {
  private readonly dictionary: Map<string, string[]> = new Map();

  /**
   * @description Rebuild an Entry from its stored form.
   * The empty string yields an Entry without phrases.
   *
   * @throws {DecodeError} If a phrase group lacks its `=<>` separator
   */
  static fromSerialized(serialized: string): Entry {
    const entry = new Entry();
    if (!serialized) return entry;

    for (const group of serialized.split(PHRASE_SEPARATOR)) {
      const parts = group.split(TRANSLATIONS_SEPARATOR);
      if (parts.length !== 2)
        throw new DecodeError(
          `Malformed phrase group "${group}": expected exactly one "${TRANSLATIONS_SEPARATOR}"`
        );

      const [phrase, translations] = parts;
      entry.dictionary.set(phrase, translations.split(TRANSLATION_SEPARATOR));
    }

    return entry;
  }

  /**
   * @description Add a phrase and one of its translations. Both are trimmed.
   */
  add(phrase: string, translation: string): void {
    const key = phrase.trim();
    const translations = this.dictionary.get(key);

    if (translations) translations.push(translation.trim());
    else this.dictionary.set(key, [translation.trim()]);
  }

  get size(): number {
    return this.dictionary.size;
  }

  isEmpty(): boolean {
    return this.dictionary.size === 0;
  }

  phrases(): string[] {
    return Array.from(this.dictionary.keys());
  }

  translations(phrase: string): string[] {
    return [...(this.dictionary.get(phrase) ?? [])];
  }

  /**
   * @description Render the entry for output, one phrase per line (compact)
   * or one translation per line.
   *
   * @example
   * entry.format(true);  // '- to run: laufen / rennen'
   * entry.format(false); // 'to run:\n    - laufen\n    - rennen'
   */
  format(compact = false): string {
    return Array.from(this.dictionary.entries())
      .map(([phrase, translations]) =>
        compact
          ? `- ${phrase}: ${translations.join(' / ')}`
          : `${phrase}:\n    - ${translations.join('\n    - ')}`
      )
      .join('\n');
  }

  serialize(): string {
    return Array.from(this.dictionary.entries())
      .map(
        ([phrase, translations]) =>
          `${phrase}${TRANSLATIONS_SEPARATOR}${translations.join(TRANSLATION_SEPARATOR)}`
      )
      .join(PHRASE_SEPARATOR);
  }
}
