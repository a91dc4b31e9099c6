/**
 * Removes non-nested bracketed spans in a single pass: a span may not contain
 * an opening bracket of its own kind, so `(a (b) c)` loses only `(b)`.
 */
const BRACKETED = /\([^(]*?\)|\{[^{]*?\}|\[[^[]*?\]/g;
const PUNCTUATION = /[.,<>]/g;

/**
 * @description Extract the headword of a phrase: the longest word left once
 * bracketed annotations are removed. Ties go to the word that comes first.
 * Returns an empty string when nothing is left; such phrases are not indexed.
 *
 * @example
 * extractKey('a house'); // 'house'
 * extractKey('to go (away) [coll.]'); // 'to'
 * extractKey('(only) [brackets]'); // ''
 */
export function extractKey(phrase: string): string {
  const words = phrase
    .toLowerCase()
    .replace(BRACKETED, '')
    .replace(PUNCTUATION, ' ')
    .split(/\s+/)
    .filter((word) => word.length > 0);

  let longest = '';
  for (const word of words) if (word.length > longest.length) longest = word;

  return longest;
}
