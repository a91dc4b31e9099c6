/**
 * Reserved store key holding the plain "SRC => DST" language label.
 */
export const LANG_DIR_KEY = '__dictcc_lang_dir';

export const DEFAULT_DATABASE_DIRECTORY = '~/.dictcc';

export const DEFAULT_DATABASES = [
  { id: 'a', label: 'A => B' },
  { id: 'b', label: 'B => A' }
] as const;

export const NO_RESULTS = 'No results.';

export const VERSION = '1.0.0';
