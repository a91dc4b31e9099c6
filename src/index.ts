export { OfflineDictionary, resolveOptions, expandHome } from './domain/OfflineDictionary';
export type { DirectionStats } from './domain/OfflineDictionary';
export { DictStore } from './domain/DictStore';
export { Entry } from './domain/Entry';
export {
  importDictionary,
  parseDictionary,
  writeDictionary
} from './domain/Importer';
export type { ParsedDictionary } from './domain/Importer';
export {
  executeQuery,
  parseQuery,
  createStrategy,
  formatHeader
} from './domain/QueryEngine';
export type { QueryTarget } from './domain/QueryEngine';
export { LANG_DIR_KEY, NO_RESULTS } from './domain/constants';
export { extractKey } from './utils/extractKey';
export {
  ConsoleLogger,
  SilentLogger,
  createLogger,
  createSilentLogger
} from './utils/logger';
export * from './utils/errors';
export type * from './interfaces';
