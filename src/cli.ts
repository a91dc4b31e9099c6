import { createInterface } from 'node:readline';

import type { Logger, QueryMode } from './interfaces';

import { VERSION } from './domain/constants';
import { OfflineDictionary } from './domain/OfflineDictionary';
import { QueryFailedError } from './utils/errors';
import { createLogger } from './utils/logger';

/**
 * Parsed CLI flags from command line arguments
 */
export interface ParsedFlags {
  /** Root directory of the stores (overrides ~/.dictcc) */
  directory?: string;
  /** dict.cc file to import */
  importPath?: string;
  compact: boolean;
  size: boolean;
  help: boolean;
  version: boolean;
  verbose: boolean;
  kind: QueryMode;
  /** Remaining positional arguments */
  queries: string[];
}

export const HELP = `dictcc - offline dict.cc dictionary lookup

Usage:
  dictcc [-d PATH] [-i DICTCC_FILE]
  dictcc [-d PATH] [-v] [-S] [-h]
  dictcc [-d PATH] [-c] [-s | -r | -f] QUERY...

Database building options:
  -i, --import FILE    Import a dict.cc vocabulary file

Format options:
  -c, --compact        Use compact output format

Misc options:
  -v, --version        Show version
  -S, --size           Show the number of entries in the databases
  -d, --directory PATH Use PATH instead of ~/.dictcc
      --verbose        Show debug messages
  -h, --help           Show this help message and exit

Query options:
  -s, --simple         Translate the word given as QUERY (default)
  -r, --regexp         Translate all the words matching the regexp QUERY
  -f, --fulltext       Translate all sentences matching the regexp QUERY
  --                   Treat every following argument as a QUERY (e.g. -- -ism)

Without a QUERY an interactive session is started.`;

/**
 * @description Parse CLI flags. Throws on unknown flags, missing flag
 * arguments and conflicting query options.
 */
export function parseFlags(args: string[]): ParsedFlags {
  const flags: ParsedFlags = {
    compact: false,
    size: false,
    help: false,
    version: false,
    verbose: false,
    kind: 'simple',
    queries: []
  };
  const kinds = new Set<QueryMode>();

  const value = (index: number, flag: string): string => {
    const next = args[index];
    if (next === undefined || next.startsWith('-'))
      throw new Error(`${flag} requires an argument`);
    return next;
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === '--help' || arg === '-h') flags.help = true;
    else if (arg === '--version' || arg === '-v') flags.version = true;
    else if (arg === '--verbose') flags.verbose = true;
    else if (arg === '--compact' || arg === '-c') flags.compact = true;
    else if (arg === '--size' || arg === '-S') flags.size = true;
    else if (arg === '--simple' || arg === '-s') kinds.add('simple');
    else if (arg === '--regexp' || arg === '-r') kinds.add('regex');
    else if (arg === '--fulltext' || arg === '-f') kinds.add('fulltext');
    else if (arg === '--import' || arg === '-i')
      flags.importPath = value(++i, arg);
    else if (arg === '--directory' || arg === '-d')
      flags.directory = value(++i, arg);
    else if (arg === '--') {
      flags.queries.push(...args.slice(i + 1));
      break;
    } else if (arg.startsWith('-') && arg.length > 1)
      throw new Error(`Unknown option: ${arg}`);
    else flags.queries.push(arg);
  }

  if (kinds.size > 1)
    throw new Error('Options -s, -r and -f are mutually exclusive');
  for (const kind of kinds) flags.kind = kind;

  return flags;
}

/**
 * @description Turn a command line query into an engine query string.
 */
export function toQuery(query: string, kind: QueryMode): string {
  switch (kind) {
    case 'regex':
      return `:r:${query}`;
    case 'fulltext':
      return `:f:${query}`;
    case 'simple':
      return query;
  }
}

export interface CliOptions {
  logger?: Logger;
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
}

/**
 * @description Interactive mode for repeated queries; ends at end of input.
 */
async function interactive(
  dictionary: OfflineDictionary,
  compact: boolean,
  logger: Logger,
  input: NodeJS.ReadableStream,
  output: NodeJS.WritableStream
): Promise<void> {
  logger.info(
    'Welcome to the interactive mode: You can type queries here.\n' +
      'Prefix your query with `:r:` to issue a regular expression query and ' +
      'with `:f:` for a fulltext query.\n' +
      'Enter C-d (Ctrl + d) to exit.'
  );

  const lines = createInterface({ input, terminal: false });
  output.write('=> ');

  for await (const line of lines) {
    const query = line.trim();
    if (query) {
      try {
        logger.info(await dictionary.execute(query, compact));
      } catch (error) {
        if (error instanceof QueryFailedError) logger.info(error.partialOutput);
        logger.error(error instanceof Error ? error.message : String(error));
      }
    }
    output.write('=> ');
  }
  output.write('\n');
}

/**
 * @description Run the CLI and return its exit code.
 *
 * @example
 * process.exitCode = await run(['-c', 'haus']);
 */
export async function run(
  args: string[],
  options: CliOptions = {}
): Promise<number> {
  const errorLogger = options.logger ?? createLogger();

  let flags: ParsedFlags;
  try {
    flags = parseFlags(args);
  } catch (error) {
    errorLogger.error(error instanceof Error ? error.message : String(error));
    errorLogger.error('See --help for information.');
    return 1;
  }

  const logger = options.logger ?? createLogger({ verbose: flags.verbose });

  if (flags.help) {
    logger.info(HELP);
    return 0;
  }

  if (flags.version) {
    logger.info(`dictcc ${VERSION}`);
    return 0;
  }

  try {
    const dictionary = new OfflineDictionary({
      databaseDirectory: flags.directory,
      logger
    });

    if (flags.size) {
      for (const { label, size } of await dictionary.stats())
        logger.info(`${label}: ${size} entries`);
    } else if (flags.importPath) {
      logger.info(`Importing from "${flags.importPath}"`);
      const counts = await dictionary.importFile(flags.importPath);
      logger.info(
        `Imported ${counts.a} (A => B) and ${counts.b} (B => A) entries`
      );
    } else if (flags.queries.length > 0) {
      for (const query of flags.queries)
        logger.info(
          await dictionary.execute(toQuery(query, flags.kind), flags.compact)
        );
    } else {
      await interactive(
        dictionary,
        flags.compact,
        logger,
        options.input ?? process.stdin,
        options.output ?? process.stdout
      );
    }

    return 0;
  } catch (error) {
    if (error instanceof QueryFailedError) logger.info(error.partialOutput);
    logger.error(error instanceof Error ? error.message : String(error));
    return 1;
  }
}
