/**
 * Error classes surfaced by the dictionary store.
 * Every error carries a stable `code` so front ends can branch on it.
 */

export class DictionaryError extends Error {
  readonly code: string;

  constructor(message: string, code: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * @description The root directory was never imported into.
 */
export class StoreMissingError extends DictionaryError {
  readonly databaseDirectory: string;

  constructor(databaseDirectory: string) {
    super(
      `There's no "${databaseDirectory}" directory!\nYou have to import a dict.cc database file first.\nSee --help for information.`,
      'STORE_MISSING'
    );
    this.databaseDirectory = databaseDirectory;
  }
}

export class NotFoundError extends DictionaryError {
  readonly key: string;

  constructor(key: string) {
    super(`Key "${key}" not found`, 'NOT_FOUND');
    this.key = key;
  }
}

/**
 * @description The import input lacks the `# XX-YY vocabulary database` header.
 */
export class FormatError extends DictionaryError {
  constructor(path: string) {
    super(`"${path}" is not a dict.cc database`, 'FORMAT_ERROR');
  }
}

export class MalformedLineError extends DictionaryError {
  readonly lineNumber: number;
  readonly fieldCount: number;

  constructor(path: string, lineNumber: number, fieldCount: number) {
    super(
      `Malformed line ${lineNumber} in "${path}": expected 3 tab-separated fields, got ${fieldCount}`,
      'MALFORMED_LINE'
    );
    this.lineNumber = lineNumber;
    this.fieldCount = fieldCount;
  }
}

/**
 * @description A record's headword cannot be stored as a key.
 */
export class InvalidHeadwordError extends DictionaryError {
  readonly lineNumber: number;

  constructor(path: string, lineNumber: number, reason: string) {
    super(
      `Invalid headword on line ${lineNumber} in "${path}": ${reason}`,
      'INVALID_HEADWORD'
    );
    this.lineNumber = lineNumber;
  }
}

/**
 * @description Stored data could not be decoded (invalid UTF-8 or invalid structure).
 */
export class DecodeError extends DictionaryError {
  constructor(message: string) {
    super(message, 'DECODE_ERROR');
  }
}

export class InvalidQueryError extends DictionaryError {
  readonly query: string;

  constructor(query: string, reason: string) {
    super(`Invalid query "${query}": ${reason}`, 'INVALID_QUERY');
    this.query = query;
  }
}

export class StoreClosedError extends DictionaryError {
  constructor(identity: string) {
    super(`Store "${identity}" is not open`, 'STORE_CLOSED');
  }
}

/**
 * @description One or more directions failed during a query.
 * The output of the directions that succeeded is kept in `partialOutput`.
 */
export class QueryFailedError extends DictionaryError {
  readonly failures: { direction: string; error: Error }[];
  readonly partialOutput: string;

  constructor(
    failures: { direction: string; error: Error }[],
    partialOutput: string
  ) {
    super(
      failures
        .map(({ direction, error }) => `Query on "${direction}" failed: ${error.message}`)
        .join('\n'),
      'QUERY_FAILED'
    );
    this.failures = failures;
    this.partialOutput = partialOutput;
  }
}
