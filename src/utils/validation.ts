/**
 * @description Validates a store identity, which becomes part of a file name,
 * to prevent directory traversal and other filesystem issues.
 */
export function validateIdentity(identity: string): void {
  if (!identity || typeof identity !== 'string')
    throw new Error('Store identity must be a non-empty string');

  if (identity.length > 200)
    throw new Error('Store identity must not exceed 200 characters');

  if (identity.includes('/') || identity.includes('\\'))
    throw new Error('Store identity must not contain path separators');

  if (identity.includes('..'))
    throw new Error('Store identity must not contain ".."');

  if (identity.startsWith('.'))
    throw new Error('Store identity must not start with "."');

  if (identity.includes('\0'))
    throw new Error('Store identity must not contain null bytes');

  const reservedNames = ['CON', 'PRN', 'AUX', 'NUL'];
  if (reservedNames.includes(identity.toUpperCase()))
    throw new Error(
      `Store identity "${identity}" is reserved by the filesystem`
    );
}

/**
 * @description Validates key to ensure it's a valid string.
 */
export function validateKey(key: string): void {
  if (key === undefined || key === null) throw new Error('Key must be defined');

  if (typeof key !== 'string') throw new Error('Key must be a string');

  if (key.length === 0) throw new Error('Key must not be empty');

  if (key.includes('\0')) throw new Error('Key must not contain null bytes');
}

export function validateValue(value: string): void {
  if (typeof value !== 'string') throw new Error('Value must be a string');
}
