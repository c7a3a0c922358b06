import { join } from 'node:path';
import { InvalidNameError } from '../../../shared/errors/index.js';

export const LOCK_EXTENSION = '.lock';

/** Separators on either platform, plus NUL which no filesystem accepts */
const FORBIDDEN = /[/\\\0]/;

export function validateObjectName(objectName: string): string {
  if (objectName.length === 0) {
    throw new InvalidNameError(objectName, 'name cannot be empty');
  }
  if (FORBIDDEN.test(objectName)) {
    throw new InvalidNameError(objectName, 'path separators are not allowed');
  }
  return objectName;
}

/**
 * Map an object to its lock file: `<directory>/<objectName>.lock`
 * @throws InvalidNameError for an empty directory or an unsafe name
 */
export function resolveLockPath(directory: string, objectName: string): string {
  if (directory.length === 0) {
    throw new InvalidNameError(directory, 'lock directory cannot be empty');
  }
  return join(directory, `${validateObjectName(objectName)}${LOCK_EXTENSION}`);
}
