/** Narrow an unknown throw to a Node errno error carrying `code` */
export function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}

export function hasErrorCode(err: unknown, code: string): boolean {
  return isErrnoException(err) && err.code === code;
}
