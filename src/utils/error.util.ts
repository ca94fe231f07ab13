export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** `code` of a Node system error or a database driver error, if present. */
export function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    return typeof error.code === 'string' ? error.code : undefined;
  }
  return undefined;
}
