/**
 * The `code` of a Node system error
 *
 * Checked structurally: errors raised by Node core are not `instanceof Error`
 * when the caller runs in another realm, such as a Jest test context.
 */
export function errnoCode(error: unknown): string | undefined {
  if (typeof error !== 'object' || error === null || !('code' in error)) {
    return undefined;
  }
  return typeof error.code === 'string' ? error.code : undefined;
}

/**
 * The message of anything thrown, for logs only
 */
export function errorText(error: unknown): string {
  if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
    return error.message;
  }
  return String(error);
}
