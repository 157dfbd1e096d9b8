/**
 * Resforge Module Loader — errno helper shared by the file-touching packages.
 */

/** True if `err` is a Node.js errno exception with the given code. */
export function isNodeError(err: unknown, code: string): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err && err.code === code;
}
