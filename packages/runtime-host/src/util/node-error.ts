/** Narrow an unknown error to a Node.js errno exception with a specific code. */
export function isNodeError(err: unknown, code: string): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err && err.code === code;
}
