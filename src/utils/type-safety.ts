/**
 * @fileoverview Type-level helpers.
 *
 * @module utils/type-safety
 */

/**
 * Exhaustiveness check for switch statements over unions.
 * Throws if reached at runtime with a value the types ruled out.
 */
export function assertNever(value: never, message?: string): never {
  throw new Error(message ?? `Unexpected value: ${String(value)}`);
}

/** Narrow an unknown error to a Node.js errno error */
export function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}
