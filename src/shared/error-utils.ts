/**
 * Helpers for values caught as `unknown`.
 */

export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Wraps non-Error throwables so they can travel as a `cause` */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
