/**
 * Error helpers
 */

/** Extract a message from an unknown thrown value */
export function getErrorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (typeof err === 'string') return err;
  return String(err);
}
