import { ApiError } from '../api/client.js';

export const GENERIC_ERROR = 'An error occurred';

/** Most specific message available for a failed call. */
export function errorMessage(err: unknown): string {
  if (err instanceof ApiError && err.message) return err.message;
  if (err instanceof Error && err.message) return err.message;
  if (typeof err === 'string' && err) return err;
  return GENERIC_ERROR;
}
