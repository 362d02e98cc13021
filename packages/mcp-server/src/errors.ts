import axios from 'axios';

/** Prefer the `{ error }` body the server sends over axios' generic message. */
export function describeError(error: unknown): string {
  if (axios.isAxiosError(error)) {
    const body: unknown = error.response?.data;
    if (typeof body === 'object' && body !== null && 'error' in body && typeof body.error === 'string') {
      return body.error;
    }
    return error.message;
  }
  return error instanceof Error ? error.message : String(error);
}
