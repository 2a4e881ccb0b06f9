import { toApiError } from './taxonomy';
import type { ApiError } from './taxonomy';

export type RequestOutcome<T> = { ok: true; value: T } | { ok: false; error: ApiError };

/** Resolves a request into a value-or-error instead of a rejection. */
export async function settle<T>(request: Promise<T>): Promise<RequestOutcome<T>> {
  try {
    return { ok: true, value: await request };
  } catch (error) {
    return { ok: false, error: toApiError(error) };
  }
}
