import { NotFoundError, errorMessage } from './errors.js';

/** Per-entity outcome of a batch fetch. A failed entity never aborts the batch. */

export interface FetchFailure {
  kind: 'not_found' | 'upstream';
  message: string;
}

export type FetchResult<T> =
  | { ok: true; id: string; value: T }
  | { ok: false; id: string; error: FetchFailure };

export interface Partitioned<T> {
  resolved: T[];
  skipped: { id: string; reason: string }[];
}

/** Fetch every id concurrently. Results keep the order of `ids`. */
export async function fetchAll<T>(
  ids: string[],
  fetcher: (id: string) => Promise<T>,
): Promise<FetchResult<T>[]> {
  const settled = await Promise.allSettled(ids.map((id) => fetcher(id)));

  return settled.map((outcome, i): FetchResult<T> => {
    const id = ids[i];
    if (outcome.status === 'fulfilled') {
      return { ok: true, id, value: outcome.value };
    }
    return {
      ok: false,
      id,
      error: {
        kind: outcome.reason instanceof NotFoundError ? 'not_found' : 'upstream',
        message: errorMessage(outcome.reason),
      },
    };
  });
}

export function partitionResults<T>(results: FetchResult<T>[]): Partitioned<T> {
  const resolved: T[] = [];
  const skipped: { id: string; reason: string }[] = [];

  for (const result of results) {
    if (result.ok) {
      resolved.push(result.value);
    } else {
      skipped.push({ id: result.id, reason: result.error.message });
    }
  }

  return { resolved, skipped };
}
