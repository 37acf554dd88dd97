import { toError } from '@newscheck/shared/src/utils/errors.js';

export type Result<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: Error };

/**
 * Starts one task per item at once and waits for all of them. Results line up with `items` by
 * index; a rejected task becomes an error result instead of rejecting the join.
 */
export async function settleAll<I, T>(
  items: readonly I[],
  task: (item: I, index: number) => Promise<T>,
): Promise<Result<T>[]> {
  return Promise.all(
    items.map(async (item, index): Promise<Result<T>> => {
      try {
        return { ok: true, value: await task(item, index) };
      } catch (error) {
        return { ok: false, error: toError(error) };
      }
    }),
  );
}
