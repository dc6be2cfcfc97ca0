import { CatalogError, errorMessage } from "./errors";

export type Result<T, E = Error> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function err<E>(error: E): Result<never, E> {
  return { ok: false, error };
}

/**
 * Settle a catalog call into a Result. Rejections that are not already
 * CatalogErrors are wrapped so callers only ever see one error type.
 */
export async function toCatalogResult<T>(
  fn: () => Promise<T>
): Promise<Result<T, CatalogError>> {
  try {
    return ok(await fn());
  } catch (error) {
    if (error instanceof CatalogError) return err(error);
    return err(new CatalogError(errorMessage(error)));
  }
}

/**
 * Concatenate the values of successful results in order.
 * Failures are handed to `onError` and otherwise dropped.
 */
export function concatSuccesses<T, E>(
  results: Result<T[], E>[],
  onError: (error: E, index: number) => void
): T[] {
  const collected: T[] = [];
  results.forEach((result, index) => {
    if (result.ok) {
      collected.push(...result.value);
    } else {
      onError(result.error, index);
    }
  });
  return collected;
}
