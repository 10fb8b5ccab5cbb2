/**
 * Outcome for hosts that prefer a value over a thrown {@link KestrelError}.
 */
export type Result<T, E> = { readonly ok: true; readonly value: T } | { readonly ok: false; readonly error: E };

/** Runs `fn`, capturing errors accepted by `isError` as a failed result. */
export function attempt<T, E>(
  fn: () => T,
  isError: (e: unknown) => e is E
): Result<T, E> {
  try {
    return { ok: true, value: fn() };
  } catch (e) {
    if (isError(e)) return { ok: false, error: e };
    throw e;
  }
}
