/**
 * Reject with `onTimeout()` if `fn` has not settled within `timeoutMs`.
 * The underlying work is not cancelled; it keeps running and its result
 * is dropped.
 */
export function withTimeout<T>(
  fn: () => Promise<T>,
  timeoutMs: number,
  onTimeout: () => Error
): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      reject(onTimeout());
    }, timeoutMs);

    fn()
      .then((result) => {
        clearTimeout(timer);
        resolve(result);
      })
      .catch((err: unknown) => {
        clearTimeout(timer);
        reject(err);
      });
  });
}
