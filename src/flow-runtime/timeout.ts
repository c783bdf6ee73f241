export type TimedResult<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly timedOut: true };

/**
 * Corre a promessa contra um timer. A promessa original não é cancelada:
 * quem chama deve descartar o resultado tardio.
 */
export async function withTimeout<T>(promise: Promise<T>, ms: number): Promise<TimedResult<T>> {
  const waitMs = Math.max(1, Math.floor(ms));
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<TimedResult<T>>((resolve) => {
    timer = setTimeout(() => resolve({ ok: false, timedOut: true }), waitMs);
  });
  try {
    return await Promise.race([promise.then((value): TimedResult<T> => ({ ok: true, value })), timeout]);
  } finally {
    if (timer) {
      clearTimeout(timer);
    }
  }
}
