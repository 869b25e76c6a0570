export type Settled<T> = { ok: true; value: T } | { ok: false; error: Error };

/**
 * Run a task and hand back its outcome as a value, so callers branch on
 * `ok` instead of wrapping every call site in try/catch.
 */
export async function settle<T>(task: () => Promise<T>): Promise<Settled<T>> {
  try {
    return { ok: true, value: await task() };
  } catch (e) {
    return { ok: false, error: e instanceof Error ? e : new Error(String(e)) };
  }
}
