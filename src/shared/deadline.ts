import { TimeoutError } from "./errors.js";

/**
 * Run an operation under a deadline.
 * On expiry the signal handed to `work` is aborted; the caller still waits
 * for `work` to settle, so nothing outlives its deadline in the background.
 */
export async function withDeadline<T>(
  operation: string,
  timeoutMs: number,
  work: (signal: AbortSignal) => Promise<T>,
): Promise<T> {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), timeoutMs);
  const settled = await work(controller.signal).then(
    (value) => ({ ok: true as const, value }),
    (error: unknown) => ({ ok: false as const, error }),
  );
  clearTimeout(timer);

  if (controller.signal.aborted) throw new TimeoutError(operation, timeoutMs, settled.ok ? undefined : settled.error);
  if (!settled.ok) throw settled.error;
  return settled.value;
}
