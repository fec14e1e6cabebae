import { TimeoutError } from "../errors.js";

/**
 * Runs `task` and rejects with `TimeoutError` if it has not settled after
 * `timeoutMs`. The signal handed to `task` is aborted on timeout so callers
 * that accept one can stop work early.
 */
export async function withTimeout<T>(
  label: string,
  timeoutMs: number,
  task: (signal: AbortSignal) => Promise<T>
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const error = new TimeoutError(label, timeoutMs);
      reject(error);
      controller.abort(error);
    }, timeoutMs);
  });

  try {
    return await Promise.race([task(controller.signal), timeout]);
  } finally {
    clearTimeout(timer);
  }
}
