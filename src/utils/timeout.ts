import { CurationError } from "../errors";

/**
 * Runs `task` with an abort signal that fires after `timeoutMs`. The returned promise
 * rejects with RemoteUnavailable on timeout even if the task ignores the signal.
 */
export async function withTimeout<T>(
  label: string,
  timeoutMs: number,
  task: (signal: AbortSignal) => Promise<T>,
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      // settle first so the timeout, not the task's abort error, wins the race
      reject(new CurationError("RemoteUnavailable", `${label} timed out after ${timeoutMs}ms`));
      controller.abort();
    }, timeoutMs);
  });
  try {
    return await Promise.race([task(controller.signal), timeout]);
  } finally {
    if (timer) {
      clearTimeout(timer);
    }
  }
}
