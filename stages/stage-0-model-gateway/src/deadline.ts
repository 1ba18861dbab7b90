/**
 * Per-call deadlines. The task gets a signal that aborts on timeout or when the
 * caller's signal aborts; a timeout rejects with DeadlineExceededError even if
 * the task ignores its signal.
 */

export class DeadlineExceededError extends Error {
  readonly timeoutMs: number;

  constructor(options: { message: string; timeoutMs: number }) {
    super(options.message);
    this.name = "DeadlineExceededError";
    this.timeoutMs = options.timeoutMs;
  }
}

export async function withDeadline<T>(
  label: string,
  timeoutMs: number | undefined,
  parentSignal: AbortSignal | undefined,
  task: (signal: AbortSignal | undefined) => Promise<T>
): Promise<T> {
  if (!timeoutMs) {
    return task(parentSignal);
  }

  const controller = new AbortController();
  const onAbort = () => controller.abort(parentSignal?.reason);
  if (parentSignal?.aborted) {
    onAbort();
  } else {
    parentSignal?.addEventListener("abort", onAbort, { once: true });
  }

  let timeoutId: NodeJS.Timeout | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => {
      const error = new DeadlineExceededError({
        message: `${label} exceeded its ${timeoutMs} ms deadline`,
        timeoutMs,
      });
      controller.abort(error);
      reject(error);
    }, timeoutMs);
  });

  try {
    // race subscribes to both, so a task failing after the deadline is not unhandled
    return await Promise.race([task(controller.signal), deadline]);
  } finally {
    clearTimeout(timeoutId);
    parentSignal?.removeEventListener("abort", onAbort);
  }
}
