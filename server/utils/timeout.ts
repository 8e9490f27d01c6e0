export class TimeoutError extends Error {
  constructor(readonly timeoutMs: number) {
    super(`Timed out after ${timeoutMs}ms`);
    this.name = "TimeoutError";
  }
}

/**
 * Run `fn` under a deadline.
 *
 * `fn` receives a signal that is aborted when the deadline passes or when
 * `parent` aborts; the returned promise rejects at that moment even if `fn`
 * has not noticed yet. A `timeoutMs` of 0 disables the deadline.
 */
export async function withTimeout<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  parent?: AbortSignal
): Promise<T> {
  if (parent?.aborted) {
    throw parent.reason;
  }

  const controller = new AbortController();
  const onParentAbort = () => controller.abort(parent?.reason);
  parent?.addEventListener("abort", onParentAbort, { once: true });

  const aborted = new Promise<never>((_, reject) => {
    controller.signal.addEventListener(
      "abort",
      () => reject(controller.signal.reason),
      { once: true }
    );
  });

  const timer =
    timeoutMs > 0 ? setTimeout(() => controller.abort(new TimeoutError(timeoutMs)), timeoutMs) : undefined;

  const work = fn(controller.signal);
  // Whichever of the two loses the race settles later with nobody awaiting it.
  void work.catch(() => undefined);
  void aborted.catch(() => undefined);

  try {
    return await Promise.race([work, aborted]);
  } finally {
    if (timer !== undefined) clearTimeout(timer);
    parent?.removeEventListener("abort", onParentAbort);
  }
}
