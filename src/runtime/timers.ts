/**
 * Timer helpers resolving `setTimeout`/`clearTimeout` from {@link globalThis}
 * at call time instead of capturing them at import time. Sinon fake timers
 * replace the globals after modules are loaded; looking them up lazily keeps
 * the probe loop and the recovery backoff under the test clock.
 */
export type TimeoutHandle = ReturnType<typeof setTimeout>;

/**
 * Schedules {@link callback}. With `unref` the handle does not keep the
 * process alive on its own (used for background probe cadence and deadlines).
 */
export function runtimeSetTimeout(
  callback: () => void,
  delayMs: number,
  options: { unref?: boolean } = {},
): TimeoutHandle {
  const handle = globalThis.setTimeout(callback, delayMs);
  if (options.unref && typeof handle.unref === "function") {
    handle.unref();
  }
  return handle;
}

export function runtimeClearTimeout(handle: TimeoutHandle): void {
  globalThis.clearTimeout(handle);
}

/**
 * Resolves after {@link delayMs}. When {@link signal} aborts first the promise
 * resolves early; callers re-check their cancellation flag afterwards.
 */
export function delay(delayMs: number, signal?: AbortSignal): Promise<void> {
  return new Promise<void>((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = () => {
      runtimeClearTimeout(handle);
      resolve();
    };
    const handle = runtimeSetTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, Math.max(0, delayMs));
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}
