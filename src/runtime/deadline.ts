import { TimeoutExceededError } from "../errors.js";
import { runtimeClearTimeout, runtimeSetTimeout } from "./timers.js";

export interface DeadlineOptions<T> {
  /** Driver operation name reported in {@link TimeoutExceededError}. */
  readonly operation: string;
  readonly timeoutMs: number;
  readonly details?: Record<string, unknown>;
  /**
   * Receives a value that arrives after the deadline already fired. Used to
   * release handles returned late by `start` or `restoreState`.
   */
  readonly onLateResult?: (value: T) => void;
}

/**
 * Races a driver call against a hard deadline. The call itself is never
 * interrupted: it is left to finish in the background while the caller
 * observes a {@link TimeoutExceededError}.
 */
export function callWithDeadline<T>(call: () => Promise<T>, options: DeadlineOptions<T>): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    let settled = false;
    const timer = runtimeSetTimeout(() => {
      if (settled) {
        return;
      }
      settled = true;
      reject(new TimeoutExceededError(options.operation, options.timeoutMs, options.details));
    }, options.timeoutMs);

    let pending: Promise<T>;
    try {
      pending = call();
    } catch (error) {
      settled = true;
      runtimeClearTimeout(timer);
      reject(error);
      return;
    }

    pending.then(
      (value) => {
        if (settled) {
          options.onLateResult?.(value);
          return;
        }
        settled = true;
        runtimeClearTimeout(timer);
        resolve(value);
      },
      (error: unknown) => {
        if (settled) {
          // The deadline already reported this call as failed.
          return;
        }
        settled = true;
        runtimeClearTimeout(timer);
        reject(error);
      },
    );
  });
}
