import { AsyncLocalStorage } from "node:async_hooks";

/** Correlation data attached to every log entry emitted inside a supervision task. */
export interface SessionContext {
  readonly sessionId: string;
  /** Supervision task currently running for the session (probe, recovery, capture, ...). */
  readonly task: string;
}

const storage = new AsyncLocalStorage<SessionContext>();

/**
 * Runs {@link callback} with the provided session context exposed through
 * AsyncLocalStorage so nested helpers (drivers, store, logger) can correlate
 * their output without threading the identifier by hand.
 */
export function runWithSessionContext<T>(context: SessionContext, callback: () => T): T {
  return storage.run(context, callback);
}

/** Retrieves the session context associated with the current async execution. */
export function getSessionContext(): SessionContext | undefined {
  return storage.getStore();
}
