import type { StatePayload } from "../state/payload.js";

export const ENVIRONMENT_KINDS = ["browser", "notebook", "other"] as const;
export type EnvironmentKind = (typeof ENVIRONMENT_KINDS)[number];

/** Answer of a health probe that completed within its deadline. */
export type HealthVerdict = "healthy" | "unresponsive";

/** Free-form configuration forwarded verbatim to {@link EnvironmentDriver.start}. */
export type DriverConfig = Record<string, unknown>;

/**
 * Capability set every dynamic environment (browser, notebook kernel, ...)
 * implements. The supervisor owns the returned handles and wraps every call
 * in a hard deadline, so implementations may block but never need to time
 * themselves out.
 *
 * - `start` may be retried once when it fails without returning a handle.
 * - `stop` is best effort; a failure means the environment is already gone.
 * - `healthCheck` resolving `"unresponsive"` and rejecting are treated alike.
 */
export interface EnvironmentDriver<THandle = unknown> {
  start(config: DriverConfig): Promise<THandle>;
  stop(handle: THandle): Promise<void>;
  captureState(handle: THandle): Promise<StatePayload>;
  restoreState(payload: StatePayload): Promise<THandle>;
  healthCheck(handle: THandle, timeoutMs: number): Promise<HealthVerdict>;
}

export function isEnvironmentKind(value: unknown): value is EnvironmentKind {
  return ENVIRONMENT_KINDS.some((kind) => kind === value);
}
