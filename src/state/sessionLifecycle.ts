/**
 * Session state machine. Health probes move sessions between `running`,
 * `degraded` and `lost`; recovery resolves `lost`; explicit teardown ends any
 * non-terminal state. `failed` records a start that never produced a handle.
 */
export const SESSION_STATES = [
  "starting",
  "running",
  "degraded",
  "lost",
  "terminated",
  "terminal_failure",
  "failed",
] as const;

export type SessionState = (typeof SESSION_STATES)[number];

const ALLOWED_TRANSITIONS: Readonly<Record<SessionState, readonly SessionState[]>> = {
  starting: ["running", "failed", "terminated"],
  running: ["degraded", "terminated"],
  degraded: ["running", "lost", "terminated"],
  lost: ["running", "terminal_failure", "terminated"],
  terminated: [],
  terminal_failure: [],
  failed: [],
};

export function isSessionState(value: unknown): value is SessionState {
  return SESSION_STATES.some((state) => state === value);
}

export function canTransition(from: SessionState, to: SessionState): boolean {
  return ALLOWED_TRANSITIONS[from].includes(to);
}

/** Absorbing states: no transition leaves them. */
export function isTerminalState(state: SessionState): boolean {
  return ALLOWED_TRANSITIONS[state].length === 0;
}

/** States in which the driver is expected to hold live resources. */
export function hasLiveEnvironment(state: SessionState): boolean {
  return state === "running" || state === "degraded";
}
