/**
 * Error taxonomy shared by the supervision core. Every error exposes a stable
 * machine readable `code`, a short `hint` and structured `details` so the
 * tool layer can serialise failures without inspecting messages.
 */

/** Base class for every failure raised by the supervisor. */
export class SupervisorError extends Error {
  public readonly code: string;
  public readonly hint: string;
  public readonly details: Record<string, unknown>;

  constructor(
    code: string,
    message: string,
    options: { hint: string; details?: Record<string, unknown>; cause?: unknown },
  ) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = "SupervisorError";
    this.code = code;
    this.hint = options.hint;
    this.details = options.details ?? {};
  }
}

/** The driver failed to bring an environment up. */
export class StartupError extends SupervisorError {
  constructor(message: string, details: Record<string, unknown> = {}, cause?: unknown) {
    super("E-START", message, { hint: "inspect the driver configuration and re-create the session", details, cause });
    this.name = "StartupError";
  }
}

/** The driver failed to release an environment. Treated as "already gone". */
export class ShutdownError extends SupervisorError {
  constructor(message: string, details: Record<string, unknown> = {}, cause?: unknown) {
    super("E-STOP", message, { hint: "the environment may need manual cleanup", details, cause });
    this.name = "ShutdownError";
  }
}

export class CaptureError extends SupervisorError {
  constructor(message: string, details: Record<string, unknown> = {}, cause?: unknown) {
    super("E-CAPTURE", message, { hint: "capture requires a running or degraded session", details, cause });
    this.name = "CaptureError";
  }
}

export class RestoreError extends SupervisorError {
  constructor(message: string, details: Record<string, unknown> = {}, cause?: unknown) {
    super("E-RESTORE", message, { hint: "check the referenced snapshot and the driver", details, cause });
    this.name = "RestoreError";
  }
}

export class ProbeError extends SupervisorError {
  constructor(message: string, details: Record<string, unknown> = {}, cause?: unknown) {
    super("E-PROBE", message, { hint: "the environment did not answer its health check", details, cause });
    this.name = "ProbeError";
  }
}

/** Lookup miss in the registry, the snapshot store or the driver table. */
export class NotFoundError extends SupervisorError {
  constructor(resource: "session" | "snapshot" | "driver", id: string) {
    super("E-NOTFOUND", `Unknown ${resource}: ${id}`, {
      hint: `list ${resource}s before retrying`,
      details: { resource, id },
    });
    this.name = "NotFoundError";
  }
}

/** A driver call did not settle before its hard deadline. */
export class TimeoutExceededError extends SupervisorError {
  constructor(operation: string, timeoutMs: number, details: Record<string, unknown> = {}) {
    super("E-TIMEOUT", `${operation} exceeded its ${timeoutMs}ms deadline`, {
      hint: "the driver is hung or the deadline is too tight",
      details: { ...details, operation, timeout_ms: timeoutMs },
    });
    this.name = "TimeoutExceededError";
  }
}

/** Every restore attempt failed; the session is now terminal. */
export class RecoveryExhaustedError extends SupervisorError {
  constructor(sessionId: string, attempts: number, cause?: unknown) {
    const reason = cause instanceof Error ? cause.message : cause === undefined ? "unknown error" : String(cause);
    super("E-RECOVERY-EXHAUSTED", `Recovery of ${sessionId} failed after ${attempts} attempt(s): ${reason}`, {
      hint: "re-create the session to continue",
      details: { session_id: sessionId, attempts },
      cause,
    });
    this.name = "RecoveryExhaustedError";
  }
}

export class InvalidTransitionError extends SupervisorError {
  constructor(sessionId: string, from: string, to: string) {
    super("E-STATE", `Session ${sessionId} cannot move from ${from} to ${to}`, {
      hint: "refresh the session state before retrying",
      details: { session_id: sessionId, from, to },
    });
    this.name = "InvalidTransitionError";
  }
}

/** A stored snapshot file is missing, unreadable or no longer matches its digest. */
export class SnapshotIntegrityError extends SupervisorError {
  constructor(snapshotId: string, reason: string, details: Record<string, unknown> = {}) {
    super("E-SNAPSHOT-CORRUPT", `Snapshot ${snapshotId} is corrupted: ${reason}`, {
      hint: "the snapshot files were modified or truncated outside the supervisor",
      details: { ...details, snapshot_id: snapshotId },
    });
    this.name = "SnapshotIntegrityError";
  }
}

/** Extracts a printable message from any thrown value. */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
