import { describeError, RecoveryExhaustedError, RestoreError } from "../errors.js";
import type { KeyedMutex } from "../infra/keyedMutex.js";
import { runWithSessionContext } from "../infra/sessionContext.js";
import { StructuredLogger } from "../logger.js";
import { callWithDeadline } from "../runtime/deadline.js";
import { delay } from "../runtime/timers.js";
import type { SessionRegistry } from "../state/sessionRegistry.js";
import type { SessionState } from "../state/sessionLifecycle.js";
import type { SnapshotStore } from "../state/snapshotStore.js";

export interface RecoveryCoordinatorOptions {
  readonly registry: SessionRegistry;
  readonly store: SnapshotStore;
  readonly locks: KeyedMutex;
  readonly maxAttempts: number;
  readonly backoffMinMs: number;
  readonly backoffMaxMs: number;
  readonly backoffFactor: number;
  readonly adapterTimeoutMs: number;
  /** Waits between attempts. Resolves early when the signal aborts. */
  readonly sleep?: (ms: number, signal: AbortSignal) => Promise<void>;
  readonly logger?: StructuredLogger;
}

export interface RecoveryOutcome {
  readonly sessionId: string;
  readonly recovered: boolean;
  /** Restore attempts actually made. */
  readonly attempts: number;
  /** Session state once the sequence ended. */
  readonly state: SessionState;
  readonly snapshotId: string | null;
  /** True when teardown (or shutdown) interrupted the sequence. */
  readonly cancelled: boolean;
  /** Set when every attempt failed and the session became `terminal_failure`. */
  readonly error: RecoveryExhaustedError | null;
}

type AttemptResult =
  | { readonly kind: "recovered"; readonly snapshotId: string }
  | { readonly kind: "failed"; readonly error: RestoreError }
  | { readonly kind: "cancelled" };

interface InflightRecovery {
  readonly promise: Promise<RecoveryOutcome>;
  readonly controller: AbortController;
}

/**
 * Restores lost sessions from their last snapshot. Each session has at most
 * one sequence in flight; a sequence makes at most `maxAttempts` restore
 * attempts separated by exponential backoff and ends either `running` or
 * `terminal_failure`. The session lock is held for each attempt and released
 * while waiting, so teardown can interleave and cancel the sequence.
 */
export class RecoveryCoordinator {
  private readonly registry: SessionRegistry;
  private readonly store: SnapshotStore;
  private readonly locks: KeyedMutex;
  private readonly maxAttempts: number;
  private readonly backoffMinMs: number;
  private readonly backoffMaxMs: number;
  private readonly backoffFactor: number;
  private readonly adapterTimeoutMs: number;
  private readonly sleep: (ms: number, signal: AbortSignal) => Promise<void>;
  private readonly logger: StructuredLogger;
  private readonly inflight = new Map<string, InflightRecovery>();

  constructor(options: RecoveryCoordinatorOptions) {
    if (!Number.isInteger(options.maxAttempts) || options.maxAttempts < 1) {
      throw new Error("maxAttempts must be a positive integer");
    }
    if (!Number.isFinite(options.backoffFactor) || options.backoffFactor < 1) {
      throw new Error("backoffFactor must be a finite number >= 1");
    }
    this.registry = options.registry;
    this.store = options.store;
    this.locks = options.locks;
    this.maxAttempts = options.maxAttempts;
    this.backoffMinMs = options.backoffMinMs;
    this.backoffMaxMs = Math.max(options.backoffMinMs, options.backoffMaxMs);
    this.backoffFactor = options.backoffFactor;
    this.adapterTimeoutMs = options.adapterTimeoutMs;
    this.sleep = options.sleep ?? delay;
    this.logger = options.logger ?? new StructuredLogger();
  }

  /**
   * Starts (or joins) the recovery sequence of a session. Never rejects:
   * exhaustion is reported through {@link RecoveryOutcome.error}.
   */
  recover(sessionId: string): Promise<RecoveryOutcome> {
    const existing = this.inflight.get(sessionId);
    if (existing) {
      return existing.promise;
    }
    const controller = new AbortController();
    const promise = runWithSessionContext({ sessionId, task: "recovery" }, () =>
      this.runSequence(sessionId, controller.signal),
    ).finally(() => {
      if (this.inflight.get(sessionId)?.controller === controller) {
        this.inflight.delete(sessionId);
      }
    });
    this.inflight.set(sessionId, { promise, controller });
    return promise;
  }

  isRecovering(sessionId: string): boolean {
    return this.inflight.has(sessionId);
  }

  /** Asks the running sequence to stop at its next checkpoint. */
  cancel(sessionId: string): void {
    this.inflight.get(sessionId)?.controller.abort();
  }

  /** Cancels every sequence and waits for all of them to settle. */
  async cancelAll(): Promise<void> {
    const pending = Array.from(this.inflight.values());
    for (const entry of pending) {
      entry.controller.abort();
    }
    await Promise.all(pending.map((entry) => entry.promise));
  }

  /** Wait before attempt `attempt + 1`: `min * factor^(attempt-1)`, capped at `max`. */
  backoffDelay(attempt: number): number {
    const raw = this.backoffMinMs * Math.pow(this.backoffFactor, Math.max(0, attempt - 1));
    return Math.min(this.backoffMaxMs, Math.round(raw));
  }

  private async runSequence(sessionId: string, signal: AbortSignal): Promise<RecoveryOutcome> {
    this.logger.info("recovery_started", { session_id: sessionId, max_attempts: this.maxAttempts });
    let lastError: RestoreError | null = null;
    let attempts = 0;
    try {
      for (let attempt = 1; attempt <= this.maxAttempts; attempt += 1) {
        if (attempt > 1) {
          const waitMs = this.backoffDelay(attempt - 1);
          this.logger.debug("recovery_backoff", { session_id: sessionId, attempt, wait_ms: waitMs });
          await this.sleep(waitMs, signal);
        }
        const result = await this.locks.runExclusive(sessionId, () => this.attempt(sessionId, attempt, signal));
        if (result.kind === "cancelled") {
          return this.finish(sessionId, { attempts, cancelled: true, snapshotId: null, error: null });
        }
        attempts = attempt;
        if (result.kind === "recovered") {
          this.logger.info("recovery_succeeded", { session_id: sessionId, attempts, snapshot_id: result.snapshotId });
          return this.finish(sessionId, { attempts, cancelled: false, snapshotId: result.snapshotId, error: null });
        }
        lastError = result.error;
      }

      return await this.locks.runExclusive(sessionId, async () => {
        const session = this.registry.get(sessionId);
        if (signal.aborted || session.state !== "lost") {
          return this.finish(sessionId, { attempts, cancelled: true, snapshotId: null, error: null });
        }
        const error = new RecoveryExhaustedError(sessionId, attempts, lastError ?? undefined);
        this.registry.transition(sessionId, "terminal_failure", error.message, "recovery_exhausted");
        this.logger.error("recovery_exhausted", { session_id: sessionId, attempts, message: error.message });
        return this.finish(sessionId, { attempts, cancelled: false, snapshotId: null, error });
      });
    } catch (error) {
      // Unexpected failures (unknown session, invalid transition) end the sequence
      // without touching the session further.
      this.logger.error("recovery_aborted", { session_id: sessionId, message: describeError(error) });
      return this.finish(sessionId, { attempts, cancelled: true, snapshotId: null, error: null });
    }
  }

  private async attempt(sessionId: string, attempt: number, signal: AbortSignal): Promise<AttemptResult> {
    const session = this.registry.get(sessionId);
    if (signal.aborted || session.state !== "lost") {
      this.logger.info("recovery_cancelled", { session_id: sessionId, attempt, state: session.state });
      return { kind: "cancelled" };
    }

    const driver = this.registry.driverFor(sessionId);
    const stale = this.registry.releaseHandle(sessionId);
    if (stale !== undefined) {
      await this.registry.stopQuietly(sessionId, driver, stale, "stale_before_restore");
    }

    const snapshotId = session.lastSnapshotRef;
    try {
      if (snapshotId === null) {
        throw new RestoreError(`Session ${sessionId} has no snapshot to restore from`, { session_id: sessionId });
      }
      const payload = await this.store.restore(snapshotId);
      const handle = await callWithDeadline(() => driver.restoreState(payload), {
        operation: "restoreState",
        timeoutMs: this.adapterTimeoutMs,
        details: { session_id: sessionId, snapshot_id: snapshotId, attempt },
        onLateResult: (late) => {
          void this.registry.stopQuietly(sessionId, driver, late, "late_restore");
        },
      });
      this.registry.installHandle(sessionId, handle);
      this.registry.transition(sessionId, "running", `restored from snapshot ${snapshotId} (attempt ${attempt})`);
      return { kind: "recovered", snapshotId };
    } catch (error) {
      const failure =
        error instanceof RestoreError
          ? error
          : new RestoreError(
              `Restore attempt ${attempt} for ${sessionId} failed: ${describeError(error)}`,
              { session_id: sessionId, snapshot_id: snapshotId, attempt },
              error,
            );
      this.logger.warn("recovery_attempt_failed", {
        session_id: sessionId,
        attempt,
        max_attempts: this.maxAttempts,
        message: failure.message,
      });
      return { kind: "failed", error: failure };
    }
  }

  private finish(
    sessionId: string,
    result: Pick<RecoveryOutcome, "attempts" | "cancelled" | "snapshotId" | "error">,
  ): RecoveryOutcome {
    const state = this.registry.find(sessionId)?.state ?? "terminated";
    return { sessionId, recovered: result.snapshotId !== null, state, ...result };
  }
}
