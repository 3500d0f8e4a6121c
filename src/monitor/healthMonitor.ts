import type { HealthVerdict } from "../drivers/contract.js";
import { describeError } from "../errors.js";
import type { KeyedMutex } from "../infra/keyedMutex.js";
import { runWithSessionContext } from "../infra/sessionContext.js";
import { StructuredLogger } from "../logger.js";
import type { RecoveryOutcome } from "../recovery/recoveryCoordinator.js";
import { callWithDeadline } from "../runtime/deadline.js";
import { runtimeClearTimeout, runtimeSetTimeout, type TimeoutHandle } from "../runtime/timers.js";
import type { SessionRegistry } from "../state/sessionRegistry.js";
import { hasLiveEnvironment, isTerminalState, type SessionState } from "../state/sessionLifecycle.js";

export interface HealthMonitorOptions {
  readonly registry: SessionRegistry;
  readonly locks: KeyedMutex;
  readonly probeIntervalMs: number;
  readonly probeTimeoutMs: number;
  /** Consecutive failed probes after which a degraded session is declared lost. */
  readonly failureThreshold: number;
  /** Receives every session declared lost. */
  readonly onLost: (sessionId: string) => Promise<RecoveryOutcome>;
  readonly logger?: StructuredLogger;
}

export interface ProbeOutcome {
  readonly sessionId: string;
  /** `skipped` when the session was not in a probed state. */
  readonly verdict: HealthVerdict | "skipped";
  readonly state: SessionState;
  readonly failureStreak: number;
  /** Failure description when the probe did not come back healthy. */
  readonly reason: string | null;
  /** Recovery sequence started by this probe, when it declared the session lost. */
  readonly recovery: Promise<RecoveryOutcome> | null;
}

interface ProbeLoop {
  timer: TimeoutHandle | null;
  stopped: boolean;
}

/**
 * Periodic liveness checks. Each watched session gets its own loop; a cycle
 * holds the session lock for the duration of the driver call, so probes
 * never overlap with captures, recovery attempts or teardown.
 */
export class HealthMonitor {
  private readonly registry: SessionRegistry;
  private readonly locks: KeyedMutex;
  private readonly probeIntervalMs: number;
  private readonly probeTimeoutMs: number;
  private readonly failureThreshold: number;
  private readonly onLost: (sessionId: string) => Promise<RecoveryOutcome>;
  private readonly logger: StructuredLogger;
  private readonly loops = new Map<string, ProbeLoop>();
  private readonly streaks = new Map<string, number>();

  constructor(options: HealthMonitorOptions) {
    this.registry = options.registry;
    this.locks = options.locks;
    this.probeIntervalMs = options.probeIntervalMs;
    this.probeTimeoutMs = options.probeTimeoutMs;
    this.failureThreshold = options.failureThreshold;
    this.onLost = options.onLost;
    this.logger = options.logger ?? new StructuredLogger();
  }

  /** Starts the probe loop of a session. Watching twice is a no-op. */
  watch(sessionId: string): void {
    if (this.loops.has(sessionId)) {
      return;
    }
    const loop: ProbeLoop = { timer: null, stopped: false };
    this.loops.set(sessionId, loop);
    this.schedule(sessionId, loop);
    this.logger.debug("probe_loop_started", { session_id: sessionId, interval_ms: this.probeIntervalMs });
  }

  unwatch(sessionId: string): void {
    const loop = this.loops.get(sessionId);
    if (!loop) {
      return;
    }
    loop.stopped = true;
    if (loop.timer) {
      runtimeClearTimeout(loop.timer);
      loop.timer = null;
    }
    this.loops.delete(sessionId);
    this.streaks.delete(sessionId);
    this.logger.debug("probe_loop_stopped", { session_id: sessionId });
  }

  isWatching(sessionId: string): boolean {
    return this.loops.has(sessionId);
  }

  failureStreak(sessionId: string): number {
    return this.streaks.get(sessionId) ?? 0;
  }

  /** Stops every loop. In-flight probes finish but schedule nothing further. */
  stop(): void {
    for (const sessionId of Array.from(this.loops.keys())) {
      this.unwatch(sessionId);
    }
  }

  /**
   * Runs one probe cycle now. Sessions outside `running`/`degraded` are
   * skipped. A cycle that declares the session lost hands it to recovery
   * once the lock is released and exposes that sequence as `recovery`.
   */
  async probe(sessionId: string): Promise<ProbeOutcome> {
    const outcome = await this.locks.runExclusive(sessionId, () =>
      runWithSessionContext({ sessionId, task: "probe" }, () => this.probeLocked(sessionId)),
    );
    if (outcome.state !== "lost" || outcome.verdict === "skipped") {
      return outcome;
    }
    return { ...outcome, recovery: this.onLost(sessionId) };
  }

  private async probeLocked(sessionId: string): Promise<ProbeOutcome> {
    const session = this.registry.get(sessionId);
    if (!hasLiveEnvironment(session.state)) {
      return this.outcome(sessionId, "skipped", session.state, null);
    }

    let verdict: HealthVerdict = "unresponsive";
    let reason: string | null = null;
    if (!this.registry.hasHandle(sessionId)) {
      reason = "no live environment handle";
    } else {
      const driver = this.registry.driverFor(sessionId);
      const handle = this.registry.handleOf(sessionId);
      try {
        verdict = await callWithDeadline(() => driver.healthCheck(handle, this.probeTimeoutMs), {
          operation: "healthCheck",
          timeoutMs: this.probeTimeoutMs,
          details: { session_id: sessionId },
        });
        if (verdict === "unresponsive") {
          reason = "environment reported unresponsive";
        }
      } catch (error) {
        reason = describeError(error);
      }
    }

    if (verdict === "healthy") {
      this.streaks.set(sessionId, 0);
      this.registry.recordHealth(sessionId);
      if (session.state === "degraded") {
        const { session: updated } = this.registry.transition(sessionId, "running", "health probe succeeded again");
        return this.outcome(sessionId, verdict, updated.state, null);
      }
      return this.outcome(sessionId, verdict, session.state, null);
    }

    const streak = this.failureStreak(sessionId) + 1;
    this.streaks.set(sessionId, streak);
    this.logger.warn("probe_failed", { session_id: sessionId, streak, threshold: this.failureThreshold, reason });

    let state = session.state;
    if (state === "running") {
      state = this.registry.transition(sessionId, "degraded", `health probe failed: ${reason ?? "unknown"}`).session.state;
    }
    if (streak >= this.failureThreshold && state === "degraded") {
      state = this.registry.transition(
        sessionId,
        "lost",
        `${streak} consecutive failed health probes: ${reason ?? "unknown"}`,
      ).session.state;
      this.streaks.set(sessionId, 0);
      return { ...this.outcome(sessionId, verdict, state, reason), failureStreak: streak };
    }
    return this.outcome(sessionId, verdict, state, reason);
  }

  private outcome(
    sessionId: string,
    verdict: ProbeOutcome["verdict"],
    state: SessionState,
    reason: string | null,
  ): ProbeOutcome {
    return { sessionId, verdict, state, failureStreak: this.failureStreak(sessionId), reason, recovery: null };
  }

  private schedule(sessionId: string, loop: ProbeLoop): void {
    loop.timer = runtimeSetTimeout(
      () => {
        loop.timer = null;
        void this.runCycle(sessionId, loop);
      },
      this.probeIntervalMs,
      { unref: true },
    );
  }

  private async runCycle(sessionId: string, loop: ProbeLoop): Promise<void> {
    if (loop.stopped) {
      return;
    }
    try {
      const outcome = await this.probe(sessionId);
      if (outcome.recovery) {
        // The loop stays idle while recovery owns the session.
        await outcome.recovery;
      }
    } catch (error) {
      this.logger.error("probe_cycle_failed", { session_id: sessionId, message: describeError(error) });
    }
    if (loop.stopped) {
      return;
    }
    const session = this.registry.find(sessionId);
    if (!session || isTerminalState(session.state)) {
      this.unwatch(sessionId);
      return;
    }
    this.schedule(sessionId, loop);
  }
}
