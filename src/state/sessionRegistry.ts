import { z } from "zod";

import type { DriverConfig, EnvironmentDriver, EnvironmentKind } from "../drivers/contract.js";
import { ENVIRONMENT_KINDS } from "../drivers/contract.js";
import type { DriverRegistry } from "../drivers/registry.js";
import { describeError, InvalidTransitionError, NotFoundError, ShutdownError, StartupError } from "../errors.js";
import type { EventKind, EventNotifier, SupervisorEvent } from "../events/notifier.js";
import { KeyedMutex } from "../infra/keyedMutex.js";
import { runWithSessionContext } from "../infra/sessionContext.js";
import { StructuredLogger } from "../logger.js";
import { callWithDeadline } from "../runtime/deadline.js";
import { readOptionalText, writeFileAtomic } from "./fileIo.js";
import { stableStringify } from "./payload.js";
import { canTransition, isTerminalState, SESSION_STATES, type SessionState } from "./sessionLifecycle.js";

export const SessionSchema = z
  .object({
    sessionId: z.string().regex(/^session-\d+$/),
    kind: z.enum(ENVIRONMENT_KINDS),
    state: z.enum(SESSION_STATES),
    lastSnapshotRef: z.string().nullable(),
    createdAt: z.number().int().nonnegative(),
    updatedAt: z.number().int().nonnegative(),
    lastHealthAt: z.number().int().nonnegative().nullable(),
    endedAt: z.number().int().nonnegative().nullable(),
    stopReason: z.string().nullable(),
    revision: z.number().int().nonnegative(),
    config: z.record(z.string(), z.unknown()),
  })
  .strict();

/** Public, immutable view of a session record. */
export type Session = z.infer<typeof SessionSchema>;

const SessionTableSchema = z
  .object({
    lastId: z.number().int().nonnegative(),
    sessions: z.array(SessionSchema),
  })
  .strict();

type MutableSessionRecord = { -readonly [K in keyof Session]: Session[K] };

export interface SessionRegistryOptions {
  readonly drivers: DriverRegistry;
  readonly notifier: EventNotifier;
  /** Shared with the monitor and the recovery coordinator. */
  readonly locks: KeyedMutex;
  readonly adapterTimeoutMs: number;
  /** Additional `start` attempts allowed when no handle was returned. */
  readonly startRetries: number;
  /** `sessions.json` location. Omit to keep the table in memory only. */
  readonly tableFile?: string | null;
  readonly logger?: StructuredLogger;
  readonly now?: () => number;
}

export interface TeardownResult {
  readonly session: Session;
  /** `false` when the session was already terminal and nothing happened. */
  readonly changed: boolean;
}

/** Event reported when a session moves from {@link from} to {@link to}. */
function eventKindFor(from: SessionState, to: SessionState): EventKind {
  switch (to) {
    case "running":
      return from === "starting" ? "started" : "recovered";
    case "failed":
      return "start_failed";
    case "degraded":
      return "degraded";
    case "lost":
      return "lost";
    case "terminal_failure":
      return "terminal_failure";
    case "terminated":
    case "starting":
      return "terminated";
  }
}

/** State a session is left in by a journalled transition event. */
function stateAfterEvent(kind: EventKind): SessionState | null {
  switch (kind) {
    case "started":
    case "recovered":
      return "running";
    case "start_failed":
      return "failed";
    case "degraded":
    case "lost":
    case "terminal_failure":
    case "terminated":
      return kind;
    case "snapshot_captured":
    case "shutdown_failed":
      return null;
  }
}

/** Event re-reported for a table revision the journal never received. */
function restoredEventKind(record: Pick<Session, "state" | "revision">): EventKind {
  if (record.state === "running" && record.revision === 1) {
    return "started";
  }
  return eventKindFor("lost", record.state);
}

function cloneRecord(record: MutableSessionRecord): Session {
  return { ...record, config: structuredClone(record.config) };
}

/**
 * Durable table of sessions. Records survive restarts through `sessions.json`
 * while driver handles only ever live in memory. Ids come from a persisted
 * counter and terminated sessions stay as tombstones, so an id is never
 * reused.
 */
export class SessionRegistry {
  private readonly sessions = new Map<string, MutableSessionRecord>();
  private readonly handles = new Map<string, unknown>();
  private readonly drivers: DriverRegistry;
  private readonly notifier: EventNotifier;
  private readonly locks: KeyedMutex;
  private readonly adapterTimeoutMs: number;
  private readonly startRetries: number;
  private readonly tableFile: string | null;
  private readonly logger: StructuredLogger;
  private readonly now: () => number;
  private lastId = 0;
  private writeQueue: Promise<void> = Promise.resolve();

  constructor(options: SessionRegistryOptions) {
    this.drivers = options.drivers;
    this.notifier = options.notifier;
    this.locks = options.locks;
    this.adapterTimeoutMs = options.adapterTimeoutMs;
    this.startRetries = options.startRetries;
    this.tableFile = options.tableFile ?? null;
    this.logger = options.logger ?? new StructuredLogger();
    this.now = options.now ?? (() => Date.now());
  }

  /**
   * Allocates a session, starts its environment and settles it to `running`.
   * When every start attempt fails the session is recorded as `failed` and a
   * {@link StartupError} carrying the session id is thrown.
   */
  async create(kind: EnvironmentKind, config: DriverConfig = {}): Promise<Session> {
    const driver = this.drivers.resolve(kind);
    this.lastId += 1;
    const sessionId = `session-${this.lastId}`;
    const createdAt = this.now();
    const record: MutableSessionRecord = {
      sessionId,
      kind,
      state: "starting",
      lastSnapshotRef: null,
      createdAt,
      updatedAt: createdAt,
      lastHealthAt: null,
      endedAt: null,
      stopReason: null,
      revision: 0,
      config: structuredClone(config),
    };
    this.sessions.set(sessionId, record);
    this.schedulePersist();

    return this.locks.runExclusive(sessionId, () =>
      runWithSessionContext({ sessionId, task: "start" }, async () => {
        this.logger.info("session_starting", { kind });
        let handle: unknown;
        try {
          handle = await this.startWithRetry(sessionId, driver, record.config);
        } catch (error) {
          this.transition(sessionId, "failed", describeError(error), "start_failed");
          throw error;
        }
        this.handles.set(sessionId, handle);
        this.transition(sessionId, "running", `${kind} environment started`);
        return cloneRecord(record);
      }),
    );
  }

  get(sessionId: string): Session {
    return cloneRecord(this.requireRecord(sessionId));
  }

  find(sessionId: string): Session | undefined {
    const record = this.sessions.get(sessionId);
    return record ? cloneRecord(record) : undefined;
  }

  /** Non-terminal sessions ordered by creation time, then id sequence. */
  listActive(): Session[] {
    return this.list().filter((session) => !isTerminalState(session.state));
  }

  list(options: { includeTerminated?: boolean } = { includeTerminated: true }): Session[] {
    const includeTerminated = options.includeTerminated ?? true;
    return Array.from(this.sessions.values())
      .filter((record) => includeTerminated || !isTerminalState(record.state))
      .sort((left, right) => left.createdAt - right.createdAt || sequenceOf(left) - sequenceOf(right))
      .map((record) => cloneRecord(record));
  }

  driverFor(sessionId: string): EnvironmentDriver {
    return this.drivers.resolve(this.requireRecord(sessionId).kind);
  }

  /**
   * Applies a state-machine transition, persists the table and reports it.
   * Callers hold the session lock. The transition's revision is the dedup
   * key of the event, so a replayed transition never notifies twice.
   */
  transition(
    sessionId: string,
    to: SessionState,
    detail: string,
    stopReason?: string,
  ): { session: Session; event: SupervisorEvent } {
    const record = this.requireRecord(sessionId);
    const from = record.state;
    if (!canTransition(from, to)) {
      throw new InvalidTransitionError(sessionId, from, to);
    }
    const at = this.now();
    record.state = to;
    record.revision += 1;
    record.updatedAt = at;
    if (isTerminalState(to)) {
      record.endedAt = at;
      record.stopReason = stopReason ?? to;
      this.handles.delete(sessionId);
    }
    this.schedulePersist();
    this.logger.info("session_transition", { session_id: sessionId, from, to, revision: record.revision });

    const { event } = this.notifier.emit({
      sessionId,
      kind: eventKindFor(from, to),
      detail,
      transitionKey: `transition:${record.revision}`,
    });
    return { session: cloneRecord(record), event };
  }

  installHandle(sessionId: string, handle: unknown): void {
    this.requireRecord(sessionId);
    this.handles.set(sessionId, handle);
  }

  handleOf(sessionId: string): unknown {
    return this.handles.get(sessionId);
  }

  hasHandle(sessionId: string): boolean {
    return this.handles.has(sessionId);
  }

  /** Detaches and returns the live handle, if any. */
  releaseHandle(sessionId: string): unknown {
    const handle = this.handles.get(sessionId);
    this.handles.delete(sessionId);
    return handle;
  }

  setLastSnapshotRef(sessionId: string, snapshotId: string): void {
    const record = this.requireRecord(sessionId);
    record.lastSnapshotRef = snapshotId;
    record.updatedAt = this.now();
    this.schedulePersist();
  }

  recordHealth(sessionId: string, at: number = this.now()): void {
    const record = this.requireRecord(sessionId);
    record.lastHealthAt = at;
    this.schedulePersist();
  }

  /**
   * Stops the live environment and marks the session `terminated`, whatever
   * the stop outcome. A stop failure is reported as `shutdown_failed` before
   * `terminated`. Terminal sessions are returned unchanged.
   */
  async teardown(sessionId: string, reason = "requested"): Promise<TeardownResult> {
    this.requireRecord(sessionId);
    return this.locks.runExclusive(sessionId, () =>
      runWithSessionContext({ sessionId, task: "teardown" }, async () => {
        const record = this.requireRecord(sessionId);
        if (isTerminalState(record.state)) {
          return { session: cloneRecord(record), changed: false };
        }
        const handle = this.releaseHandle(sessionId);
        if (handle !== undefined) {
          const failure = await this.stopQuietly(sessionId, this.driverFor(sessionId), handle, "teardown");
          if (failure !== null) {
            this.notifier.emit({
              sessionId,
              kind: "shutdown_failed",
              detail: failure.message,
              transitionKey: `shutdown_failed:${record.revision + 1}`,
            });
          }
        }
        const { session } = this.transition(sessionId, "terminated", `session torn down (${reason})`, reason);
        return { session, changed: true };
      }),
    );
  }

  /**
   * Best-effort `stop` under the adapter deadline. Returns the failure, wrapped
   * in a {@link ShutdownError}, instead of throwing: a failed stop means the
   * environment is already gone.
   */
  async stopQuietly(
    sessionId: string,
    driver: EnvironmentDriver,
    handle: unknown,
    reason: string,
  ): Promise<ShutdownError | null> {
    try {
      await callWithDeadline(() => driver.stop(handle), {
        operation: "stop",
        timeoutMs: this.adapterTimeoutMs,
        details: { session_id: sessionId },
      });
      this.logger.debug("environment_stopped", { session_id: sessionId, reason });
      return null;
    } catch (error) {
      this.logger.warn("environment_stop_failed", {
        session_id: sessionId,
        reason,
        message: describeError(error),
      });
      return new ShutdownError(
        `Stop of ${sessionId} failed: ${describeError(error)}`,
        { session_id: sessionId, reason },
        error,
      );
    }
  }

  /**
   * Rebuilds the table from `sessions.json` and aligns every record with the
   * notifier's journal, so load the notifier first. Sessions persisted while
   * still `starting` never got a handle and are marked `failed`.
   */
  async load(): Promise<void> {
    if (!this.tableFile) {
      return;
    }
    const raw = await readOptionalText(this.tableFile);
    if (raw === null) {
      return;
    }
    const table = SessionTableSchema.parse(JSON.parse(raw));
    this.lastId = table.lastId;
    for (const session of table.sessions) {
      this.sessions.set(session.sessionId, { ...session });
      this.lastId = Math.max(this.lastId, sequenceOf(session));
    }
    for (const session of table.sessions) {
      this.reconcileWithJournal(session.sessionId);
    }
    for (const session of table.sessions) {
      if (this.requireRecord(session.sessionId).state === "starting") {
        this.transition(session.sessionId, "failed", "start interrupted by a supervisor restart", "start_interrupted");
      }
    }
    this.logger.info("session_table_loaded", { file: this.tableFile, sessions: table.sessions.length });
  }

  async flush(): Promise<void> {
    await this.writeQueue;
  }

  private async startWithRetry(sessionId: string, driver: EnvironmentDriver, config: DriverConfig): Promise<unknown> {
    const attempts = 1 + this.startRetries;
    let lastError: unknown;
    for (let attempt = 1; attempt <= attempts; attempt += 1) {
      try {
        return await callWithDeadline(() => driver.start(structuredClone(config)), {
          operation: "start",
          timeoutMs: this.adapterTimeoutMs,
          details: { session_id: sessionId, attempt },
          onLateResult: (handle) => {
            void this.stopQuietly(sessionId, driver, handle, "late_start");
          },
        });
      } catch (error) {
        lastError = error;
        this.logger.warn("session_start_attempt_failed", {
          session_id: sessionId,
          attempt,
          attempts,
          message: describeError(error),
        });
      }
    }
    throw new StartupError(
      `Session ${sessionId} failed to start after ${attempts} attempt(s): ${describeError(lastError)}`,
      { session_id: sessionId, attempts },
      lastError,
    );
  }

  /**
   * The table and the journal are written by separate queues, so after a
   * crash either may hold one transition the other lacks. A journal ahead of
   * the table wins: its state and revision are adopted. A table ahead of the
   * journal gets its current state reported under the missing revision.
   */
  private reconcileWithJournal(sessionId: string): void {
    const record = this.requireRecord(sessionId);
    const latest = this.notifier.lastTransition(sessionId);
    const journalRevision = latest?.revision ?? 0;
    if (latest && journalRevision > record.revision) {
      const state = stateAfterEvent(latest.event.kind);
      if (state !== null && state !== record.state) {
        record.state = state;
        if (isTerminalState(state)) {
          record.endedAt = latest.event.occurredAt;
          record.stopReason = record.stopReason ?? state;
        }
      }
      record.revision = journalRevision;
      record.updatedAt = Math.max(record.updatedAt, latest.event.occurredAt);
      this.schedulePersist();
      this.logger.warn("session_revision_reconciled", {
        session_id: sessionId,
        source: "journal",
        state: record.state,
        revision: record.revision,
      });
      return;
    }
    if (record.revision > journalRevision) {
      this.notifier.emit({
        sessionId,
        kind: restoredEventKind(record),
        detail: `${record.state} (restored after a supervisor restart)`,
        transitionKey: `transition:${record.revision}`,
      });
      this.logger.warn("session_revision_reconciled", {
        session_id: sessionId,
        source: "table",
        state: record.state,
        revision: record.revision,
      });
    }
  }

  private requireRecord(sessionId: string): MutableSessionRecord {
    const record = this.sessions.get(sessionId);
    if (!record) {
      throw new NotFoundError("session", sessionId);
    }
    return record;
  }

  private schedulePersist(): void {
    const tableFile = this.tableFile;
    if (!tableFile) {
      return;
    }
    const contents = stableStringify({
      lastId: this.lastId,
      sessions: Array.from(this.sessions.values()),
    });
    this.writeQueue = this.writeQueue.then(async () => {
      try {
        await writeFileAtomic(tableFile, contents);
      } catch (error) {
        this.logger.error("session_table_write_failed", { file: tableFile, message: describeError(error) });
      }
    });
  }
}

function sequenceOf(session: Pick<Session, "sessionId">): number {
  return Number.parseInt(session.sessionId.slice("session-".length), 10);
}
