import path from "node:path";

import { loadSupervisorSettings, type SupervisorSettings } from "./config/settings.js";
import type { DriverConfig, EnvironmentKind } from "./drivers/contract.js";
import type { DriverRegistry } from "./drivers/registry.js";
import { CaptureError, describeError, NotFoundError } from "./errors.js";
import {
  EventNotifier,
  type EventFilter,
  type EventListener,
  type EventSubscription,
  type SupervisorEvent,
} from "./events/notifier.js";
import { KeyedMutex } from "./infra/keyedMutex.js";
import { runWithSessionContext } from "./infra/sessionContext.js";
import { StructuredLogger } from "./logger.js";
import { HealthMonitor, type ProbeOutcome } from "./monitor/healthMonitor.js";
import { RecoveryCoordinator, type RecoveryOutcome } from "./recovery/recoveryCoordinator.js";
import { callWithDeadline } from "./runtime/deadline.js";
import { GlobalMemory } from "./state/globalMemory.js";
import type { StatePayload } from "./state/payload.js";
import { hasLiveEnvironment } from "./state/sessionLifecycle.js";
import { SessionRegistry, type Session } from "./state/sessionRegistry.js";
import { GLOBAL_OWNER, SnapshotStore, type SnapshotManifest } from "./state/snapshotStore.js";

export interface RunSupervisorOptions {
  readonly drivers: DriverRegistry;
  /** Explicit settings, merged over `SUPERVISOR_*` variables and defaults. */
  readonly settings?: Partial<SupervisorSettings>;
  readonly logger?: StructuredLogger;
  readonly now?: () => number;
  /** Wait primitive used between recovery attempts. */
  readonly sleep?: (ms: number, signal: AbortSignal) => Promise<void>;
  /** Produces the `"global"` snapshot payload. Defaults to {@link GlobalMemory}. */
  readonly globalSerializer?: () => StatePayload | Promise<StatePayload>;
}

/**
 * Agent-facing entry point. Wires the session registry, snapshot store,
 * event notifier, health monitor and recovery coordinator over one runs
 * root and exposes the operations an agent is allowed to perform.
 */
export class RunSupervisor {
  readonly settings: SupervisorSettings;
  readonly memory = new GlobalMemory();
  private readonly logger: StructuredLogger;
  private readonly locks = new KeyedMutex();
  private readonly notifier: EventNotifier;
  private readonly registry: SessionRegistry;
  private readonly store: SnapshotStore;
  private readonly monitor: HealthMonitor;
  private readonly recovery: RecoveryCoordinator;
  private readonly globalSerializer: () => StatePayload | Promise<StatePayload>;
  private started = false;

  private constructor(
    settings: SupervisorSettings,
    store: SnapshotStore,
    options: RunSupervisorOptions,
    logger: StructuredLogger,
  ) {
    this.settings = settings;
    this.store = store;
    this.logger = logger;
    this.notifier = new EventNotifier({
      journalFile: path.join(settings.runsRoot, "events.jsonl"),
      logger,
      now: options.now,
    });
    this.registry = new SessionRegistry({
      drivers: options.drivers,
      notifier: this.notifier,
      locks: this.locks,
      adapterTimeoutMs: settings.adapterTimeoutMs,
      startRetries: settings.startRetries,
      tableFile: path.join(settings.runsRoot, "sessions.json"),
      logger,
      now: options.now,
    });
    this.recovery = new RecoveryCoordinator({
      registry: this.registry,
      store,
      locks: this.locks,
      maxAttempts: settings.maxRecoveryAttempts,
      backoffMinMs: settings.recoveryBackoffMinMs,
      backoffMaxMs: settings.recoveryBackoffMaxMs,
      backoffFactor: settings.recoveryBackoffFactor,
      adapterTimeoutMs: settings.adapterTimeoutMs,
      sleep: options.sleep,
      logger,
    });
    this.monitor = new HealthMonitor({
      registry: this.registry,
      locks: this.locks,
      probeIntervalMs: settings.probeIntervalMs,
      probeTimeoutMs: settings.probeTimeoutMs,
      failureThreshold: settings.failureThreshold,
      onLost: (sessionId) => this.recovery.recover(sessionId),
      logger,
    });
    this.globalSerializer = options.globalSerializer ?? (() => this.memory.toPayload());
  }

  /**
   * Resolves settings, opens the runs root and rebuilds events, sessions and
   * snapshots persisted by a previous process. Supervision starts with
   * {@link start}.
   */
  static async open(options: RunSupervisorOptions): Promise<RunSupervisor> {
    const settings = loadSupervisorSettings(options.settings);
    const logger = options.logger ?? new StructuredLogger({ logFile: settings.logFile });
    const store = await SnapshotStore.open({
      directory: path.join(settings.runsRoot, "snapshots"),
      logger,
      now: options.now,
    });
    const supervisor = new RunSupervisor(settings, store, options, logger);
    // The registry reconciles its revisions against the journal.
    await supervisor.notifier.load();
    await supervisor.registry.load();
    const head = store.headOf(GLOBAL_OWNER);
    if (head !== null && !options.globalSerializer) {
      supervisor.memory.replaceFrom(await store.restore(head));
    }
    logger.info("supervisor_opened", {
      runs_root: settings.runsRoot,
      sessions: supervisor.registry.listActive().length,
    });
    return supervisor;
  }

  /**
   * Starts a probe loop for every active session. Sessions persisted as
   * `lost` resume their recovery immediately.
   */
  start(): void {
    if (this.started) {
      return;
    }
    this.started = true;
    for (const session of this.registry.listActive()) {
      if (session.state === "lost") {
        void this.recovery.recover(session.sessionId);
      }
      this.monitor.watch(session.sessionId);
    }
    this.logger.info("supervisor_started", { watched: this.registry.listActive().length });
  }

  /**
   * Stops probe loops and pending recoveries, then flushes every journal.
   * With `teardownSessions` the active environments are released as well.
   */
  async shutdown(options: { teardownSessions?: boolean } = {}): Promise<void> {
    this.started = false;
    this.monitor.stop();
    await this.recovery.cancelAll();
    if (options.teardownSessions) {
      for (const session of this.registry.listActive()) {
        await this.registry.teardown(session.sessionId, "supervisor_shutdown");
      }
    }
    await this.registry.flush();
    await this.notifier.flush();
    await this.logger.flush();
    this.logger.info("supervisor_stopped", {});
  }

  async createSession(kind: EnvironmentKind, config: DriverConfig = {}): Promise<Session> {
    const session = await this.registry.create(kind, config);
    if (this.started) {
      this.monitor.watch(session.sessionId);
    }
    return session;
  }

  /** Releases a session. Idempotent on sessions that already ended. */
  async teardownSession(sessionId: string, reason = "requested"): Promise<Session> {
    this.registry.get(sessionId);
    this.monitor.unwatch(sessionId);
    this.recovery.cancel(sessionId);
    const { session } = await this.registry.teardown(sessionId, reason);
    return session;
  }

  getSession(sessionId: string): Session {
    return this.registry.get(sessionId);
  }

  listSessions(options: { includeTerminated?: boolean } = {}): Session[] {
    return options.includeTerminated ? this.registry.list() : this.registry.listActive();
  }

  /**
   * Captures the current state of a live session, or of the agent memory
   * when {@link owner} is `"global"`, and links it to the previous snapshot.
   */
  async captureSnapshot(owner: string): Promise<SnapshotManifest> {
    if (owner === GLOBAL_OWNER) {
      return this.captureGlobal();
    }
    this.registry.get(owner);
    return this.locks.runExclusive(owner, () =>
      runWithSessionContext({ sessionId: owner, task: "capture" }, async () => {
        const session = this.registry.get(owner);
        if (!hasLiveEnvironment(session.state) || !this.registry.hasHandle(owner)) {
          throw new CaptureError(`Session ${owner} is ${session.state} and has no live environment to capture`, {
            session_id: owner,
            state: session.state,
          });
        }
        const driver = this.registry.driverFor(owner);
        const handle = this.registry.handleOf(owner);
        let payload: StatePayload;
        try {
          payload = await callWithDeadline(() => driver.captureState(handle), {
            operation: "captureState",
            timeoutMs: this.settings.adapterTimeoutMs,
            details: { session_id: owner },
          });
        } catch (error) {
          if (error instanceof CaptureError) {
            throw error;
          }
          throw new CaptureError(`Capture of ${owner} failed: ${describeError(error)}`, { session_id: owner }, error);
        }
        const manifest = await this.store.put(owner, payload, session.lastSnapshotRef);
        this.registry.setLastSnapshotRef(owner, manifest.snapshotId);
        this.reportCapture(owner, manifest);
        return manifest;
      }),
    );
  }

  /** Pure read of a stored snapshot payload. */
  async restoreSnapshot(snapshotId: string): Promise<StatePayload> {
    return this.store.restore(snapshotId);
  }

  /** Replaces the agent memory with a `"global"` snapshot. */
  async restoreGlobalMemory(snapshotId: string): Promise<SnapshotManifest> {
    const manifest = await this.store.getManifest(snapshotId);
    if (manifest.sessionId !== GLOBAL_OWNER) {
      throw new NotFoundError("snapshot", snapshotId);
    }
    this.memory.replaceFrom(await this.store.restore(snapshotId));
    this.logger.info("global_memory_restored", { snapshot_id: snapshotId });
    return manifest;
  }

  async snapshotChain(snapshotId: string): Promise<SnapshotManifest[]> {
    return this.store.chain(snapshotId);
  }

  listSnapshots(owner?: string): SnapshotManifest[] {
    return this.store.list(owner);
  }

  listEvents(filter: EventFilter = {}): SupervisorEvent[] {
    return this.notifier.list(filter);
  }

  subscribe(filter: Omit<EventFilter, "limit"> = {}): EventSubscription {
    return this.notifier.subscribe(filter);
  }

  onEvent(listener: EventListener): () => void {
    return this.notifier.onEvent(listener);
  }

  /** Runs one health probe now, outside the regular cadence. */
  async probeSession(sessionId: string): Promise<ProbeOutcome> {
    return this.monitor.probe(sessionId);
  }

  /** Starts or joins the recovery sequence of a `lost` session. */
  async recoverSession(sessionId: string): Promise<RecoveryOutcome> {
    this.registry.get(sessionId);
    return this.recovery.recover(sessionId);
  }

  private async captureGlobal(): Promise<SnapshotManifest> {
    return this.locks.runExclusive(GLOBAL_OWNER, async () => {
      const payload = await this.globalSerializer();
      const manifest = await this.store.put(GLOBAL_OWNER, payload, this.store.headOf(GLOBAL_OWNER));
      await this.store.setHead(GLOBAL_OWNER, manifest.snapshotId);
      this.reportCapture(GLOBAL_OWNER, manifest);
      return manifest;
    });
  }

  private reportCapture(owner: string, manifest: SnapshotManifest): void {
    this.notifier.emit({
      sessionId: owner,
      kind: "snapshot_captured",
      detail: `snapshot ${manifest.snapshotId} (${manifest.encoding}, ${manifest.sizeBytes} bytes)`,
      transitionKey: `snapshot:${manifest.snapshotId}`,
    });
  }
}
