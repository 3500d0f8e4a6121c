import { afterEach, beforeEach, describe, it } from "mocha";
import { expect } from "chai";
import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";

import { DriverRegistry } from "../src/drivers/registry.js";
import { RecoveryExhaustedError } from "../src/errors.js";
import { EventNotifier } from "../src/events/notifier.js";
import { KeyedMutex } from "../src/infra/keyedMutex.js";
import { RecoveryCoordinator } from "../src/recovery/recoveryCoordinator.js";
import { jsonPayload } from "../src/state/payload.js";
import { SessionRegistry } from "../src/state/sessionRegistry.js";
import { SnapshotStore } from "../src/state/snapshotStore.js";
import { RecordingLogger } from "./helpers/recordingLogger.js";
import { ScriptedDriver } from "./helpers/scriptedDriver.js";

describe("recovery/recoveryCoordinator", () => {
  let directory: string;
  let driver: ScriptedDriver;
  let notifier: EventNotifier;
  let registry: SessionRegistry;
  let store: SnapshotStore;
  let locks: KeyedMutex;
  let logger: RecordingLogger;
  let sleeps: number[];

  function createCoordinator(
    overrides: { maxAttempts?: number; sleep?: (ms: number, signal: AbortSignal) => Promise<void> } = {},
  ): RecoveryCoordinator {
    return new RecoveryCoordinator({
      registry,
      store,
      locks,
      maxAttempts: overrides.maxAttempts ?? 3,
      backoffMinMs: 100,
      backoffMaxMs: 1_000,
      backoffFactor: 2,
      adapterTimeoutMs: 20,
      sleep:
        overrides.sleep ??
        (async (ms) => {
          sleeps.push(ms);
        }),
      logger,
    });
  }

  /** Starts session-1, optionally snapshots it, then drives it to `lost`. */
  async function lostSession(withSnapshot: boolean): Promise<string | null> {
    await registry.create("browser", { initialState: { url: "https://example.test/start" } });
    let snapshotId: string | null = null;
    if (withSnapshot) {
      const manifest = await store.put("session-1", jsonPayload({ url: "https://example.test/checkout" }), null);
      registry.setLastSnapshotRef("session-1", manifest.snapshotId);
      snapshotId = manifest.snapshotId;
    }
    registry.transition("session-1", "degraded", "probe failed");
    registry.transition("session-1", "lost", "probe failed again");
    return snapshotId;
  }

  function kinds(): string[] {
    return notifier.list({ sessionId: "session-1" }).map((event) => event.kind);
  }

  beforeEach(async () => {
    directory = await mkdtemp(path.join(tmpdir(), "supervisor-recovery-"));
    driver = new ScriptedDriver();
    logger = new RecordingLogger();
    locks = new KeyedMutex();
    sleeps = [];
    notifier = new EventNotifier({ logger });
    registry = new SessionRegistry({
      drivers: new DriverRegistry().register("browser", driver),
      notifier,
      locks,
      adapterTimeoutMs: 20,
      startRetries: 0,
      logger,
    });
    store = await SnapshotStore.open({ directory, logger });
  });

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  it("computes capped exponential backoff", () => {
    const coordinator = createCoordinator();

    expect([1, 2, 3, 4, 5].map((attempt) => coordinator.backoffDelay(attempt))).to.deep.equal([
      100, 200, 400, 800, 1_000,
    ]);
  });

  it("restores the last snapshot after a failed attempt", async () => {
    const snapshotId = await lostSession(true);
    driver.restoreSteps.push("fail");
    const coordinator = createCoordinator();

    const outcome = await coordinator.recover("session-1");

    expect(outcome).to.deep.equal({
      sessionId: "session-1",
      recovered: true,
      state: "running",
      attempts: 2,
      cancelled: false,
      snapshotId,
      error: null,
    });
    expect(sleeps).to.deep.equal([100]);
    expect(driver.calls).to.deep.equal(["start", "stop:1", "restore", "restore"]);
    expect(registry.handleOf("session-1")).to.deep.equal({ id: 2, state: { url: "https://example.test/checkout" } });
    expect(notifier.list({ sessionId: "session-1", kinds: ["recovered"] }).map((event) => event.detail)).to.deep.equal([
      `restored from snapshot ${snapshotId} (attempt 2)`,
    ]);
    expect(coordinator.isRecovering("session-1")).to.equal(false);
  });

  it("ends in terminal_failure once every attempt failed", async () => {
    await lostSession(true);
    driver.restoreSteps.push("fail", "fail", "fail");
    const coordinator = createCoordinator();

    const outcome = await coordinator.recover("session-1");

    expect(outcome.recovered).to.equal(false);
    expect(outcome.state).to.equal("terminal_failure");
    expect(outcome.attempts).to.equal(3);
    expect(outcome.error).to.be.instanceOf(RecoveryExhaustedError);
    expect(outcome.error?.message).to.equal(
      "Recovery of session-1 failed after 3 attempt(s): Restore attempt 3 for session-1 failed: restore failed",
    );
    expect(sleeps).to.deep.equal([100, 200]);
    const session = registry.get("session-1");
    expect(session.stopReason).to.equal("recovery_exhausted");
    expect(kinds()).to.deep.equal(["started", "degraded", "lost", "terminal_failure"]);
    expect(notifier.list({ kinds: ["terminal_failure"] })[0]?.detail).to.equal(outcome.error?.message);
  });

  it("fails every attempt when the session has no snapshot", async () => {
    await lostSession(false);
    const coordinator = createCoordinator({ maxAttempts: 2 });

    const outcome = await coordinator.recover("session-1");

    expect(outcome.error?.message).to.equal(
      "Recovery of session-1 failed after 2 attempt(s): Session session-1 has no snapshot to restore from",
    );
    expect(driver.calls).to.deep.equal(["start", "stop:1"]);
  });

  it("runs a single sequence for concurrent requests", async () => {
    await lostSession(true);
    const coordinator = createCoordinator();

    const first = coordinator.recover("session-1");
    const second = coordinator.recover("session-1");

    expect(second).to.equal(first);
    expect(coordinator.isRecovering("session-1")).to.equal(true);
    await first;
    expect(driver.calls.filter((call) => call === "restore")).to.have.length(1);
  });

  it("does nothing for a session that is not lost", async () => {
    await registry.create("browser");
    const coordinator = createCoordinator();

    const outcome = await coordinator.recover("session-1");

    expect(outcome).to.deep.include({ recovered: false, attempts: 0, state: "running", cancelled: true });
    expect(driver.calls).to.deep.equal(["start"]);
  });

  it("stops between attempts when cancelled and leaves teardown in charge", async () => {
    await lostSession(true);
    driver.restoreSteps.push("fail");
    let sleeping: () => void = () => {};
    const backoffReached = new Promise<void>((resolve) => {
      sleeping = resolve;
    });
    const coordinator = createCoordinator({
      sleep: (_ms, signal) =>
        new Promise<void>((resolve) => {
          sleeping();
          if (signal.aborted) {
            resolve();
            return;
          }
          signal.addEventListener("abort", () => resolve(), { once: true });
        }),
    });

    const pending = coordinator.recover("session-1");
    await backoffReached;
    expect(driver.calls).to.deep.equal(["start", "stop:1", "restore"]);

    coordinator.cancel("session-1");
    await registry.teardown("session-1");
    const outcome = await pending;

    expect(outcome).to.deep.include({ recovered: false, attempts: 1, state: "terminated", cancelled: true, error: null });
    expect(driver.calls).to.deep.equal(["start", "stop:1", "restore"]);
    expect(kinds()).to.deep.equal(["started", "degraded", "lost", "terminated"]);
  });
});
