import { afterEach, beforeEach, describe, it } from "mocha";
import { expect } from "chai";
import { appendFile, mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";

import { EventNotifier, type SupervisorEvent } from "../src/events/notifier.js";
import { RecordingLogger } from "./helpers/recordingLogger.js";

describe("events/notifier", () => {
  let logger: RecordingLogger;
  let clockMs: number;

  beforeEach(() => {
    logger = new RecordingLogger();
    clockMs = 1_000;
  });

  function createNotifier(journalFile: string | null = null): EventNotifier {
    return new EventNotifier({ journalFile, logger, now: () => clockMs });
  }

  it("allocates gapless ids per session starting at 1", () => {
    const notifier = createNotifier();

    notifier.emit({ sessionId: "session-1", kind: "started", detail: "browser up", transitionKey: "transition:1" });
    notifier.emit({ sessionId: "session-2", kind: "started", detail: "notebook up", transitionKey: "transition:1" });
    clockMs = 2_000;
    const { event } = notifier.emit({
      sessionId: "session-1",
      kind: "degraded",
      detail: "health probe failed",
      transitionKey: "transition:2",
    });

    expect(event).to.deep.equal({
      eventId: 2,
      sessionId: "session-1",
      kind: "degraded",
      occurredAt: 2_000,
      detail: "health probe failed",
      transitionKey: "transition:2",
    });
    expect(Object.isFrozen(event)).to.equal(true);
    expect(notifier.lastEventId("session-1")).to.equal(2);
    expect(notifier.lastEventId("session-2")).to.equal(1);
    expect(notifier.lastEventId("session-3")).to.equal(0);
  });

  it("ignores a transition reported twice", () => {
    const notifier = createNotifier();
    const delivered: SupervisorEvent[] = [];
    notifier.onEvent((event) => delivered.push(event));

    const first = notifier.emit({ sessionId: "session-1", kind: "lost", detail: "x", transitionKey: "transition:4" });
    const second = notifier.emit({ sessionId: "session-1", kind: "lost", detail: "y", transitionKey: "transition:4" });

    expect(first.duplicate).to.equal(false);
    expect(second.duplicate).to.equal(true);
    expect(second.event).to.equal(first.event);
    expect(delivered).to.have.length(1);
    expect(notifier.list({ sessionId: "session-1" })).to.have.length(1);
  });

  it("filters the log by session, id, kind and limit", () => {
    const notifier = createNotifier();
    notifier.emit({ sessionId: "session-1", kind: "started", detail: "", transitionKey: "t1" });
    notifier.emit({ sessionId: "session-1", kind: "degraded", detail: "", transitionKey: "t2" });
    notifier.emit({ sessionId: "session-2", kind: "started", detail: "", transitionKey: "t1" });
    notifier.emit({ sessionId: "session-1", kind: "recovered", detail: "", transitionKey: "t3" });

    const ids = (events: SupervisorEvent[]) => events.map((event) => `${event.sessionId}#${event.eventId}`);
    expect(ids(notifier.list())).to.deep.equal(["session-1#1", "session-1#2", "session-2#1", "session-1#3"]);
    expect(ids(notifier.list({ sessionId: "session-1", afterEventId: 1 }))).to.deep.equal(["session-1#2", "session-1#3"]);
    expect(ids(notifier.list({ kinds: ["started"] }))).to.deep.equal(["session-1#1", "session-2#1"]);
    expect(ids(notifier.list({ limit: 2 }))).to.deep.equal(["session-1#1", "session-1#2"]);
  });

  it("streams new events to subscribers and replays the backlog on request", async () => {
    const notifier = createNotifier();
    notifier.emit({ sessionId: "session-1", kind: "started", detail: "", transitionKey: "t1" });
    notifier.emit({ sessionId: "session-1", kind: "degraded", detail: "", transitionKey: "t2" });

    const live = notifier.subscribe({ sessionId: "session-1" });
    const replay = notifier.subscribe({ sessionId: "session-1", afterEventId: 1 });
    const pending = live.next();
    notifier.emit({ sessionId: "session-2", kind: "started", detail: "", transitionKey: "t1" });
    notifier.emit({ sessionId: "session-1", kind: "lost", detail: "", transitionKey: "t3" });

    const first = await pending;
    expect(first.done).to.equal(false);
    expect(first.value?.eventId).to.equal(3);

    expect((await replay.next()).value?.eventId).to.equal(2);
    expect((await replay.next()).value?.eventId).to.equal(3);

    live.close();
    replay.close();
    expect(await live.next()).to.deep.equal({ value: undefined, done: true });
  });

  it("hands events to concurrent pulls in the order they were requested", async () => {
    const notifier = createNotifier();
    const subscription = notifier.subscribe({ sessionId: "session-1" });
    const firstPull = subscription.next();
    const secondPull = subscription.next();
    const thirdPull = subscription.next();

    notifier.emit({ sessionId: "session-1", kind: "started", detail: "", transitionKey: "t1" });
    notifier.emit({ sessionId: "session-1", kind: "degraded", detail: "", transitionKey: "t2" });

    expect((await firstPull).value?.eventId).to.equal(1);
    expect((await secondPull).value?.eventId).to.equal(2);

    subscription.close();
    expect(await thirdPull).to.deep.equal({ value: undefined, done: true });
  });

  it("keeps delivering when a listener throws", () => {
    const notifier = createNotifier();
    const received: number[] = [];
    notifier.onEvent(() => {
      throw new Error("listener bug");
    });
    const detach = notifier.onEvent((event) => received.push(event.eventId));

    notifier.emit({ sessionId: "session-1", kind: "started", detail: "", transitionKey: "t1" });
    detach();
    notifier.emit({ sessionId: "session-1", kind: "terminated", detail: "", transitionKey: "t2" });

    expect(received).to.deep.equal([1]);
    expect(logger.messages("warn")).to.deep.equal(["event_listener_failed", "event_listener_failed"]);
  });

  describe("journal", () => {
    let directory: string;

    beforeEach(async () => {
      directory = await mkdtemp(path.join(tmpdir(), "supervisor-events-"));
    });

    afterEach(async () => {
      await rm(directory, { recursive: true, force: true });
    });

    it("rebuilds ids and deduplication from the journal", async () => {
      const journalFile = path.join(directory, "nested", "events.jsonl");
      const notifier = createNotifier(journalFile);
      notifier.emit({ sessionId: "session-1", kind: "started", detail: "up", transitionKey: "transition:1" });
      notifier.emit({ sessionId: "session-1", kind: "degraded", detail: "slow", transitionKey: "transition:2" });
      await notifier.flush();

      const lines = (await readFile(journalFile, "utf8")).trim().split("\n");
      expect(lines).to.have.length(2);

      const restarted = createNotifier(journalFile);
      await restarted.load();

      expect(restarted.lastEventId("session-1")).to.equal(2);
      expect(restarted.emit({ sessionId: "session-1", kind: "degraded", detail: "slow", transitionKey: "transition:2" }).duplicate).to.equal(true);
      expect(restarted.emit({ sessionId: "session-1", kind: "lost", detail: "gone", transitionKey: "transition:3" }).event.eventId).to.equal(3);
      await restarted.flush();
    });

    it("keeps valid lines past a corrupt one and never reissues their ids", async () => {
      const journalFile = path.join(directory, "events.jsonl");
      const valid = (eventId: number) =>
        JSON.stringify({
          eventId,
          sessionId: "session-1",
          kind: "started",
          occurredAt: 1,
          detail: "",
          transitionKey: `t${eventId}`,
        });
      await appendFile(journalFile, `${valid(1)}\n{"truncated\n${valid(3)}\n${valid(2)}\n`, "utf8");

      const notifier = createNotifier(journalFile);
      await notifier.load();

      expect(notifier.list().map((event) => event.eventId)).to.deep.equal([1, 3]);
      expect(notifier.lastEventId("session-1")).to.equal(3);
      expect(logger.entries.find((entry) => entry.message === "event_journal_gap")?.payload).to.deep.equal({
        file: journalFile,
        session_id: "session-1",
        expected_event_id: 2,
        event_id: 3,
      });
      expect(logger.entries.find((entry) => entry.message === "event_journal_entries_skipped")?.payload).to.deep.equal({
        file: journalFile,
        skipped: 2,
      });

      const { event } = notifier.emit({ sessionId: "session-1", kind: "lost", detail: "", transitionKey: "t4" });
      expect(event.eventId).to.equal(4);
      await notifier.flush();
    });

    it("reports the latest transition revision recorded for a session", async () => {
      const journalFile = path.join(directory, "events.jsonl");
      const notifier = createNotifier(journalFile);
      notifier.emit({ sessionId: "session-1", kind: "started", detail: "", transitionKey: "transition:1" });
      notifier.emit({ sessionId: "session-1", kind: "degraded", detail: "", transitionKey: "transition:2" });
      notifier.emit({ sessionId: "session-1", kind: "snapshot_captured", detail: "", transitionKey: "snapshot:abc" });
      notifier.emit({ sessionId: "session-2", kind: "started", detail: "", transitionKey: "transition:1" });
      await notifier.flush();

      const restarted = createNotifier(journalFile);
      await restarted.load();

      const latest = restarted.lastTransition("session-1");
      expect(latest?.revision).to.equal(2);
      expect(latest?.event.kind).to.equal("degraded");
      expect(restarted.lastTransition("session-2")?.revision).to.equal(1);
      expect(restarted.lastTransition("session-3")).to.equal(null);
    });
  });
});
