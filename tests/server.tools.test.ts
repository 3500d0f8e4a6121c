import { afterEach, beforeEach, describe, it } from "mocha";
import { expect } from "chai";
import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { z } from "zod";

import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { CallToolResultSchema } from "@modelcontextprotocol/sdk/types.js";

import { DriverRegistry } from "../src/drivers/registry.js";
import { NotFoundError } from "../src/errors.js";
import { createSupervisorServer } from "../src/server.js";
import { normaliseToolError } from "../src/server/toolErrors.js";
import { RunSupervisor } from "../src/supervisor.js";
import { RecordingLogger } from "./helpers/recordingLogger.js";
import { ScriptedDriver } from "./helpers/scriptedDriver.js";

interface ToolCall {
  readonly isError: boolean;
  /** Parsed JSON text of the first content entry. */
  readonly text: unknown;
  readonly structured: Record<string, unknown> | undefined;
}

describe("server tools", () => {
  let runsRoot: string;
  let driver: ScriptedDriver;
  let logger: RecordingLogger;
  let supervisor: RunSupervisor;
  let server: McpServer;
  let client: Client;

  async function call(name: string, args: Record<string, unknown> = {}): Promise<ToolCall> {
    const result = CallToolResultSchema.parse(await client.callTool({ name, arguments: args }));
    const first = result.content[0];
    return {
      isError: result.isError === true,
      text: first?.type === "text" ? JSON.parse(first.text) : null,
      structured: result.structuredContent,
    };
  }

  beforeEach(async () => {
    runsRoot = await mkdtemp(path.join(tmpdir(), "supervisor-server-"));
    driver = new ScriptedDriver();
    logger = new RecordingLogger();
    supervisor = await RunSupervisor.open({
      drivers: new DriverRegistry().register("browser", driver),
      settings: { runsRoot, adapterTimeoutMs: 50, logFile: null },
      logger,
    });
    server = createSupervisorServer(supervisor, { logger });

    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    await server.connect(serverTransport);
    client = new Client({ name: "supervisor-tools-test", version: "1.0.0-test" });
    await client.connect(clientTransport);
  });

  afterEach(async () => {
    await client.close();
    await server.close();
    await supervisor.shutdown({ teardownSessions: true });
    await rm(runsRoot, { recursive: true, force: true });
  });

  it("exposes the agent operations", async () => {
    const listed = await client.listTools({});

    expect(listed.tools.map((tool) => tool.name).sort()).to.deep.equal([
      "events_list",
      "memory_get",
      "memory_set",
      "session_create",
      "session_get",
      "session_list",
      "session_teardown",
      "snapshot_capture",
      "snapshot_chain",
      "snapshot_restore",
    ]);
  });

  it("creates, snapshots and reads back a session", async () => {
    const created = await call("session_create", {
      kind: "browser",
      config: { initialState: { url: "https://example.test/inbox" } },
    });
    expect(created.isError).to.equal(false);
    expect(created.structured?.session).to.deep.include({
      session_id: "session-1",
      kind: "browser",
      state: "running",
      last_snapshot_ref: null,
      stop_reason: null,
    });
    expect(created.text).to.deep.equal({ tool: "session_create", result: created.structured });

    const captured = await call("snapshot_capture", { owner: "session-1" });
    const snapshot = z
      .object({ snapshot: z.object({ snapshot_id: z.string(), owner: z.string(), parent_snapshot_id: z.null() }) })
      .parse(captured.structured).snapshot;
    expect(snapshot.owner).to.equal("session-1");

    const restored = await call("snapshot_restore", { snapshot_id: snapshot.snapshot_id });
    expect(restored.structured).to.deep.include({
      snapshot_id: snapshot.snapshot_id,
      encoding: "json",
      content: { url: "https://example.test/inbox" },
    });

    const chain = await call("snapshot_chain", { snapshot_id: snapshot.snapshot_id });
    expect(chain.structured?.depth).to.equal(1);

    const fetched = await call("session_get", { session_id: "session-1" });
    expect(fetched.structured?.session).to.deep.include({ last_snapshot_ref: snapshot.snapshot_id });

    const events = await call("events_list", { session_id: "session-1", after_event_id: 1 });
    expect(events.structured?.count).to.equal(1);
    expect(events.structured?.events).to.have.length(1);
    expect(z.array(z.object({ event_id: z.number(), kind: z.string() })).parse(events.structured?.events)).to.deep.equal([
      { event_id: 2, kind: "snapshot_captured" },
    ]);
  });

  it("reports failures as tool errors with code, hint and details", async () => {
    const missing = await call("session_get", { session_id: "session-9" });

    expect(missing.isError).to.equal(true);
    expect(missing.text).to.deep.equal({
      ok: false,
      error: "E-NOTFOUND",
      tool: "session_get",
      message: "Unknown session: session-9",
      hint: "list sessions before retrying",
      details: { resource: "session", id: "session-9" },
    });
    expect(logger.messages("error")).to.include("session_get_failed");
  });

  it("tears sessions down and lists what remains", async () => {
    await call("session_create", { kind: "browser" });
    await call("session_create", { kind: "browser" });

    const first = await call("session_teardown", { session_id: "session-1", reason: "task_complete" });
    const again = await call("session_teardown", { session_id: "session-1" });

    expect(first.structured?.session).to.deep.include({ state: "terminated", stop_reason: "task_complete" });
    expect(again.structured).to.deep.equal(first.structured);

    const active = await call("session_list");
    expect(active.structured?.count).to.equal(1);
    const everything = await call("session_list", { include_terminated: true });
    expect(everything.structured?.count).to.equal(2);
  });

  it("stores, reads and deletes agent memory entries", async () => {
    expect((await call("memory_set", { key: "goal", value: { step: 2 } })).structured).to.deep.equal({
      key: "goal",
      stored: true,
    });
    expect((await call("memory_get", { key: "goal" })).structured).to.deep.equal({
      key: "goal",
      found: true,
      value: { step: 2 },
    });
    expect((await call("memory_get")).structured).to.deep.equal({ entries: { goal: { step: 2 } } });

    expect((await call("memory_set", { key: "goal" })).structured).to.deep.equal({ key: "goal", deleted: true });
    expect((await call("memory_get", { key: "goal" })).structured).to.deep.equal({
      key: "goal",
      found: false,
      value: null,
    });
  });

  describe("normaliseToolError", () => {
    it("maps validation failures to invalid input", () => {
      const parsed = z.object({ kind: z.string() }).safeParse({ kind: 7 });
      expect(parsed.success).to.equal(false);
      if (parsed.success) {
        return;
      }

      const normalised = normaliseToolError(parsed.error);

      expect(normalised.code).to.equal("E-SUPERVISOR-INVALID-INPUT");
      expect(normalised.hint).to.equal("invalid_input");
      expect(normalised.details?.issues).to.deep.equal(parsed.error.issues);
    });

    it("keeps supervisor codes and truncates long messages of unexpected errors", () => {
      expect(normaliseToolError(new NotFoundError("driver", "notebook"))).to.deep.equal({
        code: "E-NOTFOUND",
        message: "Unknown driver: notebook",
        hint: "list drivers before retrying",
        details: { resource: "driver", id: "notebook" },
      });

      const normalised = normaliseToolError(new Error("x".repeat(1_500)));
      expect(normalised.code).to.equal("E-SUPERVISOR-UNEXPECTED");
      expect(normalised.message).to.have.length(1_000);
      expect(normalised.message.endsWith("…")).to.equal(true);
    });
  });
});
