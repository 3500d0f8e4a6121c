import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";

import { StructuredLogger } from "./logger.js";
import { supervisorToolError } from "./server/toolErrors.js";
import type { RunSupervisor } from "./supervisor.js";
import { EventsListInputSchema, EventsListInputShape, handleEventsList } from "./tools/eventTools.js";
import {
  handleMemoryGet,
  handleMemorySet,
  MemoryGetInputSchema,
  MemoryGetInputShape,
  MemorySetInputSchema,
  MemorySetInputShape,
} from "./tools/memoryTools.js";
import {
  handleSessionCreate,
  handleSessionGet,
  handleSessionList,
  handleSessionTeardown,
  SessionCreateInputSchema,
  SessionCreateInputShape,
  SessionGetInputSchema,
  SessionGetInputShape,
  SessionListInputSchema,
  SessionListInputShape,
  SessionTeardownInputSchema,
  SessionTeardownInputShape,
  type SupervisorToolContext,
} from "./tools/sessionTools.js";
import {
  handleSnapshotCapture,
  handleSnapshotChain,
  handleSnapshotRestore,
  SnapshotCaptureInputSchema,
  SnapshotCaptureInputShape,
  SnapshotChainInputSchema,
  SnapshotChainInputShape,
  SnapshotRestoreInputSchema,
  SnapshotRestoreInputShape,
} from "./tools/snapshotTools.js";

export const SERVER_NAME = "mind-run-supervisor";
export const SERVER_VERSION = "0.1.0";

export interface SupervisorServerOptions {
  readonly logger?: StructuredLogger;
}

/** Serialises a tool result as indented JSON text plus structured content. */
function respond(tool: string, result: Record<string, unknown>): CallToolResult {
  return {
    content: [{ type: "text", text: JSON.stringify({ tool, result }, null, 2) }],
    structuredContent: result,
  };
}

async function runTool(
  context: SupervisorToolContext,
  tool: string,
  run: () => Record<string, unknown> | Promise<Record<string, unknown>>,
): Promise<CallToolResult> {
  try {
    return respond(tool, await run());
  } catch (error) {
    return supervisorToolError(context.logger, tool, error);
  }
}

/**
 * Builds an MCP server exposing the agent operations of {@link supervisor}.
 * Failures are returned as `isError` results carrying the error code, hint
 * and details rather than protocol errors.
 */
export function createSupervisorServer(supervisor: RunSupervisor, options: SupervisorServerOptions = {}): McpServer {
  const context: SupervisorToolContext = { supervisor, logger: options.logger ?? new StructuredLogger() };
  const server = new McpServer({ name: SERVER_NAME, version: SERVER_VERSION });

  server.registerTool(
    "session_create",
    {
      title: "Create session",
      description: "Starts a supervised environment of the given kind and returns its session.",
      inputSchema: SessionCreateInputShape,
    },
    async (input: unknown) =>
      runTool(context, "session_create", () => handleSessionCreate(context, SessionCreateInputSchema.parse(input))),
  );

  server.registerTool(
    "session_get",
    {
      title: "Get session",
      description: "Returns the current record of a session.",
      inputSchema: SessionGetInputShape,
    },
    async (input: unknown) =>
      runTool(context, "session_get", () => handleSessionGet(context, SessionGetInputSchema.parse(input))),
  );

  server.registerTool(
    "session_list",
    {
      title: "List sessions",
      description: "Lists active sessions, oldest first. Ended sessions are included on request.",
      inputSchema: SessionListInputShape,
    },
    async (input: unknown) =>
      runTool(context, "session_list", () => handleSessionList(context, SessionListInputSchema.parse(input ?? {}))),
  );

  server.registerTool(
    "session_teardown",
    {
      title: "Tear down session",
      description: "Stops the environment of a session and marks it terminated. Repeating the call is harmless.",
      inputSchema: SessionTeardownInputShape,
    },
    async (input: unknown) =>
      runTool(context, "session_teardown", () =>
        handleSessionTeardown(context, SessionTeardownInputSchema.parse(input)),
      ),
  );

  server.registerTool(
    "snapshot_capture",
    {
      title: "Capture snapshot",
      description: "Captures the state of a live session, or of the agent memory with owner \"global\".",
      inputSchema: SnapshotCaptureInputShape,
    },
    async (input: unknown) =>
      runTool(context, "snapshot_capture", () =>
        handleSnapshotCapture(context, SnapshotCaptureInputSchema.parse(input)),
      ),
  );

  server.registerTool(
    "snapshot_restore",
    {
      title: "Read snapshot",
      description: "Returns the payload stored in a snapshot without touching any session.",
      inputSchema: SnapshotRestoreInputShape,
    },
    async (input: unknown) =>
      runTool(context, "snapshot_restore", () =>
        handleSnapshotRestore(context, SnapshotRestoreInputSchema.parse(input)),
      ),
  );

  server.registerTool(
    "snapshot_chain",
    {
      title: "Snapshot chain",
      description: "Lists a snapshot and its ancestors, nearest first.",
      inputSchema: SnapshotChainInputShape,
    },
    async (input: unknown) =>
      runTool(context, "snapshot_chain", () => handleSnapshotChain(context, SnapshotChainInputSchema.parse(input))),
  );

  server.registerTool(
    "events_list",
    {
      title: "List events",
      description: "Returns supervision events in order, optionally after a known event id.",
      inputSchema: EventsListInputShape,
    },
    async (input: unknown) =>
      runTool(context, "events_list", () => handleEventsList(context, EventsListInputSchema.parse(input ?? {}))),
  );

  server.registerTool(
    "memory_set",
    {
      title: "Set memory entry",
      description: "Stores a JSON value in the agent memory. Omitting the value deletes the key.",
      inputSchema: MemorySetInputShape,
    },
    async (input: unknown) =>
      runTool(context, "memory_set", () => handleMemorySet(context, MemorySetInputSchema.parse(input))),
  );

  server.registerTool(
    "memory_get",
    {
      title: "Get memory entry",
      description: "Reads one agent memory entry, or all of them when no key is given.",
      inputSchema: MemoryGetInputShape,
    },
    async (input: unknown) =>
      runTool(context, "memory_get", () => handleMemoryGet(context, MemoryGetInputSchema.parse(input ?? {}))),
  );

  return server;
}
