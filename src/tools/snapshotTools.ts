import { z } from "zod";

import type { StatePayload } from "../state/payload.js";
import type { SnapshotManifest } from "../state/snapshotStore.js";
import type { SupervisorToolContext } from "./sessionTools.js";

const SnapshotIdSchema = z.string().trim().regex(/^[a-f0-9]{64}$/, "snapshot_id must be a sha256 hex digest");

export const SnapshotCaptureInputSchema = z
  .object({
    /** Session id, or `"global"` for the agent memory. */
    owner: z.string().trim().min(1),
  })
  .strict();
export const SnapshotCaptureInputShape = SnapshotCaptureInputSchema.shape;
export type SnapshotCaptureInput = z.infer<typeof SnapshotCaptureInputSchema>;

export const SnapshotRestoreInputSchema = z.object({ snapshot_id: SnapshotIdSchema }).strict();
export const SnapshotRestoreInputShape = SnapshotRestoreInputSchema.shape;
export type SnapshotRestoreInput = z.infer<typeof SnapshotRestoreInputSchema>;

export const SnapshotChainInputSchema = z.object({ snapshot_id: SnapshotIdSchema }).strict();
export const SnapshotChainInputShape = SnapshotChainInputSchema.shape;
export type SnapshotChainInput = z.infer<typeof SnapshotChainInputSchema>;

export function serialiseManifest(manifest: SnapshotManifest): Record<string, unknown> {
  return {
    snapshot_id: manifest.snapshotId,
    owner: manifest.sessionId,
    captured_at: manifest.capturedAt,
    encoding: manifest.encoding,
    payload_digest: manifest.payloadDigest,
    size_bytes: manifest.sizeBytes,
    parent_snapshot_id: manifest.parentSnapshotId,
  };
}

/** JSON payloads are parsed, text returned verbatim and binary base64 encoded. */
function renderPayload(payload: StatePayload): unknown {
  switch (payload.encoding) {
    case "json":
      return JSON.parse(payload.bytes.toString("utf8"));
    case "text":
      return payload.bytes.toString("utf8");
    case "binary":
      return payload.bytes.toString("base64");
  }
}

export async function handleSnapshotCapture(
  context: SupervisorToolContext,
  input: SnapshotCaptureInput,
): Promise<Record<string, unknown>> {
  const manifest = await context.supervisor.captureSnapshot(input.owner);
  return { snapshot: serialiseManifest(manifest) };
}

export async function handleSnapshotRestore(
  context: SupervisorToolContext,
  input: SnapshotRestoreInput,
): Promise<Record<string, unknown>> {
  const payload = await context.supervisor.restoreSnapshot(input.snapshot_id);
  return {
    snapshot_id: input.snapshot_id,
    encoding: payload.encoding,
    size_bytes: payload.bytes.byteLength,
    content: renderPayload(payload),
  };
}

export async function handleSnapshotChain(
  context: SupervisorToolContext,
  input: SnapshotChainInput,
): Promise<Record<string, unknown>> {
  const chain = await context.supervisor.snapshotChain(input.snapshot_id);
  return { depth: chain.length, chain: chain.map(serialiseManifest) };
}
