import { z } from "zod";

import { ENVIRONMENT_KINDS } from "../drivers/contract.js";
import type { StructuredLogger } from "../logger.js";
import type { Session } from "../state/sessionRegistry.js";
import type { RunSupervisor } from "../supervisor.js";

/** Dependencies shared by every supervisor tool handler. */
export interface SupervisorToolContext {
  readonly supervisor: RunSupervisor;
  readonly logger: StructuredLogger;
}

const SessionIdSchema = z.string().trim().min(1, "session_id must not be empty");

export const SessionCreateInputSchema = z
  .object({
    kind: z.enum(ENVIRONMENT_KINDS),
    config: z.record(z.string(), z.unknown()).optional(),
  })
  .strict();
export const SessionCreateInputShape = SessionCreateInputSchema.shape;
export type SessionCreateInput = z.infer<typeof SessionCreateInputSchema>;

export const SessionGetInputSchema = z.object({ session_id: SessionIdSchema }).strict();
export const SessionGetInputShape = SessionGetInputSchema.shape;
export type SessionGetInput = z.infer<typeof SessionGetInputSchema>;

export const SessionListInputSchema = z
  .object({
    include_terminated: z.boolean().optional(),
  })
  .strict();
export const SessionListInputShape = SessionListInputSchema.shape;
export type SessionListInput = z.infer<typeof SessionListInputSchema>;

export const SessionTeardownInputSchema = z
  .object({
    session_id: SessionIdSchema,
    reason: z.string().trim().min(1).max(200).optional(),
  })
  .strict();
export const SessionTeardownInputShape = SessionTeardownInputSchema.shape;
export type SessionTeardownInput = z.infer<typeof SessionTeardownInputSchema>;

/** Wire representation of a session, snake_cased like every tool payload. */
export function serialiseSession(session: Session): Record<string, unknown> {
  return {
    session_id: session.sessionId,
    kind: session.kind,
    state: session.state,
    last_snapshot_ref: session.lastSnapshotRef,
    created_at: session.createdAt,
    updated_at: session.updatedAt,
    last_health_at: session.lastHealthAt,
    ended_at: session.endedAt,
    stop_reason: session.stopReason,
  };
}

export async function handleSessionCreate(
  context: SupervisorToolContext,
  input: SessionCreateInput,
): Promise<Record<string, unknown>> {
  const session = await context.supervisor.createSession(input.kind, input.config ?? {});
  context.logger.info("session_create", { session_id: session.sessionId, kind: session.kind });
  return { session: serialiseSession(session) };
}

export function handleSessionGet(context: SupervisorToolContext, input: SessionGetInput): Record<string, unknown> {
  return { session: serialiseSession(context.supervisor.getSession(input.session_id)) };
}

export function handleSessionList(context: SupervisorToolContext, input: SessionListInput): Record<string, unknown> {
  const sessions = context.supervisor.listSessions({ includeTerminated: input.include_terminated ?? false });
  return { count: sessions.length, sessions: sessions.map(serialiseSession) };
}

export async function handleSessionTeardown(
  context: SupervisorToolContext,
  input: SessionTeardownInput,
): Promise<Record<string, unknown>> {
  const session = await context.supervisor.teardownSession(input.session_id, input.reason ?? "requested");
  context.logger.info("session_teardown", { session_id: session.sessionId, state: session.state });
  return { session: serialiseSession(session) };
}
