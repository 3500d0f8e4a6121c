import { z } from "zod";

import { EVENT_KINDS, type SupervisorEvent } from "../events/notifier.js";
import type { SupervisorToolContext } from "./sessionTools.js";

export const EventsListInputSchema = z
  .object({
    session_id: z.string().trim().min(1).optional(),
    after_event_id: z.number().int().nonnegative().optional(),
    kinds: z.array(z.enum(EVENT_KINDS)).max(EVENT_KINDS.length).optional(),
    limit: z.number().int().min(1).max(1_000).optional(),
  })
  .strict();
export const EventsListInputShape = EventsListInputSchema.shape;
export type EventsListInput = z.infer<typeof EventsListInputSchema>;

function serialiseEvent(event: SupervisorEvent): Record<string, unknown> {
  return {
    event_id: event.eventId,
    session_id: event.sessionId,
    kind: event.kind,
    occurred_at: event.occurredAt,
    detail: event.detail,
  };
}

/**
 * Pull access to the event log. Clients keep the last `event_id` they saw per
 * session and pass it back as `after_event_id`.
 */
export function handleEventsList(context: SupervisorToolContext, input: EventsListInput): Record<string, unknown> {
  const events = context.supervisor.listEvents({
    sessionId: input.session_id,
    afterEventId: input.after_event_id,
    kinds: input.kinds,
    limit: input.limit,
  });
  return { count: events.length, events: events.map(serialiseEvent) };
}
