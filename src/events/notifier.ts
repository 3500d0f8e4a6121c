import { EventEmitter } from "node:events";
import { appendFile, mkdir } from "node:fs/promises";
import { dirname } from "node:path";
import { z } from "zod";

import { describeError } from "../errors.js";
import { StructuredLogger } from "../logger.js";
import { readOptionalText } from "../state/fileIo.js";

export const EVENT_KINDS = [
  "started",
  "start_failed",
  "degraded",
  "lost",
  "recovered",
  "terminal_failure",
  "snapshot_captured",
  "shutdown_failed",
  "terminated",
] as const;

export type EventKind = (typeof EVENT_KINDS)[number];

export const SupervisorEventSchema = z
  .object({
    eventId: z.number().int().positive(),
    sessionId: z.string().min(1),
    kind: z.enum(EVENT_KINDS),
    occurredAt: z.number().int().nonnegative(),
    detail: z.string(),
    transitionKey: z.string().min(1),
  })
  .strict();

/** Notification delivered to the agent about one observable change. */
export type SupervisorEvent = z.infer<typeof SupervisorEventSchema>;

export interface EventInput {
  readonly sessionId: string;
  readonly kind: EventKind;
  readonly detail: string;
  /**
   * Identifies the transition being reported. Emitting the same key twice for
   * a session is a no-op, so retried emissions never duplicate a notification.
   */
  readonly transitionKey: string;
}

export interface EventFilter {
  readonly sessionId?: string;
  /** Only events whose per-session id is strictly greater. */
  readonly afterEventId?: number;
  readonly kinds?: readonly EventKind[];
  readonly limit?: number;
}

export interface EventNotifierOptions {
  /** JSON-lines journal. Omit to keep events in memory only. */
  readonly journalFile?: string | null;
  readonly logger?: StructuredLogger;
  readonly now?: () => number;
}

export type EventListener = (event: SupervisorEvent) => void;

const NOTIFIER_EVENT = "supervisor:event";
const TRANSITION_KEY = /^transition:(\d+)$/;

/**
 * Push side of the notifier. Every matching event is buffered until the
 * consumer pulls it, so nothing is dropped between two `next()` calls.
 */
export class EventSubscription implements AsyncIterableIterator<SupervisorEvent> {
  private readonly buffer: SupervisorEvent[] = [];
  private readonly waiters: Array<(result: IteratorResult<SupervisorEvent, undefined>) => void> = [];
  private closed = false;

  constructor(
    private readonly emitter: EventEmitter,
    private readonly matcher: (event: SupervisorEvent) => boolean,
    backlog: Iterable<SupervisorEvent>,
  ) {
    for (const event of backlog) {
      this.buffer.push(event);
    }
    this.emitter.on(NOTIFIER_EVENT, this.handleEvent);
  }

  [Symbol.asyncIterator](): AsyncIterableIterator<SupervisorEvent> {
    return this;
  }

  async next(): Promise<IteratorResult<SupervisorEvent, undefined>> {
    const buffered = this.buffer.shift();
    if (buffered) {
      return { value: buffered, done: false };
    }
    if (this.closed) {
      return { value: undefined, done: true };
    }
    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }

  async return(): Promise<IteratorResult<SupervisorEvent, undefined>> {
    this.close();
    return { value: undefined, done: true };
  }

  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.emitter.removeListener(NOTIFIER_EVENT, this.handleEvent);
    this.buffer.length = 0;
    for (const waiting of this.waiters.splice(0)) {
      waiting({ value: undefined, done: true });
    }
  }

  private handleEvent = (event: SupervisorEvent): void => {
    if (this.closed || !this.matcher(event)) {
      return;
    }
    const waiting = this.waiters.shift();
    if (waiting) {
      waiting({ value: event, done: false });
      return;
    }
    this.buffer.push(event);
  };
}

/**
 * Ordered, deduplicated event log. Event ids are allocated per session,
 * start at 1 and are never reused, even when a damaged journal leaves a gap;
 * each accepted event is journalled once and delivered once to every
 * listener and subscription attached at that time.
 */
export class EventNotifier {
  private readonly emitter = new EventEmitter();
  private readonly history: SupervisorEvent[] = [];
  private readonly lastIds = new Map<string, number>();
  private readonly byTransition = new Map<string, SupervisorEvent>();
  private readonly journalFile: string | null;
  private readonly logger: StructuredLogger;
  private readonly now: () => number;
  private writeQueue: Promise<void> = Promise.resolve();
  private journalDirectoryReady = false;

  constructor(options: EventNotifierOptions = {}) {
    this.journalFile = options.journalFile ?? null;
    this.logger = options.logger ?? new StructuredLogger();
    this.now = options.now ?? (() => Date.now());
    this.emitter.setMaxListeners(0);
  }

  /**
   * Appends an event unless {@link EventInput.transitionKey} was already
   * reported for the session, in which case the original event is returned
   * and nothing is delivered.
   */
  emit(input: EventInput): { event: SupervisorEvent; duplicate: boolean } {
    const dedupKey = `${input.sessionId}\u0000${input.transitionKey}`;
    const existing = this.byTransition.get(dedupKey);
    if (existing) {
      this.logger.debug("event_duplicate_ignored", {
        session_id: input.sessionId,
        kind: input.kind,
        transition_key: input.transitionKey,
      });
      return { event: existing, duplicate: true };
    }

    const eventId = (this.lastIds.get(input.sessionId) ?? 0) + 1;
    const event: SupervisorEvent = Object.freeze({
      eventId,
      sessionId: input.sessionId,
      kind: input.kind,
      occurredAt: this.now(),
      detail: input.detail,
      transitionKey: input.transitionKey,
    });
    this.lastIds.set(input.sessionId, eventId);
    this.byTransition.set(dedupKey, event);
    this.history.push(event);
    this.persist(event);

    this.logger.info("event_emitted", {
      session_id: event.sessionId,
      event_id: event.eventId,
      kind: event.kind,
      detail: event.detail,
    });
    this.emitter.emit(NOTIFIER_EVENT, event);
    return { event, duplicate: false };
  }

  /** Pull access, oldest first. */
  list(filter: EventFilter = {}): SupervisorEvent[] {
    const matching = this.history.filter((event) => matchesFilter(event, filter));
    if (filter.limit !== undefined && filter.limit > 0) {
      return matching.slice(0, filter.limit);
    }
    return matching;
  }

  /**
   * Opens a stream of new matching events. With `afterEventId` the matching
   * backlog is replayed first. Close it with `return()` or
   * {@link EventSubscription.close}.
   */
  subscribe(filter: Omit<EventFilter, "limit"> = {}): EventSubscription {
    const backlog = filter.afterEventId !== undefined ? this.list(filter) : [];
    return new EventSubscription(this.emitter, (event) => matchesFilter(event, filter), backlog);
  }

  /** Registers a synchronous listener. Returns the function that detaches it. */
  onEvent(listener: EventListener): () => void {
    const guarded = (event: SupervisorEvent): void => {
      try {
        listener(event);
      } catch (error) {
        this.logger.warn("event_listener_failed", {
          session_id: event.sessionId,
          event_id: event.eventId,
          message: describeError(error),
        });
      }
    };
    this.emitter.on(NOTIFIER_EVENT, guarded);
    return () => {
      this.emitter.removeListener(NOTIFIER_EVENT, guarded);
    };
  }

  lastEventId(sessionId: string): number {
    return this.lastIds.get(sessionId) ?? 0;
  }

  /**
   * Latest event reported under a `transition:<revision>` key for the
   * session, with that revision. `null` when the session has none.
   */
  lastTransition(sessionId: string): { revision: number; event: SupervisorEvent } | null {
    for (let index = this.history.length - 1; index >= 0; index -= 1) {
      const event = this.history[index];
      if (!event || event.sessionId !== sessionId) {
        continue;
      }
      const match = TRANSITION_KEY.exec(event.transitionKey);
      if (match) {
        return { revision: Number(match[1]), event };
      }
    }
    return null;
  }

  /**
   * Rebuilds the log from the journal. Unreadable lines, and lines whose id
   * does not move past the session's last id, are skipped and logged. A later
   * valid line is kept across a gap so ids handed out afterwards stay unique.
   */
  async load(): Promise<void> {
    if (!this.journalFile) {
      return;
    }
    const content = await readOptionalText(this.journalFile);
    if (content === null) {
      return;
    }
    let skipped = 0;
    for (const rawLine of content.split(/\r?\n/)) {
      const line = rawLine.trim();
      if (line.length === 0) {
        continue;
      }
      const event = parseJournalLine(line);
      if (!event) {
        skipped += 1;
        continue;
      }
      const dedupKey = `${event.sessionId}\u0000${event.transitionKey}`;
      const previous = this.lastEventId(event.sessionId);
      if (event.eventId <= previous || this.byTransition.has(dedupKey)) {
        skipped += 1;
        continue;
      }
      if (event.eventId !== previous + 1) {
        this.logger.warn("event_journal_gap", {
          file: this.journalFile,
          session_id: event.sessionId,
          expected_event_id: previous + 1,
          event_id: event.eventId,
        });
      }
      this.lastIds.set(event.sessionId, event.eventId);
      this.byTransition.set(dedupKey, event);
      this.history.push(event);
    }
    if (skipped > 0) {
      this.logger.warn("event_journal_entries_skipped", { file: this.journalFile, skipped });
    }
    this.logger.info("event_journal_loaded", { file: this.journalFile, events: this.history.length });
  }

  /** Waits until every accepted event has reached the journal. */
  async flush(): Promise<void> {
    await this.writeQueue;
  }

  private persist(event: SupervisorEvent): void {
    const journalFile = this.journalFile;
    if (!journalFile) {
      return;
    }
    const line = `${JSON.stringify(event)}\n`;
    this.writeQueue = this.writeQueue.then(async () => {
      try {
        if (!this.journalDirectoryReady) {
          await mkdir(dirname(journalFile), { recursive: true });
          this.journalDirectoryReady = true;
        }
        await appendFile(journalFile, line, "utf8");
      } catch (error) {
        this.logger.error("event_journal_write_failed", {
          session_id: event.sessionId,
          event_id: event.eventId,
          message: describeError(error),
        });
      }
    });
  }
}

function matchesFilter(event: SupervisorEvent, filter: EventFilter): boolean {
  if (filter.sessionId !== undefined && event.sessionId !== filter.sessionId) {
    return false;
  }
  if (filter.afterEventId !== undefined && !(event.eventId > filter.afterEventId)) {
    return false;
  }
  if (filter.kinds && filter.kinds.length > 0 && !filter.kinds.includes(event.kind)) {
    return false;
  }
  return true;
}

function parseJournalLine(line: string): SupervisorEvent | null {
  try {
    const parsed = SupervisorEventSchema.safeParse(JSON.parse(line));
    return parsed.success ? parsed.data : null;
  } catch {
    return null;
  }
}
